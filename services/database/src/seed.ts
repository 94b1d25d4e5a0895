import { createLogger, readJsonFile, taxTableSetSchema, TaxTableSetData } from '@dayboard/shared-utils';
import { db, Queryable } from './index';
import { TAX_TABLES_PATH } from './paths';

const logger = createLogger('database-seed');

async function replaceYear(client: Queryable, tables: TaxTableSetData, year: number): Promise<void> {
  await client.query('DELETE FROM tax_tables_federal WHERE year = $1', [year]);
  await client.query('DELETE FROM tax_tables_state WHERE year = $1', [year]);

  for (const table of tables.federal.filter(t => t.year === year)) {
    for (const bracket of table.brackets) {
      await client.query(
        `INSERT INTO tax_tables_federal (
          year, bracket_low, bracket_high, rate_bps, std_deduction_single, std_deduction_mfj
        ) VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          year,
          bracket.lowBoundCents,
          bracket.highBoundCents,
          bracket.rateBasisPoints,
          table.standardDeductionCents,
          table.standardDeductionMarriedCents ?? table.standardDeductionCents * 2,
        ]
      );
    }
  }

  for (const table of tables.states.filter(t => t.year === year)) {
    for (const bracket of table.brackets) {
      await client.query(
        `INSERT INTO tax_tables_state (
          state, year, bracket_low, bracket_high, rate_bps, std_deduction_single
        ) VALUES ($1, $2, $3, $4, $5, 0)`,
        [table.state, year, bracket.lowBoundCents, bracket.highBoundCents, bracket.rateBasisPoints]
      );
    }
  }
}

/** Loads the bundled bracket tables, replacing any rows already stored for the same years. */
export async function seedTaxTables(path: string = TAX_TABLES_PATH): Promise<number[]> {
  const tables = readJsonFile(path, taxTableSetSchema);
  const years = [...new Set([...tables.federal, ...tables.states].map(t => t.year))].sort((a, b) => a - b);

  await db.transaction(async client => {
    for (const year of years) {
      await replaceYear(client, tables, year);
    }
  });

  logger.info('Seeded tax tables', { years });
  return years;
}

if (require.main === module) {
  seedTaxTables()
    .then(() => db.close())
    .catch(async error => {
      logger.error('Seeding failed', error);
      await db.close();
      process.exitCode = 1;
    });
}
