import { db, Queryable } from '@dayboard/database';
import type { Bracket, FederalTaxTable, TaxTableSet } from '@dayboard/shared-types';
import { readJsonFile, taxTableSetSchema } from '@dayboard/shared-utils';
import { sortBrackets } from './brackets';

/**
 * Source of bracket tables. Brackets come back sorted ascending by low bound.
 * A state without an income tax is stored as one zero-rate bracket; an empty
 * list means no table exists for that state and year.
 */
export interface TaxTableRepository {
  getFederalTable(year: number): Promise<FederalTaxTable | null>;
  getStateBrackets(year: number, state: string): Promise<Bracket[]>;
}

interface BracketRow extends Record<string, unknown> {
  bracket_low: number;
  bracket_high: number;
  rate_bps: number;
}

interface FederalBracketRow extends BracketRow {
  std_deduction_single: number;
}

function toBracket(row: BracketRow): Bracket {
  return {
    lowBoundCents: Number(row.bracket_low),
    highBoundCents: Number(row.bracket_high),
    rateBasisPoints: Number(row.rate_bps),
  };
}

export class PostgresTaxTableRepository implements TaxTableRepository {
  constructor(private readonly database: Queryable = db) {}

  async getFederalTable(year: number): Promise<FederalTaxTable | null> {
    const result = await this.database.query<FederalBracketRow>(
      `SELECT bracket_low, bracket_high, rate_bps, std_deduction_single
       FROM tax_tables_federal
       WHERE year = $1
       ORDER BY bracket_low ASC`,
      [year]
    );

    const first = result.rows[0];
    if (!first) {
      return null;
    }

    return {
      year,
      brackets: result.rows.map(toBracket),
      standardDeductionCents: Number(first.std_deduction_single),
    };
  }

  async getStateBrackets(year: number, state: string): Promise<Bracket[]> {
    const result = await this.database.query<BracketRow>(
      `SELECT bracket_low, bracket_high, rate_bps
       FROM tax_tables_state
       WHERE year = $1 AND state = $2
       ORDER BY bracket_low ASC`,
      [year, state.toUpperCase()]
    );
    return result.rows.map(toBracket);
  }
}

export class InMemoryTaxTableRepository implements TaxTableRepository {
  private readonly tables: TaxTableSet;

  constructor(tables: TaxTableSet) {
    this.tables = {
      federal: tables.federal.map(table => ({ ...table, brackets: sortBrackets(table.brackets) })),
      states: tables.states.map(table => ({
        ...table,
        state: table.state.toUpperCase(),
        brackets: sortBrackets(table.brackets),
      })),
    };
  }

  static fromFile(path: string): InMemoryTaxTableRepository {
    return new InMemoryTaxTableRepository(readJsonFile(path, taxTableSetSchema));
  }

  async getFederalTable(year: number): Promise<FederalTaxTable | null> {
    const table = this.tables.federal.find(t => t.year === year);
    return table ? { ...table, brackets: [...table.brackets] } : null;
  }

  async getStateBrackets(year: number, state: string): Promise<Bracket[]> {
    const table = this.tables.states.find(t => t.year === year && t.state === state.toUpperCase());
    return table ? [...table.brackets] : [];
  }

  /** Years with a federal table, ascending. */
  federalYears(): number[] {
    return this.tables.federal.map(t => t.year).sort((a, b) => a - b);
  }

  listStates(year: number): string[] {
    return this.tables.states.filter(t => t.year === year).map(t => t.state);
  }
}
