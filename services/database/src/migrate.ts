import { readFileSync } from 'fs';
import { createLogger } from '@dayboard/shared-utils';
import { db, Queryable } from './index';
import { SCHEMA_PATH } from './paths';

const logger = createLogger('database-migrate');

export async function migrate(database: Queryable = db, schemaPath: string = SCHEMA_PATH): Promise<void> {
  logger.info('Running database migrations', { schemaPath });
  const schema = readFileSync(schemaPath, 'utf-8');
  await database.query(schema);
  logger.info('Migrations completed');
}

if (require.main === module) {
  migrate()
    .then(() => db.close())
    .catch(async error => {
      logger.error('Migration failed', error);
      await db.close();
      process.exitCode = 1;
    });
}
