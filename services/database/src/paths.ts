import { join } from 'path';

export const SCHEMA_PATH = join(__dirname, 'schema.sql');
export const TAX_TABLES_PATH = join(__dirname, 'data', 'tax-tables.json');
