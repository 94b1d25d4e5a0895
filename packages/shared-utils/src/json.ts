import { readFileSync } from 'fs';
import { z } from 'zod';
import { ValidationError } from './errors';
import { parseWithSchema } from './validation';

/** Reads a JSON file from disk and validates it, failing with a ValidationError naming the file. */
export function readJsonFile<S extends z.ZodTypeAny>(path: string, schema: S): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Could not read JSON file ${path}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseWithSchema(schema, raw, `Invalid contents in ${path}`);
}
