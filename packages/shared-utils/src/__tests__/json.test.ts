import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, describe, expect, it } from '@jest/globals';
import { z } from 'zod';
import { readJsonFile } from '../json';

describe('readJsonFile', () => {
  const dir = mkdtempSync(join(tmpdir(), 'dayboard-json-'));
  const schema = z.object({ city: z.string(), baseCents: z.number().int() });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns validated contents', () => {
    const path = join(dir, 'model.json');
    writeFileSync(path, JSON.stringify({ city: 'indianapolis', baseCents: 200 }));

    expect(readJsonFile(path, schema)).toEqual({ city: 'indianapolis', baseCents: 200 });
  });

  it('names the file when it cannot be parsed', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ not json');

    expect(() => readJsonFile(path, schema)).toThrow(`Could not read JSON file ${path}`);
  });

  it('names the file when the contents do not match', () => {
    const path = join(dir, 'wrong.json');
    writeFileSync(path, JSON.stringify({ city: 'indianapolis', baseCents: 'two' }));

    expect(() => readJsonFile(path, schema)).toThrow(`Invalid contents in ${path}`);
  });
});
