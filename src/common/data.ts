import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Reads a JSON file from the repository's data/ directory and validates it.
 */
export const loadDataFile = <T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
  const raw: unknown = JSON.parse(readFileSync(new URL(fileName, DATA_DIR), 'utf8'));
  return schema.parse(raw);
};
