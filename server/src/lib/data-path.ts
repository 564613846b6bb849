import { fileURLToPath } from 'node:url';
import path from 'node:path';

/**
 * Directory holding the JSON data files (taxonomy, field phrasings, location
 * tokens). Sits beside `src/` in source and beside `dist/` once built.
 */
export const DATA_DIR = process.env.DATA_DIR
  ?? fileURLToPath(new URL('../../data/', import.meta.url));

export function dataPath(fileName: string): string {
  return path.join(DATA_DIR, fileName);
}
