import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { z } from 'zod';

const dataDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'data');

/** Reads one of the bundled lookup tables under `data/` and validates its shape. */
export function loadDataFile<T extends z.ZodTypeAny>(fileName: string, schema: T): z.infer<T> {
  const sourcePath = path.resolve(dataDir, fileName);

  let raw: string;
  try {
    raw = readFileSync(sourcePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[kinbot] failed to read data file ${sourcePath}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`[kinbot] data file is not valid JSON: ${sourcePath}`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`[kinbot] invalid data in ${sourcePath}: ${details}`);
  }

  return parsed.data;
}
