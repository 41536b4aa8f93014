import fs from 'fs/promises';
import path from 'path';

export function tempPathFor(target: string): string {
  return `${target}.${process.pid}.${Date.now()}.tmp`;
}

/**
 * Writes to a sibling temporary file and renames it over `target`, so readers
 * see either the previous file or the complete new one.
 */
export async function writeFileAtomic(target: string, data: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const tmp = tempPathFor(target);
  try {
    await fs.writeFile(tmp, data, 'utf8');
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function writeJsonAtomic(target: string, value: unknown): Promise<void> {
  await writeFileAtomic(target, JSON.stringify(value));
}

/** Parsed JSON, or `undefined` when the file is missing or not valid JSON. */
export async function readJson(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    console.warn(`[storage] ignoring corrupt ${path.basename(file)}:`, err instanceof Error ? err.message : err);
    return undefined;
  }
}
