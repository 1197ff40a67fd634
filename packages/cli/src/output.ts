import { existsSync, mkdirSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';

export const DEFAULT_JSON_FILE = 'results.json';

/** `--json-out` may name a directory: an existing one, or any path without an extension. */
export function resolveJsonOutPath(target: string): string {
  const isDirectory = existsSync(target) && statSync(target).isDirectory();
  if (isDirectory || path.extname(target) === '') {
    return path.join(target, DEFAULT_JSON_FILE);
  }
  return target;
}

/** Writes a report file, creating parent directories as needed. */
export function writeReportFile(file: string, content: string): void {
  mkdirSync(path.dirname(file), { recursive: true });
  writeFileSync(file, content, 'utf8');
}
