/**
 * Shared test helpers: temporary files and typed error capture.
 */

import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

const created: string[] = [];

/**
 * Path of a file inside a fresh temporary directory. Writes `contents` to
 * it when given. Call `removeTempDirs` after each test.
 */
export function tempPath(contents?: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'textbase-'));
  created.push(dir);
  const path = join(dir, 'doc.txt');
  if (contents !== undefined) {
    writeFileSync(path, contents, 'utf-8');
  }
  return path;
}

export function removeTempDirs(): void {
  for (const dir of created.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

/** Run `fn` and return the error it throws, which must be a `type`. */
export function expectError<E extends Error>(type: new (...args: never[]) => E, fn: () => unknown): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  assert.fail(`expected ${type.name} to be thrown`);
}
