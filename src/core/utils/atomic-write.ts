/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a reader sees either the old file or the
 * new one and never a partial write. The rename is atomic on POSIX when
 * source and target share a filesystem, which holds because the temp file
 * sits beside its target.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Temp path beside `filePath`, unique per process and call
 */
export function tempPathFor(filePath: string): string {
  return `${filePath}.${process.pid}.${Date.now()}.tmp`;
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }
}

/**
 * Atomically write data to a file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/tmp/cache/country-us.csv', 'id,name\n');
 * ```
 */
export async function atomicWriteFile(filePath: string, data: string | Uint8Array): Promise<void> {
  await writeVerifiedFile(filePath, data, async () => undefined);
}

/**
 * Write data to a temp file, run `verify` against that temp file, and only
 * then move it over `filePath`.
 *
 * When writing or verification fails the temp file is removed and the
 * error rethrown; `filePath` is left exactly as it was.
 */
export async function writeVerifiedFile(
  filePath: string,
  data: string | Uint8Array,
  verify: (tempPath: string) => Promise<void>
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);

  try {
    await writeFile(tempPath, data);
    await verify(tempPath);
    await rename(tempPath, filePath);
  } catch (error) {
    await removeTemp(tempPath);
    throw error;
  }
}
