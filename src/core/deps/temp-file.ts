/**
 * Scoped temporary files.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { removeDir } from '../../utils/file-system.js';

/**
 * Run `fn` with a path inside a fresh temporary directory.
 * The directory is removed on every exit path, including when `fn` throws.
 */
export async function withTempFile<T>(
  fileName: string,
  fn: (filePath: string) => Promise<T>,
  root: string = os.tmpdir()
): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(root, 'scaffolder-'));
  try {
    return await fn(path.join(dir, fileName));
  } finally {
    await removeDir(dir);
  }
}
