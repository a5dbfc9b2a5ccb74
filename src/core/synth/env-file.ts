/**
 * Environment file (.env) from the raw text block.
 */
import * as path from 'node:path';
import { writeFile } from '../../utils/file-system.js';

export const ENV_FILE = '.env';

/**
 * Write the block verbatim. Returns null when there is nothing to write.
 */
export async function writeEnvFile(projectDir: string, content: string): Promise<string | null> {
  if (content.trim().length === 0) {
    return null;
  }
  const filePath = path.join(projectDir, ENV_FILE);
  await writeFile(filePath, content.endsWith('\n') ? content : `${content}\n`);
  return filePath;
}
