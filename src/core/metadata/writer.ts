/**
 * Sidecar metadata (.scaffold.json) describing how a project was generated.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { readJsonFile, writeJsonFile } from '../../utils/file-system.js';
import { InvalidConfigError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { ScaffoldConfigSchema, type ScaffoldConfig } from '../config/schema.js';
import { formatZodError } from '../../utils/yaml.js';

export const METADATA_FILE = '.scaffold.json';
export const SCAFFOLDER_VERSION = '1.0.0';

export const ScaffoldMetadataSchema = ScaffoldConfigSchema.extend({
  created_at: z.string(),
  scaffolder_version: z.string(),
});

export type ScaffoldMetadata = z.infer<typeof ScaffoldMetadataSchema>;

export function buildScaffoldMetadata(config: ScaffoldConfig, now: Date = new Date()): ScaffoldMetadata {
  return {
    ...structuredClone(config),
    created_at: now.toISOString(),
    scaffolder_version: SCAFFOLDER_VERSION,
  };
}

/**
 * Write the sidecar file, overwriting any previous one.
 * Failures are logged and reported as `false`, never thrown.
 */
export async function writeScaffoldMetadata(
  projectDir: string,
  config: ScaffoldConfig,
  log: Logger,
  now: Date = new Date()
): Promise<boolean> {
  const metadataPath = path.join(projectDir, METADATA_FILE);
  try {
    await writeJsonFile(metadataPath, buildScaffoldMetadata(config, now), 4);
    log.info(`Scaffold metadata written to ${metadataPath}`);
    return true;
  } catch (error) {
    log.error(`Failed to write ${METADATA_FILE}: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
}

/**
 * Read and validate a project's sidecar file.
 */
export async function readScaffoldMetadata(projectDir: string): Promise<ScaffoldMetadata> {
  const data = await readJsonFile(path.join(projectDir, METADATA_FILE));
  const result = ScaffoldMetadataSchema.safeParse(data);
  if (!result.success) {
    throw new InvalidConfigError(METADATA_FILE, `Invalid scaffold metadata: ${formatZodError(result.error)}`);
  }
  return result.data;
}
