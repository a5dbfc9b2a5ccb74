/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createCreateCommand } from './commands/create.js';
import { createDoctorCommand } from './commands/doctor.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('frontend-scaffolder')
    .description('Generate Vue and Angular projects with linting, styling and testing preconfigured')
    .version(readVersion());
  [createCreateCommand, createDoctorCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
