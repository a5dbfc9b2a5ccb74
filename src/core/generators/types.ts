/**
 * Generator pipeline type definitions.
 */
import type { ScaffoldConfig } from '../config/schema.js';
import type { DependencyResolver } from '../deps/resolver.js';
import type { CommandRunner } from '../process/runner.js';
import type { Logger } from '../../utils/logger.js';
import type { ScaffolderError } from '../../utils/errors.js';

/**
 * Whether a step's failure aborts the run (`required`) or is only logged (`best-effort`).
 */
export type Criticality = 'required' | 'best-effort';

/**
 * Everything a step may touch during one run.
 */
export interface GenerationContext {
  config: ScaffoldConfig;
  /** `<project_path>/<project_name>` */
  projectDir: string;
  runner: CommandRunner;
  resolver: DependencyResolver;
  logger: Logger;
}

export interface PipelineStep {
  /** Stable identifier, e.g. "base-scaffold" or "eslint-autofix" */
  id: string;
  /** Human-readable label for logs */
  label: string;
  criticality: Criticality;
  run(ctx: GenerationContext): Promise<void>;
}

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

export interface StepReport {
  id: string;
  label: string;
  criticality: Criticality;
  status: StepStatus;
  durationMs: number;
  error?: string;
}

export type PipelineResult =
  | { success: true; steps: StepReport[]; warnings: string[] }
  | { success: false; error: ScaffolderError; failedStep: string; steps: StepReport[]; warnings: string[] };
