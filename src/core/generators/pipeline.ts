/**
 * Linear step runner: the first required failure short-circuits the rest,
 * best-effort failures become warnings.
 */
import { toScaffolderError } from '../../utils/errors.js';
import type { GenerationContext, PipelineResult, PipelineStep, StepReport } from './types.js';

export async function runPipeline(steps: readonly PipelineStep[], ctx: GenerationContext): Promise<PipelineResult> {
  const log = ctx.logger;
  const reports: StepReport[] = [];
  const warnings: string[] = [];

  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    const startedAt = Date.now();
    log.info(`${step.label}...`);

    try {
      await step.run(ctx);
      reports.push({
        id: step.id,
        label: step.label,
        criticality: step.criticality,
        status: 'succeeded',
        durationMs: Date.now() - startedAt,
      });
    } catch (thrown) {
      const error = toScaffolderError(thrown, `${step.label} failed`);
      reports.push({
        id: step.id,
        label: step.label,
        criticality: step.criticality,
        status: 'failed',
        durationMs: Date.now() - startedAt,
        error: error.message,
      });

      if (step.criticality === 'best-effort') {
        log.warn(`${step.label} failed (continuing): ${error.message}`);
        warnings.push(`${step.label}: ${error.message}`);
        continue;
      }

      log.error(`${step.label} failed: ${error.message}`);
      for (const skipped of steps.slice(i + 1)) {
        reports.push({
          id: skipped.id,
          label: skipped.label,
          criticality: skipped.criticality,
          status: 'skipped',
          durationMs: 0,
        });
      }
      return { success: false, error, failedStep: step.id, steps: reports, warnings };
    }
  }

  return { success: true, steps: reports, warnings };
}
