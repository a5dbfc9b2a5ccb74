/**
 * Framework generator exports barrel file.
 */
export { FrameworkGenerator } from './base.js';
export type { ScaffoldCommand } from './base.js';
export { VueGenerator, VUE_CLI, buildVuePreset } from './vue.js';
export { AngularGenerator, ANGULAR_CLI, eslintInitAnswers } from './angular.js';
export { getGenerator, listFrameworks } from './registry.js';
export { runPipeline } from './pipeline.js';
export type {
  Criticality,
  GenerationContext,
  PipelineResult,
  PipelineStep,
  StepReport,
  StepStatus,
} from './types.js';
