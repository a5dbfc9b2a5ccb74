/**
 * Framework tag → generator.
 */
import { FrameworkSchema, type Framework } from '../config/schema.js';
import { AngularGenerator } from './angular.js';
import type { FrameworkGenerator } from './base.js';
import { VueGenerator } from './vue.js';

const GENERATORS: Record<Framework, () => FrameworkGenerator> = {
  vue: () => new VueGenerator(),
  angular: () => new AngularGenerator(),
};

export function getGenerator(framework: Framework): FrameworkGenerator {
  return GENERATORS[framework]();
}

export function listFrameworks(): Framework[] {
  return [...FrameworkSchema.options];
}
