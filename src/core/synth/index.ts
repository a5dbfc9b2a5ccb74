/**
 * Config synthesizer exports barrel file.
 */
export * from './shared.js';
export * from './eslint.js';
export * from './prettier.js';
export * from './tailwind.js';
export * from './stylelint.js';
export * from './jest.js';
export * from './typescript.js';
export * from './env-file.js';
