/**
 * Generator exports barrel file.
 */
export { ProjectGenerator } from './generator.js';
export type { GenerateOptions, GenerateResult } from './generator.js';
