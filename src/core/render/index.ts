/**
 * Render exports barrel file.
 */
export { TemplateRenderer } from './renderer.js';
export { substituteTokens, findTokens, findUnboundTokens } from './tokens.js';
export { createBindings } from './bindings.js';
export type { Bindings, ProjectValues, RenderedFile, RenderResult } from './types.js';
