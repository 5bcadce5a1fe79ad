/**
 * service-wizard library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Rendering
export * from './core/render/index.js';

// Features
export * from './core/features/index.js';

// Input collection
export * from './core/inputs/index.js';

// Permissions
export * from './core/permissions/index.js';

// Generation
export * from './core/generator/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
