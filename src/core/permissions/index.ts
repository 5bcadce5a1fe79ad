/**
 * Permission exports barrel file.
 */
export { finalizePermissions } from './finalize.js';
export type { FinalizeResult, PermissionWarning } from './finalize.js';
