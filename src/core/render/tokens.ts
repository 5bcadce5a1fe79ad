/**
 * Placeholder token substitution.
 *
 * Tokens look like `{{ name }}` (inner whitespace optional). Substitution is a
 * single pass: replacement values are never scanned again, and tokens whose
 * name has no binding are left exactly as written.
 */
import type { Bindings } from './types.js';

const TOKEN_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Replace every bound token in a string.
 */
export function substituteTokens(text: string, bindings: Bindings): string {
  return text.replace(TOKEN_PATTERN, (match: string, name: string) =>
    Object.prototype.hasOwnProperty.call(bindings, name) ? bindings[name] : match
  );
}

/**
 * Names of all tokens in a string, bound or not, in order of first appearance.
 */
export function findTokens(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Token names in a string that have no binding.
 */
export function findUnboundTokens(text: string, bindings: Bindings): string[] {
  return findTokens(text).filter((name) => !Object.prototype.hasOwnProperty.call(bindings, name));
}
