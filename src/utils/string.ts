/**
 * String case helpers for deriving names from snake_case identifiers.
 */

/**
 * Split an identifier into its words on underscores, hyphens and spaces.
 */
function splitWords(str: string): string[] {
  return str.split(/[_\-\s]+/).filter((word) => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * "customer_service" -> "CustomerService"
 */
export function toPascalCase(str: string): string {
  return splitWords(str).map(capitalize).join('');
}

/**
 * "customer_service" -> "Customer Service"
 */
export function toTitleCase(str: string): string {
  return splitWords(str).map(capitalize).join(' ');
}
