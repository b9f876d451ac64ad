/**
 * Read the `kind` tag of a value that failed exhaustive classification.
 */
export function kindOf(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return value.kind;
  }
  return undefined;
}
