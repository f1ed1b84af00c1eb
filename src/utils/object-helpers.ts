/**
 * Object Helpers
 *
 * Plain-object checks and merging for YAML documents, whose shape is
 * unknown until a schema has parsed them.
 */

/**
 * True for non-null, non-array objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects
 *
 * Nested objects merge key by key; arrays and scalars from `source`
 * replace the value in `target`; `undefined` in `source` leaves the
 * target value in place. Neither input is mutated.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}
