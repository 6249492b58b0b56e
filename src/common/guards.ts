/**
 * Runtime checks for callers that bypass the type system (plain JavaScript, parsed input).
 * Each guard validates the whole value before anything is mutated.
 */
export function assertString(value: unknown, label: string): asserts value is string {
  if (typeof value !== 'string') {
    throw new TypeError(`${label} must be a string.`);
  }
}

export function assertStringList(values: unknown, label: string): asserts values is readonly string[] {
  if (!Array.isArray(values) || !values.every((value) => typeof value === 'string')) {
    throw new TypeError(`${label} must be a list containing only strings.`);
  }
}

export function assertInstance<T>(
  value: unknown,
  type: abstract new () => T,
  label: string,
): asserts value is T {
  if (!(value instanceof type)) {
    throw new TypeError(`${label} must be a ${type.name} instance.`);
  }
}

export function assertInstanceList<T>(
  values: unknown,
  type: abstract new () => T,
  label: string,
): asserts values is readonly T[] {
  if (!Array.isArray(values) || !values.every((value) => value instanceof type)) {
    throw new TypeError(`${label} must be a list containing only ${type.name} instances.`);
  }
}
