export function assertInRange(value: number, min: number, max: number, errorOrMessage?: Error | string): void {
  if (Number.isInteger(value) && value >= min && value <= max) {
    return;
  }
  errorOrMessage ??= `Value ${String(value)} is outside of [${String(min)}, ${String(max)}]`;
  const error = typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
  throw error;
}

export function assertNonNullable<T>(value: T, errorOrMessage?: Error | string): asserts value is NonNullable<T> {
  if (value !== null && value !== undefined) {
    return;
  }
  errorOrMessage ??= value === null ? 'Value is null' : 'Value is undefined';
  const error = typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
  throw error;
}

export function ensureInRange(value: number, min: number, max: number, errorOrMessage?: Error | string): number {
  assertInRange(value, min, max, errorOrMessage);
  return value;
}

export function ensureNonNullable<T>(value: T, errorOrMessage?: Error | string): NonNullable<T> {
  assertNonNullable(value, errorOrMessage);
  return value;
}
