export function assert(cond: boolean, msg = "assertion failed"): asserts cond {
  if (!cond) {
    throw new Error(msg);
  }
}

export function checkNotNull<T>(x: T, msg?: string): NonNullable<T> {
  if (x == null) {
    throw new Error(msg ?? `expected non-null: ${x}`);
  }
  return x;
}
