/**
 * Assign `key` as an own enumerable data property. Plain assignment would
 * route `__proto__` to the prototype setter instead.
 */
export function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
