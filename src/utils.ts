/**
 * Helpers for string-keyed maps whose keys come from the network or the
 * command line
 */

export function hasOwn(map: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * Set `map[key]` as an own data property. Plain assignment to `__proto__`
 * would replace the prototype instead of adding a key.
 */
export function setOwn<T>(map: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(map, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
