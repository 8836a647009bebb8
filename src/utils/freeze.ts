/**
 * Recursively freeze plain objects and arrays, including the children of
 * objects that were already frozen shallowly.
 */
export function deepFreeze<T>(value: T): T {
  freezeInto(value, new WeakSet<object>());
  return value;
}

function freezeInto(value: unknown, visited: WeakSet<object>): void {
  if (value === null || typeof value !== 'object' || visited.has(value)) return;
  visited.add(value);
  Object.freeze(value);
  for (const key of Object.keys(value)) {
    freezeInto(Reflect.get(value, key), visited);
  }
}
