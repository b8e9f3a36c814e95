/**
 * Deep freeze an object graph to enforce runtime immutability.
 * Already-frozen branches are left as they are.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
