const PROTOTYPE_KEYS = new Set(Object.getOwnPropertyNames(Object.prototype));

/** Keys such as `constructor` or `__proto__` that a plain record inherits or treats specially. */
export const isReservedKey = (key: string): boolean => PROTOTYPE_KEYS.has(key);

/** Reads an own entry of a string-keyed record, never an inherited one. */
export const ownValue = <V>(record: Readonly<Record<string, V>>, key: string): V | undefined => (
  Object.hasOwn(record, key) ? record[key] : undefined
);
