/** Own-property read; inherited members such as `constructor` are not values. */
export function ownValue(
  record: Readonly<Record<string, string | undefined>>,
  key: string,
): string | null {
  return Object.hasOwn(record, key) ? (record[key] ?? null) : null
}

/**
 * Copies `source`'s own values onto `target` as own data properties. Unlike
 * `Object.assign`, a `__proto__` key is copied rather than setting the
 * prototype.
 */
export function assignOwn(
  target: Record<string, string>,
  source: Readonly<Record<string, string | undefined>>,
): Record<string, string> {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue

    Object.defineProperty(target, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }

  return target
}
