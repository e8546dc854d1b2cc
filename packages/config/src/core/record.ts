type StringRecord = Readonly<Record<string, string | undefined>>

export function readOwn(record: StringRecord, key: string): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined
}

/** Creates an own data property, so keys such as `__proto__` are kept. */
export function defineOwn(record: Record<string, string>, key: string, value: string): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  })
}
