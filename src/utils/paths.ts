/**
 * Dot-path access into nested records
 * @module utils/paths
 */

/**
 * True for objects that are not arrays (records, nested value objects)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Get nested value in object using dot notation
 */
export function getPath(obj: object, path: string): unknown {
  const parts = path.split('.')
  let current: unknown = obj

  for (const part of parts) {
    if (!isPlainObject(current)) {
      return undefined
    }
    current = current[part]
  }

  return current
}

/**
 * Set nested value in object using dot notation, creating intermediate
 * objects as needed
 */
export function setPath(obj: object, path: string, value: unknown): void {
  if (!isPlainObject(obj)) {
    throw new TypeError(`Cannot set '${path}' on a non-object value`)
  }
  const parts = path.split('.')
  let current: Record<string, unknown> = obj

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[parts[i]] = created
      current = created
    }
  }

  current[parts[parts.length - 1]] = value
}

/**
 * Lists every leaf of a nested object as `[path, value]` pairs. Arrays and
 * null are leaves; undefined values are omitted.
 */
export function leafPaths(
  obj: object,
  prefix = ''
): Array<[string, unknown]> {
  const leaves: Array<[string, unknown]> = []

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue
    const path = prefix ? `${prefix}.${key}` : key
    if (isPlainObject(value)) {
      leaves.push(...leafPaths(value, path))
    } else {
      leaves.push([path, value])
    }
  }

  return leaves
}
