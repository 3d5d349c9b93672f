/**
 * Flowform Digests
 *
 * Stable content hashes over JSON-compatible values. Object keys are sorted
 * before hashing so equal content always yields the same digest.
 */

import { createHash } from 'node:crypto'

/**
 * Serialize a value as JSON with object keys sorted at every level.
 * `undefined` object members are dropped, as JSON.stringify does.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null'
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalJson(item)).join(',')}]`
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`)
  return `{${entries.join(',')}}`
}

export function sha256(data: string): string {
  return 'sha256:' + createHash('sha256').update(data).digest('hex')
}

export function digestOf(value: unknown): string {
  return sha256(canonicalJson(value))
}
