/**
 * Flowform Attribute Comparison
 *
 * Placeholder resolution and field-level comparison between desired and
 * stored attribute snapshots.
 */

import { canonicalJson } from '../lib/digest.js'
import type { AttributeValue, Attributes, CompareStrategy, FieldDiff } from './types.js'

// ============================================================================
// Placeholders
// ============================================================================

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

/**
 * Replace `${name}` tokens with values from `variables`, recursively through
 * lists and maps. Unknown names are left untouched.
 */
export function resolvePlaceholders(
  value: AttributeValue,
  variables: Record<string, string>
): AttributeValue {
  if (typeof value === 'string') {
    return value.replace(PLACEHOLDER_PATTERN, (token, name: string) =>
      Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : token
    )
  }
  if (Array.isArray(value)) {
    return value.map(item => resolvePlaceholders(item, variables))
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, AttributeValue> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolvePlaceholders(item, variables)
    }
    return result
  }
  return value
}

export function normalizeAttributes(
  attributes: Attributes,
  variables: Record<string, string>
): Attributes {
  const result: Attributes = {}
  for (const [key, value] of Object.entries(attributes)) {
    result[key] = resolvePlaceholders(value, variables)
  }
  return result
}

// ============================================================================
// Equality
// ============================================================================

function isPlainMap(value: AttributeValue | undefined): value is { [key: string]: AttributeValue } {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

export function deepEqual(a: AttributeValue | undefined, b: AttributeValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b
  return canonicalJson(a) === canonicalJson(b)
}

function setEqual(desired: AttributeValue[], stored: AttributeValue[]): boolean {
  const left = new Set(desired.map(item => canonicalJson(item)))
  const right = new Set(stored.map(item => canonicalJson(item)))
  if (left.size !== right.size) return false
  for (const item of left) {
    if (!right.has(item)) return false
  }
  return true
}

/**
 * Compare one desired value against its stored counterpart. Strategies fall
 * back to deep equality when the shapes do not fit them.
 */
export function valuesMatch(
  desired: AttributeValue | undefined,
  stored: AttributeValue | undefined,
  strategy: CompareStrategy = 'exact'
): boolean {
  if (strategy === 'set' && Array.isArray(desired) && Array.isArray(stored)) {
    return setEqual(desired, stored)
  }
  if (strategy === 'partial' && isPlainMap(desired) && isPlainMap(stored)) {
    return Object.entries(desired).every(([key, value]) => deepEqual(value, stored[key]))
  }
  return deepEqual(desired, stored)
}

// ============================================================================
// Diffs
// ============================================================================

/**
 * Field diff of desired against stored attributes. Only fields present in
 * the desired snapshot are compared; server-populated extras are ignored.
 */
export function diffDesired(
  desired: Attributes,
  stored: Attributes,
  strategies: Record<string, CompareStrategy> = {}
): Record<string, FieldDiff> {
  const diff: Record<string, FieldDiff> = {}
  for (const [key, value] of Object.entries(desired)) {
    if (!valuesMatch(value, stored[key], strategies[key])) {
      diff[key] = { from: stored[key], to: value }
    }
  }
  return diff
}

/**
 * Field diff over the union of keys, used to compare two snapshots of the
 * same remote object.
 */
export function diffSnapshots(before: Attributes, after: Attributes): Record<string, FieldDiff> {
  const diff: Record<string, FieldDiff> = {}
  const keys = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort()
  for (const key of keys) {
    if (!deepEqual(before[key], after[key])) {
      diff[key] = { from: before[key], to: after[key] }
    }
  }
  return diff
}
