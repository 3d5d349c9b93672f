/**
 * Flowform Resource Definitions - shared pieces
 *
 * A definition turns one raw YAML entry into a desired Resource: it checks
 * fields, fills defaults and names the addresses the entry refers to.
 */

import type { ConfigIssue } from '../lib/errors.js'
import type { AttributeValue, Attributes, CompareStrategy } from '../domain/types.js'

// ============================================================================
// Types
// ============================================================================

export type FieldKind = 'string' | 'boolean' | 'number' | 'string-list' | 'map' | 'map-list'

export interface FieldSpec {
  kind: FieldKind
  required?: boolean
  default?: AttributeValue
  /** Allowed values for string fields */
  oneOf?: readonly string[]
  /** Accept a single string where a list is expected */
  coerceList?: boolean
  /** Read by the loader only, never part of the attributes */
  local?: boolean
}

export type FieldSpecs = Record<string, FieldSpec>

/**
 * A name (or full address) pointing at another resource. Bare names are
 * resolved against `types` in order; the first type is the fallback.
 */
export interface ReferenceSpec {
  value: string
  types: string[]
}

export interface CodeFileSpec {
  /** Discriminator value → file extension */
  extensions: Record<string, string>
  /** Directory searched for `<name><ext>` when neither code nor code_file is set */
  conventionalDir: string
}

export interface ResourceDefinition {
  /** Type tag used in addresses */
  type: string
  /** Top-level YAML key */
  section: string
  priority: number
  /** Section holds one mapping instead of a list */
  singleton?: boolean
  compare: Record<string, CompareStrategy>
  code?: CodeFileSpec
  /**
   * Field specs for an entry. May normalize the entry's discriminator in
   * place; returns null after recording an issue when it is invalid.
   */
  fields(entry: Record<string, unknown>, at: string, issues: ConfigIssue[]): FieldSpecs | null
  references(attributes: Attributes): ReferenceSpec[]
}

// ============================================================================
// Common Fields
// ============================================================================

export const NAME_PATTERN = /^[A-Za-z0-9_]+$/

export const COMMON_FIELDS: FieldSpecs = {
  name: { kind: 'string', required: true, local: true },
  description: { kind: 'string', default: '' },
  tags: { kind: 'string-list', default: [] },
  depends_on: { kind: 'string-list', default: [], local: true }
}

export const COMMON_COMPARE: Record<string, CompareStrategy> = {
  tags: 'set'
}

/**
 * Map a YAML discriminator alias onto its canonical value. Unknown values
 * record an issue and return null.
 */
export function resolveDiscriminator(
  entry: Record<string, unknown>,
  aliases: Record<string, string>,
  at: string,
  issues: ConfigIssue[]
): string | null {
  const raw = entry.type
  if (typeof raw !== 'string') {
    issues.push({ path: `${at}.type`, message: 'is required' })
    return null
  }
  const canonical = aliases[raw] ?? (Object.values(aliases).includes(raw) ? raw : null)
  if (canonical === null) {
    const allowed = [...new Set([...Object.keys(aliases), ...Object.values(aliases)])].sort()
    issues.push({ path: `${at}.type`, message: `must be one of ${allowed.join(', ')}` })
    return null
  }
  entry.type = canonical
  return canonical
}

export function stringField(attributes: Attributes, key: string): string | null {
  const value = attributes[key]
  return typeof value === 'string' && value.length > 0 ? value : null
}

export function stringListField(attributes: Attributes, key: string): string[] {
  const value = attributes[key]
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

// ============================================================================
// Field Decoding
// ============================================================================

/**
 * Convert a parsed YAML value into an attribute value. Returns undefined for
 * values with no JSON form.
 */
export function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined
  }
  if (Array.isArray(value)) {
    const items: AttributeValue[] = []
    for (const item of value) {
      const converted = toAttributeValue(item)
      if (converted === undefined) return undefined
      items.push(converted)
    }
    return items
  }
  if (typeof value === 'object') {
    const result: Record<string, AttributeValue> = {}
    for (const [key, item] of Object.entries(value)) {
      const converted = toAttributeValue(item)
      if (converted === undefined) return undefined
      result[key] = converted
    }
    return result
  }
  return undefined
}

function isMap(value: AttributeValue): value is { [key: string]: AttributeValue } {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function checkKind(value: AttributeValue, spec: FieldSpec): string | null {
  switch (spec.kind) {
    case 'string':
      if (typeof value !== 'string') return 'must be a string'
      if (spec.oneOf && !spec.oneOf.includes(value)) return `must be one of ${spec.oneOf.join(', ')}`
      return null
    case 'boolean':
      return typeof value === 'boolean' ? null : 'must be a boolean'
    case 'number':
      return typeof value === 'number' ? null : 'must be a number'
    case 'string-list':
      return Array.isArray(value) && value.every(v => typeof v === 'string' && v.length > 0)
        ? null
        : 'must be a list of non-empty strings'
    case 'map':
      return isMap(value) ? null : 'must be a mapping'
    case 'map-list':
      return Array.isArray(value) && value.every(isMap) ? null : 'must be a list of mappings'
  }
}

export interface DecodedFields {
  attributes: Attributes
  /** Loader-only fields */
  local: Attributes
}

/**
 * Check `entry` against `specs`, recording every problem in `issues`.
 * Unknown keys are rejected. Optional fields without a default and a null
 * value are left out.
 */
export function decodeFields(
  entry: Record<string, unknown>,
  specs: FieldSpecs,
  at: string,
  issues: ConfigIssue[]
): DecodedFields {
  const attributes: Attributes = {}
  const local: Attributes = {}

  for (const key of Object.keys(entry)) {
    if (!(key in specs)) {
      issues.push({ path: `${at}.${key}`, message: 'unknown field' })
    }
  }

  for (const [key, spec] of Object.entries(specs)) {
    const raw = entry[key]
    let value: AttributeValue | undefined

    if (raw === undefined || raw === null) {
      if (spec.required) {
        issues.push({ path: `${at}.${key}`, message: 'is required' })
        continue
      }
      value = spec.default
    } else {
      value = toAttributeValue(spec.coerceList && typeof raw === 'string' ? [raw] : raw)
      if (value === undefined) {
        issues.push({ path: `${at}.${key}`, message: 'has an unsupported value' })
        continue
      }
      const problem = checkKind(value, spec)
      if (problem) {
        issues.push({ path: `${at}.${key}`, message: problem })
        continue
      }
      if (spec.required && value === '') {
        issues.push({ path: `${at}.${key}`, message: 'must not be empty' })
        continue
      }
    }

    if (value === undefined) continue
    if (spec.local) local[key] = value
    else attributes[key] = value
  }

  return { attributes, local }
}
