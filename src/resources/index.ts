/**
 * Flowform Resource Provider
 *
 * Decodes the resource sections of a configuration document into desired
 * resources, with implicit references resolved to addresses.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { ConfigIssue } from '../lib/errors.js'
import { ResourceTypeRegistry } from '../domain/registry.js'
import type { Attributes, Resource, ResourceHandler } from '../domain/types.js'
import { makeAddress } from '../domain/types.js'
import type { ReferenceSpec, ResourceDefinition } from './base.js'
import { decodeFields, NAME_PATTERN, stringField, stringListField } from './base.js'
import { datasetDefinition } from './dataset.js'
import { managedFolderDefinition } from './managed-folder.js'
import { recipeDefinition } from './recipe.js'
import { scenarioDefinition } from './scenario.js'
import { variablesDefinition } from './variables.js'
import { zoneDefinition } from './zone.js'

export type { FieldSpec, FieldSpecs, ReferenceSpec, ResourceDefinition } from './base.js'

export const RESOURCE_DEFINITIONS: readonly ResourceDefinition[] = [
  variablesDefinition,
  zoneDefinition,
  managedFolderDefinition,
  datasetDefinition,
  recipeDefinition,
  scenarioDefinition
]

export const RESOURCE_SECTIONS: readonly string[] = RESOURCE_DEFINITIONS.map(d => d.section)

export function getDefinition(type: string): ResourceDefinition | undefined {
  return RESOURCE_DEFINITIONS.find(d => d.type === type)
}

/**
 * Build a registry holding one handler per known resource type, with each
 * type's comparison rules.
 */
export function createResourceRegistry(
  handlerFor: (definition: ResourceDefinition) => ResourceHandler
): ResourceTypeRegistry {
  const registry = new ResourceTypeRegistry()
  for (const definition of RESOURCE_DEFINITIONS) {
    registry.register(definition.type, handlerFor(definition), { compare: definition.compare })
  }
  return registry
}

// ============================================================================
// Decoding
// ============================================================================

export interface DecodeOptions {
  /** Base directory for `code_file` paths and conventional code files */
  configDir?: string
}

interface PendingResource {
  definition: ResourceDefinition
  name: string
  attributes: Attributes
  dependsOn: string[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function sectionEntries(
  definition: ResourceDefinition,
  value: unknown,
  issues: ConfigIssue[]
): Array<{ entry: Record<string, unknown>; at: string }> {
  if (value === undefined || value === null) return []

  if (definition.singleton) {
    if (!isRecord(value)) {
      issues.push({ path: definition.section, message: 'must be a mapping' })
      return []
    }
    return [{ entry: { ...value }, at: definition.section }]
  }

  if (!Array.isArray(value)) {
    issues.push({ path: definition.section, message: 'must be a list' })
    return []
  }
  const entries: Array<{ entry: Record<string, unknown>; at: string }> = []
  value.forEach((item: unknown, index) => {
    const at = `${definition.section}[${index}]`
    if (isRecord(item)) entries.push({ entry: { ...item }, at })
    else issues.push({ path: at, message: 'must be a mapping' })
  })
  return entries
}

/**
 * Fill `code` from `code_file`, or from the conventional
 * `<dir>/<name><ext>` file when neither is set.
 */
function resolveCode(
  definition: ResourceDefinition,
  name: string,
  attributes: Attributes,
  local: Attributes,
  at: string,
  issues: ConfigIssue[],
  configDir: string | undefined
): void {
  const kind = stringField(attributes, 'type')
  const ext = definition.code && kind ? definition.code.extensions[kind] : undefined
  if (!definition.code || !ext) return

  const code = stringField(attributes, 'code')
  const codeFile = stringField(local, 'code_file')

  if (code && codeFile) {
    issues.push({ path: at, message: "cannot set both 'code' and 'code_file'" })
    return
  }

  if (codeFile) {
    const filePath = path.resolve(configDir ?? process.cwd(), codeFile)
    if (!fs.existsSync(filePath)) {
      issues.push({ path: `${at}.code_file`, message: `file not found: ${filePath}` })
      return
    }
    attributes.code = fs.readFileSync(filePath, 'utf-8')
    return
  }

  if (!code && configDir) {
    const conventional = path.join(configDir, definition.code.conventionalDir, `${name}${ext}`)
    if (fs.existsSync(conventional)) {
      attributes.code = fs.readFileSync(conventional, 'utf-8')
    }
  }
}

function resolveReference(ref: ReferenceSpec, declared: Set<string>): string {
  if (ref.value.includes('.')) return ref.value
  for (const type of ref.types) {
    const candidate = makeAddress(type, ref.value)
    if (declared.has(candidate)) return candidate
  }
  return makeAddress(ref.types[0], ref.value)
}

/**
 * Decode every resource section of `document`. Problems are appended to
 * `issues`; entries with problems are left out of the result.
 */
export function decodeResources(
  document: Record<string, unknown>,
  issues: ConfigIssue[],
  options: DecodeOptions = {}
): Resource[] {
  const pending: PendingResource[] = []

  for (const definition of RESOURCE_DEFINITIONS) {
    for (const { entry, at } of sectionEntries(definition, document[definition.section], issues)) {
      const before = issues.length
      const specs = definition.fields(entry, at, issues)
      if (!specs) continue

      const { attributes, local } = decodeFields(entry, specs, at, issues)
      const name = stringField(local, 'name')
      if (name !== null && !NAME_PATTERN.test(name)) {
        issues.push({ path: `${at}.name`, message: 'must contain only letters, digits and underscores' })
      }
      if (name === null || issues.length > before) continue

      resolveCode(definition, name, attributes, local, at, issues, options.configDir)
      pending.push({ definition, name, attributes, dependsOn: stringListField(local, 'depends_on') })
    }
  }

  const declared = new Set(pending.map(p => makeAddress(p.definition.type, p.name)))

  return pending.map(({ definition, name, attributes, dependsOn }): Resource => ({
    address: makeAddress(definition.type, name),
    type: definition.type,
    name,
    attributes,
    dependsOn,
    references: [...new Set(definition.references(attributes).map(ref => resolveReference(ref, declared)))],
    priority: definition.priority
  }))
}
