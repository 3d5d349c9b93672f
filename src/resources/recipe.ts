/**
 * Recipes: transformations from input datasets or folders to outputs.
 * Inputs, outputs and zone are implicit references.
 */

import type { FieldSpecs, ResourceDefinition, ReferenceSpec } from './base.js'
import {
  COMMON_COMPARE,
  COMMON_FIELDS,
  resolveDiscriminator,
  stringField,
  stringListField
} from './base.js'

const RECIPE_TYPES: Record<string, string> = {
  sync: 'sync',
  python: 'python',
  sql_query: 'sql_query'
}

const CODE_FIELDS: FieldSpecs = {
  code: { kind: 'string', default: '' },
  code_file: { kind: 'string', local: true }
}

const KIND_FIELDS: Record<string, FieldSpecs> = {
  sync: {},
  python: { ...CODE_FIELDS, code_env: { kind: 'string' } },
  sql_query: { ...CODE_FIELDS }
}

/** Datasets are preferred over managed folders when a name matches both */
const FLOW_ITEM_TYPES = ['dataset', 'managed_folder']

export const recipeDefinition: ResourceDefinition = {
  type: 'recipe',
  section: 'recipes',
  priority: 100,
  compare: { ...COMMON_COMPARE },
  code: {
    extensions: { python: '.py', sql_query: '.sql' },
    conventionalDir: 'recipes'
  },
  fields: (entry, at, issues) => {
    const kind = resolveDiscriminator(entry, RECIPE_TYPES, at, issues)
    if (kind === null) return null
    return {
      ...COMMON_FIELDS,
      type: { kind: 'string', required: true },
      inputs: { kind: 'string-list', default: [], coerceList: true },
      outputs: { kind: 'string-list', default: [], coerceList: true },
      zone: { kind: 'string' },
      ...KIND_FIELDS[kind]
    }
  },
  references: (attributes) => {
    const refs: ReferenceSpec[] = [
      ...stringListField(attributes, 'inputs'),
      ...stringListField(attributes, 'outputs')
    ].map(value => ({ value, types: FLOW_ITEM_TYPES }))
    const zone = stringField(attributes, 'zone')
    if (zone) refs.push({ value: zone, types: ['zone'] })
    return refs
  }
}
