/**
 * Scenarios: scheduled automation, applied after every flow object.
 */

import type { FieldSpecs, ResourceDefinition } from './base.js'
import { COMMON_COMPARE, COMMON_FIELDS, resolveDiscriminator } from './base.js'

const SCENARIO_TYPES: Record<string, string> = {
  step_based: 'step_based',
  python: 'custom_python'
}

const KIND_FIELDS: Record<string, FieldSpecs> = {
  step_based: {
    steps: { kind: 'map-list', default: [] }
  },
  custom_python: {
    code: { kind: 'string', default: '' },
    code_file: { kind: 'string', local: true }
  }
}

export const scenarioDefinition: ResourceDefinition = {
  type: 'scenario',
  section: 'scenarios',
  priority: 200,
  compare: { ...COMMON_COMPARE },
  code: {
    extensions: { custom_python: '.py' },
    conventionalDir: 'scenarios'
  },
  fields: (entry, at, issues) => {
    const kind = resolveDiscriminator(entry, SCENARIO_TYPES, at, issues)
    if (kind === null) return null
    return {
      ...COMMON_FIELDS,
      type: { kind: 'string', required: true },
      active: { kind: 'boolean', default: true },
      triggers: { kind: 'map-list', default: [] },
      ...KIND_FIELDS[kind]
    }
  },
  references: () => []
}
