/**
 * Project variables: one instance per project, holding a `standard` scope
 * shared by every instance and a `local` scope of per-instance overrides.
 */

import type { ResourceDefinition } from './base.js'
import { COMMON_COMPARE, COMMON_FIELDS } from './base.js'

export const VARIABLES_NAME = 'variables'

export const variablesDefinition: ResourceDefinition = {
  type: 'variables',
  section: 'variables',
  priority: 0,
  singleton: true,
  compare: { ...COMMON_COMPARE },
  fields: (entry, at, issues) => {
    if (entry.name === undefined) {
      entry.name = VARIABLES_NAME
    } else if (entry.name !== VARIABLES_NAME) {
      issues.push({ path: `${at}.name`, message: `must be "${VARIABLES_NAME}"` })
      return null
    }
    return {
      ...COMMON_FIELDS,
      standard: { kind: 'map', default: {} },
      local: { kind: 'map', default: {} }
    }
  },
  references: () => []
}
