/**
 * Flow zone: partitions the flow into logical sections (raw, curated, ...).
 */

import type { ResourceDefinition } from './base.js'
import { COMMON_COMPARE, COMMON_FIELDS } from './base.js'

export const zoneDefinition: ResourceDefinition = {
  type: 'zone',
  section: 'zones',
  priority: 100,
  compare: { ...COMMON_COMPARE },
  fields: () => ({
    ...COMMON_FIELDS,
    color: { kind: 'string', default: '#2ab1ac' }
  }),
  references: () => []
}
