/**
 * Datasets. The YAML `type` picks the storage kind; each kind adds the
 * connection fields it needs.
 */

import type { FieldSpecs, ResourceDefinition } from './base.js'
import { COMMON_COMPARE, COMMON_FIELDS, resolveDiscriminator, stringField } from './base.js'

const DATASET_TYPES: Record<string, string> = {
  snowflake: 'Snowflake',
  oracle: 'Oracle',
  filesystem: 'Filesystem',
  upload: 'UploadedFiles'
}

const WRITE_MODES = ['OVERWRITE', 'APPEND', 'TRUNCATE'] as const

const BASE_FIELDS: FieldSpecs = {
  ...COMMON_FIELDS,
  type: { kind: 'string', required: true },
  connection: { kind: 'string' },
  managed: { kind: 'boolean', default: false },
  format_type: { kind: 'string' },
  format_params: { kind: 'map', default: {} },
  columns: { kind: 'map-list', default: [] },
  zone: { kind: 'string' }
}

const KIND_FIELDS: Record<string, FieldSpecs> = {
  Snowflake: {
    connection: { kind: 'string', required: true },
    schema_name: { kind: 'string', required: true },
    table: { kind: 'string', required: true },
    catalog: { kind: 'string' },
    write_mode: { kind: 'string', oneOf: WRITE_MODES, default: 'OVERWRITE' }
  },
  Oracle: {
    connection: { kind: 'string', required: true },
    schema_name: { kind: 'string', required: true },
    table: { kind: 'string', required: true }
  },
  Filesystem: {
    connection: { kind: 'string', required: true },
    path: { kind: 'string', required: true }
  },
  UploadedFiles: {
    managed: { kind: 'boolean', default: true }
  }
}

export const datasetDefinition: ResourceDefinition = {
  type: 'dataset',
  section: 'datasets',
  priority: 100,
  compare: { ...COMMON_COMPARE, format_params: 'partial' },
  fields: (entry, at, issues) => {
    const kind = resolveDiscriminator(entry, DATASET_TYPES, at, issues)
    if (kind === null) return null
    return { ...BASE_FIELDS, ...KIND_FIELDS[kind] }
  },
  references: (attributes) => {
    const zone = stringField(attributes, 'zone')
    return zone ? [{ value: zone, types: ['zone'] }] : []
  }
}
