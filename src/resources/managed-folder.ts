/**
 * Managed folders: unstructured storage inside the project.
 */

import type { FieldSpecs, ResourceDefinition } from './base.js'
import { COMMON_COMPARE, COMMON_FIELDS, resolveDiscriminator, stringField } from './base.js'

const FOLDER_TYPES: Record<string, string> = {
  filesystem: 'Filesystem',
  upload: 'UploadedFiles'
}

const KIND_FIELDS: Record<string, FieldSpecs> = {
  Filesystem: {
    connection: { kind: 'string', required: true },
    path: { kind: 'string', required: true }
  },
  UploadedFiles: {}
}

export const managedFolderDefinition: ResourceDefinition = {
  type: 'managed_folder',
  section: 'managed_folders',
  priority: 100,
  compare: { ...COMMON_COMPARE },
  fields: (entry, at, issues) => {
    const kind = resolveDiscriminator(entry, FOLDER_TYPES, at, issues)
    if (kind === null) return null
    return {
      ...COMMON_FIELDS,
      type: { kind: 'string', required: true },
      connection: { kind: 'string' },
      zone: { kind: 'string' },
      ...KIND_FIELDS[kind]
    }
  },
  references: (attributes) => {
    const zone = stringField(attributes, 'zone')
    return zone ? [{ value: zone, types: ['zone'] }] : []
  }
}
