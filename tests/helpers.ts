/**
 * Shared builders for engine tests
 */

import { createLogger } from '../src/lib/logger.js'
import { computeAttributesHash, computeStateDigest, createEmptyState } from '../src/lib/state-store.js'
import type {
  Attributes,
  HandlerContext,
  Resource,
  ResourceInstance,
  State
} from '../src/domain/types.js'

const DEFAULT_PRIORITIES: Record<string, number> = {
  variables: 0,
  scenario: 200
}

export function resource(
  type: string,
  name: string,
  attributes: Attributes = {},
  options: { dependsOn?: string[]; references?: string[]; priority?: number } = {}
): Resource {
  return {
    address: `${type}.${name}`,
    type,
    name,
    attributes,
    dependsOn: options.dependsOn ?? [],
    references: options.references ?? [],
    priority: options.priority ?? DEFAULT_PRIORITIES[type] ?? 100
  }
}

export function instance(
  type: string,
  name: string,
  attributes: Attributes = {},
  options: { dependencies?: string[]; priority?: number } = {}
): ResourceInstance {
  return {
    address: `${type}.${name}`,
    type,
    name,
    priority: options.priority ?? DEFAULT_PRIORITIES[type] ?? 100,
    dependencies: options.dependencies ?? [],
    attributes,
    attributesHash: computeAttributesHash(attributes),
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z'
  }
}

export function stateWith(instances: ResourceInstance[], project: string = 'proj'): State {
  const state = createEmptyState(project, 'lineage-1', 3)
  for (const item of instances) {
    state.resources[item.address] = item
  }
  state.digest = computeStateDigest(state.resources)
  return state
}

export function testContext(project: string = 'proj'): HandlerContext {
  return {
    project,
    variables: { projectKey: project },
    logger: createLogger({ test: true })
  }
}
