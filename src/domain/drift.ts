/**
 * Flowform Drift Detection
 *
 * Re-reads every tracked resource and reports where the live system diverges
 * from the last applied snapshot. Desired configuration is not consulted.
 */

import { computeAttributesHash } from '../lib/state-store.js'
import { deepEqual, diffSnapshots } from './compare.js'
import type { ResourceTypeRegistry } from './registry.js'
import type { HandlerContext, ResourceChange, ResourceInstance, State } from './types.js'

export interface DetectDriftOptions {
  state: State
  registry: ResourceTypeRegistry
  context: HandlerContext
}

export interface DriftResult {
  /** `update` for drifted resources, `delete` for ones gone remotely */
  changes: ResourceChange[]
  /** State with live attributes applied; not persisted */
  state: State
}

/**
 * Read every tracked address through its handler. The input state is left
 * untouched; the caller decides whether to persist the returned state.
 */
export async function detectDrift(options: DetectDriftOptions): Promise<DriftResult> {
  const { state, registry, context } = options
  const resources: Record<string, ResourceInstance> = { ...state.resources }
  const changes: ResourceChange[] = []

  for (const address of Object.keys(state.resources).sort()) {
    const instance = state.resources[address]
    const handler = registry.handlerFor(instance.type)
    const live = await handler.read(instance, context)

    if (live === null) {
      delete resources[address]
      changes.push({
        address,
        type: instance.type,
        action: 'delete',
        before: instance.attributes,
        after: null
      })
      continue
    }

    if (!deepEqual(instance.attributes, live)) {
      resources[address] = {
        ...instance,
        attributes: live,
        attributesHash: computeAttributesHash(live),
        updatedAt: new Date().toISOString()
      }
      changes.push({
        address,
        type: instance.type,
        action: 'update',
        before: instance.attributes,
        after: live,
        diff: diffSnapshots(instance.attributes, live)
      })
    }
  }

  if (changes.length > 0) {
    context.logger.info('Drift detected', {
      drifted: changes.filter(c => c.action === 'update').length,
      missing: changes.filter(c => c.action === 'delete').length
    })
  }

  return { changes, state: { ...state, resources } }
}
