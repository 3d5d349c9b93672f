/**
 * Flowform Plan Execution Engine
 *
 * Executes a Plan one change at a time through the type handlers, persisting
 * state after every completed change. Stops at the first failure; nothing
 * already applied is rolled back.
 */

import { ApplyCanceledError, ApplyError } from '../lib/errors.js'
import { computeAttributesHash, computeStateDigest } from '../lib/state-store.js'
import { assertPlanFresh, computeConfigDigest, ENGINE_VERSION, planDestroy, PLAN_VERSION } from './plan.js'
import type { ResourceTypeRegistry } from './registry.js'
import type {
  ApplyResult,
  Attributes,
  HandlerContext,
  Plan,
  ProgressCallback,
  ProgressPhase,
  Resource,
  ResourceChange,
  ResourceInstance,
  State
} from './types.js'
import { emptyApplyResult, resourceDependencies } from './types.js'

// ============================================================================
// Types
// ============================================================================

export interface ExecutePlanOptions {
  plan: Plan
  /** Live state the plan is verified and applied against */
  state: State
  registry: ResourceTypeRegistry
  context: HandlerContext
  /** Durably write a state and return the record as written */
  persist: (state: State) => State | Promise<State>
  onProgress?: ProgressCallback
  /** Checked between changes, never mid-change */
  signal?: AbortSignal
}

// ============================================================================
// Plan Execution
// ============================================================================

/**
 * Execute a plan: run each change in recorded order.
 *
 * - 'create' → handler.create, state entry added
 * - 'update' → handler.update, state entry replaced
 * - 'delete' → handler.delete, state entry removed
 * - 'no-op'  → no handler call; recorded dependencies are refreshed when
 *               they changed
 *
 * The caller holds the state lock for the whole run.
 *
 * @throws StalePlanError before any change when the state moved since planning
 * @throws ApplyError carrying the partial result when a handler fails or a
 *   completed change cannot be persisted
 * @throws ApplyCanceledError carrying the partial result when `signal` aborts
 */
export async function executePlan(options: ExecutePlanOptions): Promise<ApplyResult> {
  const { plan, registry, context, persist, onProgress, signal } = options
  const log = context.logger

  assertPlanFresh(plan, options.state)

  const notify = (change: ResourceChange, phase: ProgressPhase): void => {
    if (!onProgress) return
    try {
      onProgress(change, phase)
    } catch (err) {
      log.warn('Progress callback failed', {
        address: change.address,
        phase,
        error: errorMessage(err)
      })
    }
  }

  const result = emptyApplyResult()
  let state = options.state

  const fail = (change: ResourceChange, reason: string, cause: unknown): ApplyError => {
    result.failed = change
    result.failedAddress = change.address
    result.error = reason
    notify(change, 'failed')
    log.error('Change failed', { address: change.address, action: change.action, error: reason })
    return new ApplyError(result, change.address, cause)
  }

  const record = async (change: ResourceChange, next: State): Promise<State> => {
    try {
      return await persist(next)
    } catch (err) {
      const reason = change.action === 'no-op'
        ? `state for ${change.address} could not be recorded: ${errorMessage(err)}`
        : `${change.action} of ${change.address} reached the remote system but was not recorded in state: ${errorMessage(err)}`
      throw fail(change, reason, new Error(reason, { cause: err }))
    }
  }

  for (const change of plan.changes) {
    if (change.action === 'no-op') {
      // Attributes match, but the recorded edges may be out of date
      const synced = syncRecordedInstance(change, state)
      if (synced) {
        state = await record(change, synced)
        log.debug('Recorded dependencies updated', { address: change.address })
      }
      continue
    }

    if (signal?.aborted) {
      result.canceled = true
      log.warn('Apply canceled', { completed: result.completed.length, next: change.address })
      throw new ApplyCanceledError(result)
    }

    notify(change, 'start')
    let next: State
    try {
      next = await runChange(change, state, registry, context)
    } catch (err) {
      throw fail(change, errorMessage(err), err)
    }

    state = await record(change, next)
    result.completed.push(change)
    log.info('Change applied', { address: change.address, action: change.action, serial: state.serial })
    notify(change, 'done')
  }

  return result
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ============================================================================
// Individual Change Application
// ============================================================================

function toInstance(
  resource: Resource,
  attributes: Attributes,
  createdAt: string,
  updatedAt: string
): ResourceInstance {
  return {
    address: resource.address,
    type: resource.type,
    name: resource.name,
    priority: resource.priority,
    dependencies: resourceDependencies(resource),
    attributes,
    attributesHash: computeAttributesHash(attributes),
    createdAt,
    updatedAt
  }
}

/**
 * Run one change through its handler and return the state reflecting it.
 * The input state is not modified.
 */
async function runChange(
  change: ResourceChange,
  state: State,
  registry: ResourceTypeRegistry,
  context: HandlerContext
): Promise<State> {
  const handler = registry.handlerFor(change.type)
  const prior = state.resources[change.address]
  const now = new Date().toISOString()

  switch (change.action) {
    case 'create': {
      const resource = requireResource(change)
      const attributes = await handler.create(resource, context)
      return withInstance(state, toInstance(resource, attributes, now, now))
    }
    case 'update': {
      const resource = requireResource(change)
      if (!prior) {
        throw new Error(`${change.address} is not tracked in state`)
      }
      const attributes = await handler.update(resource, prior, context)
      return withInstance(state, toInstance(resource, attributes, prior.createdAt, now))
    }
    case 'delete': {
      if (!prior) {
        throw new Error(`${change.address} is not tracked in state`)
      }
      await handler.delete(prior, context)
      const resources = { ...state.resources }
      delete resources[change.address]
      return { ...state, resources }
    }
    default:
      return state
  }
}

function sameMembers(a: string[], b: string[]): boolean {
  if (a.length !== b.length) return false
  const set = new Set(a)
  return b.every(item => set.has(item))
}

/**
 * State with the recorded dependencies and priority of a no-op entry brought
 * in line with the desired resource, or null when they already match.
 */
function syncRecordedInstance(change: ResourceChange, state: State): State | null {
  const prior = state.resources[change.address]
  const resource = change.resource
  if (!prior || !resource) return null

  const dependencies = resourceDependencies(resource)
  if (sameMembers(dependencies, prior.dependencies) && prior.priority === resource.priority) {
    return null
  }
  return withInstance(state, { ...prior, dependencies, priority: resource.priority })
}

function requireResource(change: ResourceChange): Resource {
  if (!change.resource) {
    throw new Error(`${change.action} of ${change.address} carries no desired resource`)
  }
  return change.resource
}

function withInstance(state: State, instance: ResourceInstance): State {
  return { ...state, resources: { ...state.resources, [instance.address]: instance } }
}

// ============================================================================
// Destroy
// ============================================================================

/**
 * Synthesize a plan deleting every address in state, dependents first.
 */
export function buildDestroyPlan(state: State, registry: ResourceTypeRegistry, project: string): Plan {
  return {
    version: PLAN_VERSION,
    metadata: {
      project,
      createdAt: new Date().toISOString(),
      destroy: true,
      refresh: false,
      stateLineage: state.lineage,
      stateSerial: state.serial,
      stateDigest: computeStateDigest(state.resources),
      configDigest: computeConfigDigest([]),
      engineVersion: ENGINE_VERSION
    },
    changes: planDestroy(state, registry)
  }
}
