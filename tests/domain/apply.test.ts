import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { buildDestroyPlan, executePlan } from '../../src/domain/apply.js'
import { computePlan } from '../../src/domain/plan.js'
import { createMemoryRegistry, MemoryBackend } from '../../src/handlers/memory.js'
import { ApplyCanceledError, ApplyError, StalePlanError } from '../../src/lib/errors.js'
import { StateStore } from '../../src/lib/state-store.js'
import type { ResourceTypeRegistry } from '../../src/domain/registry.js'
import type { ApplyResult, Plan, ProgressCallback, ProgressPhase, Resource, State } from '../../src/domain/types.js'
import { resource, testContext } from '../helpers.js'

let tmpDir: string
let store: StateStore
let backend: MemoryBackend
let registry: ResourceTypeRegistry

const context = testContext()

const desired: Resource[] = [
  resource('dataset', 'A', { type: 'Filesystem', path: '/data/${projectKey}' }),
  resource('recipe', 'B', { type: 'sync', inputs: ['A'] }, { references: ['dataset.A'] })
]

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowform-apply-test-'))
  store = new StateStore(path.join(tmpDir, 'state.json'))
  backend = new MemoryBackend()
  registry = createMemoryRegistry(backend)
})

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true })
})

function planFor(resources: Resource[], state: State): Promise<Plan> {
  return computePlan({ resources, state, registry, context })
}

function run(plan: Plan, state: State, extra: { onProgress?: ProgressCallback; signal?: AbortSignal } = {}): Promise<ApplyResult> {
  return executePlan({
    plan,
    state,
    registry,
    context,
    persist: (next) => store.save(next),
    ...extra
  })
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected a rejection')
}

// ============================================================================
// executePlan
// ============================================================================

describe('executePlan', () => {
  it('applies creates in order and persists after each change', async () => {
    const state = store.load('proj')
    const plan = await planFor(desired, state)

    const result = await run(plan, state)

    expect(result.completed.map(c => c.address)).toEqual(['dataset.A', 'recipe.B'])
    expect(result.failed).toBeNull()
    expect(result.canceled).toBe(false)
    expect(backend.callsFor('create')).toEqual(['dataset.A', 'recipe.B'])

    const saved = store.load('proj')
    expect(saved.serial).toBe(2)
    expect(saved.lineage).toBe(state.lineage)
    expect(Object.keys(saved.resources)).toEqual(['dataset.A', 'recipe.B'])
    expect(saved.resources['dataset.A'].attributes).toEqual({ type: 'Filesystem', path: '/data/proj' })
    expect(saved.resources['recipe.B'].dependencies).toEqual(['dataset.A'])
    expect(saved.resources['recipe.B'].priority).toBe(100)
  })

  it('converges: planning again after apply yields only no-ops', async () => {
    const state = store.load('proj')
    await run(await planFor(desired, state), state)

    const again = await planFor(desired, store.load('proj'))
    expect(again.changes.map(c => c.action)).toEqual(['no-op', 'no-op'])
  })

  it('stops at the first failure and keeps completed work', async () => {
    backend.failOn('recipe.B', 'create', 'quota exceeded')
    const state = store.load('proj')
    const plan = await planFor(desired, state)

    const err = await captureError(run(plan, state))

    expect(err).toBeInstanceOf(ApplyError)
    if (!(err instanceof ApplyError)) return
    expect(err.address).toBe('recipe.B')
    expect(err.result.completed.map(c => c.address)).toEqual(['dataset.A'])
    expect(err.result.failedAddress).toBe('recipe.B')
    expect(err.result.failed?.address).toBe('recipe.B')
    expect(err.result.error).toBe('quota exceeded')
    expect(err.cause).toBeInstanceOf(Error)

    const saved = store.load('proj')
    expect(Object.keys(saved.resources)).toEqual(['dataset.A'])

    backend.clearFailures()
    const retry = await planFor(desired, saved)
    expect(retry.changes.map(c => [c.action, c.address])).toEqual([
      ['no-op', 'dataset.A'],
      ['create', 'recipe.B']
    ])
  })

  it('does not run changes after the failed one', async () => {
    backend.failOn('dataset.A', 'create')
    const state = store.load('proj')
    const plan = await planFor(desired, state)

    await expect(run(plan, state)).rejects.toBeInstanceOf(ApplyError)
    expect(backend.callsFor('create')).toEqual(['dataset.A'])
    expect(store.exists()).toBe(false)
  })

  it('reports progress around each change', async () => {
    backend.failOn('recipe.B', 'create')
    const events: Array<[string, ProgressPhase]> = []
    const state = store.load('proj')
    const plan = await planFor(desired, state)

    await expect(run(plan, state, { onProgress: (change, phase) => events.push([change.address, phase]) }))
      .rejects.toBeInstanceOf(ApplyError)

    expect(events).toEqual([
      ['dataset.A', 'start'],
      ['dataset.A', 'done'],
      ['recipe.B', 'start'],
      ['recipe.B', 'failed']
    ])
  })

  it('ignores errors thrown by the progress callback', async () => {
    const state = store.load('proj')
    const plan = await planFor(desired, state)

    const result = await run(plan, state, {
      onProgress: () => {
        throw new Error('display broke')
      }
    })
    expect(result.completed).toHaveLength(2)
  })

  it('skips no-op changes without events or handler calls', async () => {
    const state = store.load('proj')
    await run(await planFor(desired, state), state)
    const current = store.load('proj')
    const plan = await planFor(desired, current)
    const events: string[] = []

    const result = await run(plan, current, { onProgress: (change) => events.push(change.address) })

    expect(result.completed).toEqual([])
    expect(events).toEqual([])
    expect(backend.calls).toHaveLength(2)
    expect(store.load('proj').serial).toBe(2)
  })

  it('refuses a stale plan before calling any handler', async () => {
    const state = store.load('proj')
    const plan = await planFor(desired, state)
    store.save(state)

    await expect(run(plan, store.load('proj'))).rejects.toBeInstanceOf(StalePlanError)
    expect(backend.calls).toEqual([])
  })

  it('stops between changes when canceled', async () => {
    const controller = new AbortController()
    const state = store.load('proj')
    const plan = await planFor(desired, state)

    const err = await captureError(run(plan, state, {
      signal: controller.signal,
      onProgress: (_change, phase) => {
        if (phase === 'done') controller.abort()
      }
    }))

    expect(err).toBeInstanceOf(ApplyCanceledError)
    if (!(err instanceof ApplyCanceledError)) return
    expect(err.result.canceled).toBe(true)
    expect(err.result.completed.map(c => c.address)).toEqual(['dataset.A'])
    expect(err.result.failed).toBeNull()
    expect(backend.addresses()).toEqual(['dataset.A'])
    expect(Object.keys(store.load('proj').resources)).toEqual(['dataset.A'])
  })

  it('applies updates and deletes', async () => {
    const state = store.load('proj')
    await run(await planFor(desired, state), state)

    const next = [
      resource('dataset', 'A', { type: 'Filesystem', path: '/data/v2' })
    ]
    const current = store.load('proj')
    const plan = await planFor(next, current)
    expect(plan.changes.map(c => [c.action, c.address])).toEqual([
      ['update', 'dataset.A'],
      ['delete', 'recipe.B']
    ])

    const result = await run(plan, current)

    expect(result.completed.map(c => c.action)).toEqual(['update', 'delete'])
    const saved = store.load('proj')
    expect(Object.keys(saved.resources)).toEqual(['dataset.A'])
    expect(saved.resources['dataset.A'].attributes.path).toBe('/data/v2')
    expect(saved.resources['dataset.A'].createdAt).toBe(current.resources['dataset.A'].createdAt)
    expect(backend.has('recipe.B')).toBe(false)
  })
})

describe('executePlan state recording', () => {
  it('reports the partial result when a completed change cannot be persisted', async () => {
    const state = store.load('proj')
    const plan = await planFor(desired, state)

    const err = await captureError(executePlan({
      plan,
      state,
      registry,
      context,
      persist: () => { throw new Error('ENOSPC: no space left on device') }
    }))

    expect(err).toBeInstanceOf(ApplyError)
    const result = err instanceof ApplyError ? err.result : null
    expect(result?.completed).toEqual([])
    expect(result?.failedAddress).toBe('dataset.A')
    expect(result?.error).toBe(
      'create of dataset.A reached the remote system but was not recorded in state: ENOSPC: no space left on device'
    )
    expect(backend.has('dataset.A')).toBe(true)
    expect(backend.has('recipe.B')).toBe(false)
  })

  it('records changed dependencies of unchanged resources without calling the handler', async () => {
    const initial = store.load('proj')
    await run(await planFor(desired, initial), initial)
    const applied = store.load('proj')
    const callsBefore = backend.calls.length

    const rewired = [desired[0], { ...desired[1], dependsOn: ['zone.z'] }, resource('zone', 'z')]
    const plan = await planFor(rewired, applied)
    expect(plan.changes.find(c => c.address === 'recipe.B')?.action).toBe('no-op')

    const result = await run(plan, applied)

    expect(result.completed.map(c => c.address)).toEqual(['zone.z'])
    expect(backend.callsFor('update')).toEqual([])
    expect(backend.calls.slice(callsBefore)).toEqual([{ action: 'create', address: 'zone.z' }])
    expect(store.load('proj').resources['recipe.B'].dependencies).toEqual(['zone.z', 'dataset.A'])
  })
})

// ============================================================================
// buildDestroyPlan
// ============================================================================

describe('buildDestroyPlan', () => {
  it('deletes everything in reverse dependency order', async () => {
    const state = store.load('proj')
    await run(await planFor(desired, state), state)
    const current = store.load('proj')

    const plan = buildDestroyPlan(current, registry, 'proj')
    expect(plan.metadata.destroy).toBe(true)
    expect(plan.changes.map(c => [c.action, c.address])).toEqual([
      ['delete', 'recipe.B'],
      ['delete', 'dataset.A']
    ])

    await run(plan, current)
    expect(store.load('proj').resources).toEqual({})
    expect(backend.addresses()).toEqual([])
  })

  it('leaves the remaining resources tracked when a delete fails', async () => {
    const state = store.load('proj')
    await run(await planFor(desired, state), state)
    const current = store.load('proj')
    backend.failOn('dataset.A', 'delete')

    await expect(run(buildDestroyPlan(current, registry, 'proj'), current)).rejects.toBeInstanceOf(ApplyError)
    expect(Object.keys(store.load('proj').resources)).toEqual(['dataset.A'])
  })
})
