import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { Engine } from '../../src/domain/engine.js'
import { ResourceTypeRegistry } from '../../src/domain/registry.js'
import { createMemoryRegistry, MemoryBackend } from '../../src/handlers/memory.js'
import {
  ApplyError,
  DependencyCycleError,
  StalePlanError,
  StateLockError,
  StateProjectMismatchError
} from '../../src/lib/errors.js'
import { StateStore } from '../../src/lib/state-store.js'
import type { Resource, ResourceHandler } from '../../src/domain/types.js'
import { resource } from '../helpers.js'

let tmpDir: string
let statePath: string
let backend: MemoryBackend

const desired: Resource[] = [
  resource('dataset', 'A', { type: 'Filesystem', path: '/a' }),
  resource('recipe', 'B', { type: 'sync', inputs: ['A'] }, { references: ['dataset.A'] })
]

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowform-engine-test-'))
  statePath = path.join(tmpDir, 'state.json')
  backend = new MemoryBackend()
})

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true })
})

function engine(project: string = 'proj', registry: ResourceTypeRegistry = createMemoryRegistry(backend)): Engine {
  return new Engine({ project, statePath, registry })
}

describe('Engine', () => {
  it('plans and applies against a fresh state file', async () => {
    const e = engine()
    const plan = await e.plan(desired)
    expect(fs.existsSync(statePath)).toBe(false)

    const result = await e.apply(plan)

    expect(result.completed.map(c => c.address)).toEqual(['dataset.A', 'recipe.B'])
    const state = e.loadState()
    expect(state.lineage).toBe(plan.metadata.stateLineage)
    expect(state.serial).toBe(2)
  })

  it('refreshes before planning so out-of-band changes are not overwritten silently', async () => {
    const e = engine()
    await e.apply(await e.plan(desired))
    backend.mutate('dataset.A', { path: '/edited-by-hand' })

    const plan = await e.plan(desired)

    expect(plan.metadata.refresh).toBe(true)
    expect(plan.changes.map(c => [c.action, c.address])).toEqual([
      ['update', 'dataset.A'],
      ['no-op', 'recipe.B']
    ])
    expect(plan.changes[0].diff).toEqual({ path: { from: '/edited-by-hand', to: '/a' } })
    // Refreshed state was persisted and the plan points at it
    expect(e.loadState().serial).toBe(3)
    expect(plan.metadata.stateSerial).toBe(3)

    await e.apply(plan)
    expect(backend.get('dataset.A')?.path).toBe('/a')
  })

  it('recreates resources deleted out of band', async () => {
    const e = engine()
    await e.apply(await e.plan(desired))
    backend.remove('recipe.B')

    const plan = await e.plan(desired)
    expect(plan.changes.map(c => [c.action, c.address])).toEqual([
      ['no-op', 'dataset.A'],
      ['create', 'recipe.B']
    ])
  })

  it('skips reads when refresh is off', async () => {
    const e = engine()
    await e.apply(await e.plan(desired, { refresh: false }))
    await e.plan(desired, { refresh: false })
    expect(backend.callsFor('read')).toEqual([])
  })

  it('leaves the state file untouched when the desired set has a cycle', async () => {
    const e = engine()
    await e.apply(await e.plan(desired))
    const before = fs.readFileSync(statePath, 'utf-8')

    const cyclic = [
      resource('zone', 'x', {}, { dependsOn: ['zone.y'] }),
      resource('zone', 'y', {}, { dependsOn: ['zone.x'] })
    ]
    await expect(e.plan(cyclic)).rejects.toBeInstanceOf(DependencyCycleError)
    expect(fs.readFileSync(statePath, 'utf-8')).toBe(before)
  })

  it('refuses a state file of another project', async () => {
    await engine('other').apply(await engine('other').plan(desired))

    const e = engine('proj')
    expect(() => e.loadState()).toThrow(StateProjectMismatchError)
    await expect(e.plan(desired)).rejects.toBeInstanceOf(StateProjectMismatchError)
  })

  it('refuses a plan made for another project', async () => {
    const plan = await engine('other').plan(desired)
    await expect(engine('proj').apply(plan)).rejects.toBeInstanceOf(StateProjectMismatchError)
  })

  it('fails a concurrent apply fast with a lock error', async () => {
    let markStarted: () => void = () => undefined
    let release: () => void = () => undefined
    const started = new Promise<void>(resolve => { markStarted = resolve })
    const gate = new Promise<void>(resolve => { release = resolve })

    const inner = backend.handler()
    const gated: ResourceHandler = {
      ...inner,
      create: async (r, ctx) => {
        markStarted()
        await gate
        return inner.create(r, ctx)
      }
    }
    const registry = new ResourceTypeRegistry().register('dataset', gated)

    const first = engine('proj', registry)
    const second = engine('proj', registry)
    const plan = await first.plan([desired[0]])

    const running = first.apply(plan)
    await started

    await expect(second.apply(plan)).rejects.toBeInstanceOf(StateLockError)
    expect(fs.existsSync(statePath)).toBe(false)

    release()
    const result = await running
    expect(result.completed).toHaveLength(1)
    expect(new StateStore(statePath).load('proj').serial).toBe(1)
  })

  it('releases the lock after a failed apply', async () => {
    backend.failOn('recipe.B', 'create')
    const e = engine()
    await expect(e.apply(await e.plan(desired))).rejects.toBeInstanceOf(ApplyError)

    backend.clearFailures()
    const retry = await e.plan(desired)
    const result = await e.apply(retry)
    expect(result.completed.map(c => c.address)).toEqual(['recipe.B'])
  })

  it('rejects a saved plan once the state moved on', async () => {
    const e = engine()
    await e.apply(await e.plan(desired))
    const stale = await e.plan([...desired, resource('zone', 'z')])
    await e.apply(await e.plan([...desired, resource('zone', 'y')]))
    const callsBefore = backend.calls.length

    await expect(e.apply(stale)).rejects.toBeInstanceOf(StalePlanError)
    expect(backend.calls.length).toBe(callsBefore)
  })

  it('destroys everything tracked', async () => {
    const e = engine()
    await e.apply(await e.plan(desired))

    const result = await e.destroy()

    expect(result.completed.map(c => [c.action, c.address])).toEqual([
      ['delete', 'recipe.B'],
      ['delete', 'dataset.A']
    ])
    expect(e.loadState().resources).toEqual({})
    expect(backend.addresses()).toEqual([])
  })

  it('keeps recorded dependencies current so destroy still works after rewiring', async () => {
    const e = engine()
    await e.apply(await e.plan([
      resource('dataset', 'a', { path: '/a' }, { dependsOn: ['dataset.b'] }),
      resource('dataset', 'b', { path: '/b' })
    ]))

    const rewired = await e.plan([
      resource('dataset', 'a', { path: '/a' }),
      resource('dataset', 'b', { path: '/b', description: 'now reads a' }, { dependsOn: ['dataset.a'] })
    ])
    expect(rewired.changes.map(c => [c.action, c.address])).toEqual([
      ['no-op', 'dataset.a'],
      ['update', 'dataset.b']
    ])
    await e.apply(rewired)

    const state = e.loadState()
    expect(state.resources['dataset.a'].dependencies).toEqual([])
    expect(state.resources['dataset.b'].dependencies).toEqual(['dataset.a'])

    const result = await e.destroy()
    expect(result.completed.map(c => c.address)).toEqual(['dataset.b', 'dataset.a'])
    expect(backend.addresses()).toEqual([])
  })

  it('drift reports without persisting; refresh persists', async () => {
    const e = engine()
    await e.apply(await e.plan(desired))
    backend.remove('dataset.A')

    const drift = await e.drift()
    expect(drift.changes.map(c => [c.action, c.address])).toEqual([['delete', 'dataset.A']])
    expect(e.loadState().serial).toBe(2)

    const refreshed = await e.refresh()
    expect(refreshed.changes).toHaveLength(1)
    expect(refreshed.state.serial).toBe(3)
    expect(Object.keys(e.loadState().resources)).toEqual(['recipe.B'])
  })

  it('saves a drift result only when the state did not move', async () => {
    const e = engine()
    await e.apply(await e.plan(desired))
    backend.mutate('dataset.A', { path: '/x' })

    const drift = await e.drift()
    const saved = await e.saveState(drift.state)
    expect(saved.serial).toBe(3)
    expect(e.loadState().resources['dataset.A'].attributes.path).toBe('/x')

    await expect(e.saveState(drift.state)).rejects.toBeInstanceOf(StalePlanError)
  })
})
