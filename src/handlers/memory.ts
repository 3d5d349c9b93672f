/**
 * Flowform In-Memory Backend
 *
 * A remote system kept in process: one attribute map per address. Serves as
 * the handler set for dry runs and tests, with hooks to inject failures and
 * out-of-band changes.
 */

import { normalizeAttributes } from '../domain/compare.js'
import type { ResourceTypeRegistry } from '../domain/registry.js'
import type { Attributes, Resource, ResourceHandler } from '../domain/types.js'
import { createResourceRegistry } from '../resources/index.js'

export type BackendAction = 'create' | 'read' | 'update' | 'delete'

export interface BackendCall {
  action: BackendAction
  address: string
}

export interface MemoryBackendOptions {
  /** Problems reported by the handler's validate hook */
  validate?: (resource: Resource) => string[]
}

export class MemoryBackend {
  /** Every handler call, in order */
  readonly calls: BackendCall[] = []
  private readonly objects = new Map<string, Attributes>()
  private readonly failures = new Map<string, Error>()
  private readonly validator?: (resource: Resource) => string[]

  constructor(options: MemoryBackendOptions = {}) {
    this.validator = options.validate
  }

  /** Make the next and every later `action` on `address` throw */
  failOn(address: string, action: BackendAction, error: Error | string = `simulated ${action} failure`): this {
    this.failures.set(`${action}:${address}`, typeof error === 'string' ? new Error(error) : error)
    return this
  }

  clearFailures(): this {
    this.failures.clear()
    return this
  }

  get(address: string): Attributes | undefined {
    const attributes = this.objects.get(address)
    return attributes ? structuredClone(attributes) : undefined
  }

  has(address: string): boolean {
    return this.objects.has(address)
  }

  addresses(): string[] {
    return [...this.objects.keys()].sort()
  }

  /** Out-of-band write, bypassing the handler */
  set(address: string, attributes: Attributes): this {
    this.objects.set(address, structuredClone(attributes))
    return this
  }

  /** Out-of-band partial change */
  mutate(address: string, patch: Attributes): this {
    const current = this.objects.get(address)
    if (!current) {
      throw new Error(`No object at ${address}`)
    }
    this.objects.set(address, { ...current, ...structuredClone(patch) })
    return this
  }

  /** Out-of-band deletion */
  remove(address: string): this {
    this.objects.delete(address)
    return this
  }

  callsFor(action: BackendAction): string[] {
    return this.calls.filter(c => c.action === action).map(c => c.address)
  }

  private record(action: BackendAction, address: string): void {
    this.calls.push({ action, address })
    const failure = this.failures.get(`${action}:${address}`)
    if (failure) throw failure
  }

  handler(): ResourceHandler {
    const handler: ResourceHandler = {
      create: async (resource, ctx) => {
        this.record('create', resource.address)
        if (this.objects.has(resource.address)) {
          throw new Error(`${resource.address} already exists`)
        }
        const attributes = normalizeAttributes(resource.attributes, ctx.variables)
        this.objects.set(resource.address, attributes)
        return structuredClone(attributes)
      },
      read: async (instance) => {
        this.record('read', instance.address)
        return this.get(instance.address) ?? null
      },
      update: async (resource, instance, ctx) => {
        this.record('update', instance.address)
        const current = this.objects.get(instance.address)
        if (!current) {
          throw new Error(`${instance.address} does not exist`)
        }
        const attributes = { ...current, ...normalizeAttributes(resource.attributes, ctx.variables) }
        this.objects.set(instance.address, attributes)
        return structuredClone(attributes)
      },
      delete: async (instance) => {
        this.record('delete', instance.address)
        this.objects.delete(instance.address)
      }
    }

    const validator = this.validator
    if (validator) {
      handler.validate = (resource) => validator(resource)
    }
    return handler
  }
}

/**
 * Registry backed by one in-memory backend for every resource type.
 */
export function createMemoryRegistry(backend: MemoryBackend = new MemoryBackend()): ResourceTypeRegistry {
  return createResourceRegistry(() => backend.handler())
}
