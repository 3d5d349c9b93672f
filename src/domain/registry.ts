/**
 * Flowform Resource Type Registry
 *
 * The single dispatch point from a resource type tag to its handler and
 * comparison rules. The engine never branches on type beyond this lookup.
 */

import { FlowformError, UnknownResourceTypeError } from '../lib/errors.js'
import type { CompareStrategy, ResourceHandler } from './types.js'

export interface RegisteredType {
  type: string
  handler: ResourceHandler
  /** Per-attribute comparison strategy; unlisted attributes compare exactly */
  compare: Record<string, CompareStrategy>
}

export interface RegisterOptions {
  compare?: Record<string, CompareStrategy>
}

export class ResourceTypeRegistry {
  private readonly entries = new Map<string, RegisteredType>()

  register(type: string, handler: ResourceHandler, options: RegisterOptions = {}): this {
    if (this.entries.has(type)) {
      throw new FlowformError(`Resource type already registered: ${type}`, 'DUPLICATE_RESOURCE_TYPE', {
        context: { type }
      })
    }
    this.entries.set(type, { type, handler, compare: { ...options.compare } })
    return this
  }

  get(type: string): RegisteredType {
    const entry = this.entries.get(type)
    if (!entry) {
      throw new UnknownResourceTypeError(type, this.types())
    }
    return entry
  }

  handlerFor(type: string): ResourceHandler {
    return this.get(type).handler
  }

  has(type: string): boolean {
    return this.entries.has(type)
  }

  types(): string[] {
    return [...this.entries.keys()].sort()
  }
}
