/**
 * Flowform Domain Types
 *
 * Resources, changes, plans, state and the handler contract shared by the
 * graph builder, the planner, the apply executor and the drift detector.
 */

import type { Logger } from '../lib/logger.js'

// ============================================================================
// Attribute Values
// ============================================================================

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue }

export type Attributes = Record<string, AttributeValue>

/**
 * How a single top-level attribute is compared between desired and stored
 * snapshots.
 *
 * - exact: deep equality
 * - set: lists compared ignoring order and duplicates
 * - partial: maps compared only on the keys present in the desired map
 */
export type CompareStrategy = 'exact' | 'set' | 'partial'

// ============================================================================
// Resources
// ============================================================================

/**
 * A desired resource as produced by the resource provider for one planning
 * cycle.
 */
export interface Resource {
  /** Unique `{type}.{name}` identifier */
  address: string
  type: string
  name: string
  attributes: Attributes
  /** Explicit dependencies (addresses) */
  dependsOn: string[]
  /** Implicit references derived from type-specific fields (addresses) */
  references: string[]
  /** Lower applies first */
  priority: number
}

export function makeAddress(type: string, name: string): string {
  return `${type}.${name}`
}

export function parseAddress(address: string): { type: string; name: string } {
  const dot = address.indexOf('.')
  if (dot <= 0 || dot === address.length - 1) {
    throw new Error(`Invalid address "${address}": expected "{type}.{name}"`)
  }
  return { type: address.slice(0, dot), name: address.slice(dot + 1) }
}

/** All addresses a resource depends on, explicit first, without duplicates. */
export function resourceDependencies(resource: Resource): string[] {
  return [...new Set([...resource.dependsOn, ...resource.references])]
}

// ============================================================================
// Changes & Plans
// ============================================================================

export type Action = 'create' | 'update' | 'delete' | 'no-op'

export interface FieldDiff {
  from: AttributeValue | undefined
  to: AttributeValue | undefined
}

export interface ResourceChange {
  address: string
  type: string
  action: Action
  /** Stored (or refreshed) attributes, null when absent from state */
  before: Attributes | null
  /** Planned attributes, null for deletes */
  after: Attributes | null
  /** Per-field diff, present for updates */
  diff?: Record<string, FieldDiff>
  /** Desired resource, present for create, update and no-op */
  resource?: Resource
}

export interface PlanMetadata {
  project: string
  createdAt: string
  destroy: boolean
  refresh: boolean
  stateLineage: string
  stateSerial: number
  stateDigest: string
  configDigest: string
  engineVersion: string
}

export interface Plan {
  version: 1
  metadata: PlanMetadata
  changes: ResourceChange[]
}

export interface ChangeSummary {
  create: number
  update: number
  delete: number
  noop: number
}

export function emptyChangeSummary(): ChangeSummary {
  return { create: 0, update: 0, delete: 0, noop: 0 }
}

export function summarizeChanges(changes: ResourceChange[]): ChangeSummary {
  const summary = emptyChangeSummary()
  for (const change of changes) {
    if (change.action === 'no-op') summary.noop++
    else summary[change.action]++
  }
  return summary
}

// ============================================================================
// State
// ============================================================================

export interface ResourceInstance {
  address: string
  type: string
  name: string
  priority: number
  /** Explicit and implicit dependencies recorded at apply time */
  dependencies: string[]
  attributes: Attributes
  attributesHash: string
  createdAt: string
  updatedAt: string
}

export interface State {
  version: 1
  project: string
  /** Fixed at state creation */
  lineage: string
  /** Incremented on every persisted write */
  serial: number
  /** Hash over the resource map, recomputed on every write */
  digest: string
  resources: Record<string, ResourceInstance>
}

// ============================================================================
// Apply
// ============================================================================

export interface ApplyResult {
  /** Changes that finished, in order */
  completed: ResourceChange[]
  failed: ResourceChange | null
  failedAddress: string | null
  error: string | null
  canceled: boolean
}

export function emptyApplyResult(): ApplyResult {
  return { completed: [], failed: null, failedAddress: null, error: null, canceled: false }
}

export type ProgressPhase = 'start' | 'done' | 'failed'

export type ProgressCallback = (change: ResourceChange, phase: ProgressPhase) => void

// ============================================================================
// Handlers
// ============================================================================

export interface HandlerContext {
  project: string
  /** Placeholder values, `projectKey` included */
  variables: Record<string, string>
  logger: Logger
}

/**
 * CRUD adapter for one resource type. Handlers return the attributes the
 * remote system holds after the operation.
 */
export interface ResourceHandler {
  create(resource: Resource, ctx: HandlerContext): Promise<Attributes>
  /** Returns null when the resource no longer exists remotely */
  read(instance: ResourceInstance, ctx: HandlerContext): Promise<Attributes | null>
  update(resource: Resource, instance: ResourceInstance, ctx: HandlerContext): Promise<Attributes>
  delete(instance: ResourceInstance, ctx: HandlerContext): Promise<void>
  /** Returns human-readable problems; an empty list means valid */
  validate?(resource: Resource, ctx: HandlerContext): string[] | Promise<string[]>
}
