/**
 * Flowform Plan Computation Engine
 *
 * Diffs the desired resource set against recorded state and produces an
 * ordered list of changes. Plans can be saved as JSON + Markdown artifacts
 * for review and applied later, once verified against the live state.
 */

import fs from 'node:fs'
import path from 'node:path'
import { digestOf } from '../lib/digest.js'
import { InvalidPlanError, PlanValidationError, StalePlanError } from '../lib/errors.js'
import { computeStateDigest } from '../lib/state-store.js'
import { diffDesired, normalizeAttributes } from './compare.js'
import { buildGraph, graphFromState } from './graph.js'
import type { DependencyGraph } from './graph.js'
import type { ResourceTypeRegistry } from './registry.js'
import type {
  Action,
  ChangeSummary,
  HandlerContext,
  Plan,
  Resource,
  ResourceChange,
  ResourceInstance,
  State
} from './types.js'
import { summarizeChanges } from './types.js'

export const ENGINE_VERSION = '0.1.0'
export const PLAN_VERSION = 1

// ============================================================================
// Plan Computation
// ============================================================================

export interface ComputePlanOptions {
  resources: Resource[]
  state: State
  registry: ResourceTypeRegistry
  context: HandlerContext
  /** Plan deletes for everything in state, ignoring `resources` */
  destroy?: boolean
  /**
   * Replace stored snapshots with live attributes before diffing. Receives
   * the loaded state and returns the state to plan against.
   */
  refresh?: (state: State) => Promise<State>
}

/**
 * Compute a plan.
 *
 * Algorithm:
 * 1. Validate: known types, unique addresses, resolvable references, no
 *    cycles, then the per-type validation hooks
 * 2. Optionally refresh the state from the live system
 * 3. Walk the desired linearization:
 *    - Not in state → create
 *    - In state, fields differ → update with a per-field diff
 *    - In state, fields equal → no-op
 * 4. Append a delete for every state address absent from desired, in the
 *    reverse linearization of the recorded dependencies
 */
export async function computePlan(options: ComputePlanOptions): Promise<Plan> {
  const { resources, registry, context, destroy = false, refresh } = options
  const log = context.logger

  const validated = destroy ? null : await validateDesired(resources, options.state, registry, context)

  const state = refresh ? await refresh(options.state) : options.state

  // Refresh may drop tracked addresses that desired resources still reference
  const graph = validated && refresh ? buildGraph(resources, Object.keys(state.resources)) : validated

  const changes = graph
    ? [...planDesired(resources, graph, state, registry, context), ...planDeletes(resources, state, registry)]
    : planDestroy(state, registry)

  const plan: Plan = {
    version: PLAN_VERSION,
    metadata: {
      project: context.project,
      createdAt: new Date().toISOString(),
      destroy,
      refresh: refresh !== undefined,
      stateLineage: state.lineage,
      stateSerial: state.serial,
      stateDigest: computeStateDigest(state.resources),
      configDigest: computeConfigDigest(resources),
      engineVersion: ENGINE_VERSION
    },
    changes
  }

  const summary = summarizePlan(plan)
  log.info('Plan computed', { ...summary, destroy })
  return plan
}

async function validateDesired(
  resources: Resource[],
  state: State,
  registry: ResourceTypeRegistry,
  context: HandlerContext
): Promise<DependencyGraph> {
  for (const resource of resources) {
    registry.get(resource.type)
  }

  // Duplicates, unresolved references and cycles
  const graph = buildGraph(resources, Object.keys(state.resources))

  const errors: string[] = []
  for (const resource of resources) {
    const handler = registry.handlerFor(resource.type)
    if (!handler.validate) continue
    const issues = await handler.validate(resource, context)
    errors.push(...issues.map(issue => `${resource.address}: ${issue}`))
  }
  if (errors.length > 0) {
    throw new PlanValidationError(errors)
  }
  return graph
}

function planDesired(
  resources: Resource[],
  graph: DependencyGraph,
  state: State,
  registry: ResourceTypeRegistry,
  context: HandlerContext
): ResourceChange[] {
  const byAddress = new Map(resources.map(r => [r.address, r]))
  const order = graph.linearize()
  const changes: ResourceChange[] = []

  for (const address of order) {
    const resource = byAddress.get(address)
    if (!resource) continue

    const desired = normalizeAttributes(resource.attributes, context.variables)
    const prior = state.resources[address]
    if (!prior) {
      changes.push({ address, type: resource.type, action: 'create', before: null, after: desired, resource })
      continue
    }

    const stored = normalizeAttributes(prior.attributes, context.variables)
    const diff = diffDesired(desired, stored, registry.get(resource.type).compare)
    const action: Action = Object.keys(diff).length > 0 ? 'update' : 'no-op'
    changes.push({
      address,
      type: resource.type,
      action,
      before: prior.attributes,
      after: desired,
      ...(action === 'update' ? { diff } : {}),
      resource
    })
  }
  return changes
}

/**
 * Reverse dependency order of recorded instances. Recorded edges written by
 * different applies can form a cycle; reverse address order is used then.
 */
function deleteOrder(instances: ResourceInstance[]): string[] {
  const graph = graphFromState(instances)
  if (graph.findCycle()) {
    return instances.map(i => i.address).sort().reverse()
  }
  return graph.reverseLinearize()
}

function deleteChanges(state: State, addresses: string[], registry: ResourceTypeRegistry): ResourceChange[] {
  return deleteOrder(addresses.map(a => state.resources[a])).map((address): ResourceChange => {
    const instance = state.resources[address]
    // Fail at plan time when no handler could run the delete
    registry.get(instance.type)
    return { address, type: instance.type, action: 'delete', before: instance.attributes, after: null }
  })
}

function planDeletes(resources: Resource[], state: State, registry: ResourceTypeRegistry): ResourceChange[] {
  const desired = new Set(resources.map(r => r.address))
  const orphaned = Object.keys(state.resources).filter(address => !desired.has(address))
  return deleteChanges(state, orphaned, registry)
}

/**
 * Deletes for every address in state, dependents first.
 */
export function planDestroy(state: State, registry: ResourceTypeRegistry): ResourceChange[] {
  return deleteChanges(state, Object.keys(state.resources), registry)
}

/**
 * Digest of the desired set, independent of declaration order.
 */
export function computeConfigDigest(resources: Resource[]): string {
  const content: Record<string, unknown> = {}
  for (const resource of [...resources].sort((a, b) => (a.address < b.address ? -1 : 1))) {
    content[resource.address] = {
      type: resource.type,
      attributes: resource.attributes,
      dependsOn: resource.dependsOn,
      references: resource.references,
      priority: resource.priority
    }
  }
  return digestOf(content)
}

// ============================================================================
// Summaries & Staleness
// ============================================================================

export function summarizePlan(plan: Plan): ChangeSummary {
  return summarizeChanges(plan.changes)
}

export function hasActionableChanges(plan: Plan): boolean {
  return plan.changes.some(change => change.action !== 'no-op')
}

/**
 * Verify a plan against the live state: lineage, then serial, then a digest
 * recomputed from the state's content.
 */
export function assertPlanFresh(plan: Plan, state: State): void {
  const { stateLineage, stateSerial, stateDigest } = plan.metadata
  if (state.lineage !== stateLineage) {
    throw new StalePlanError('lineage', stateLineage, state.lineage)
  }
  if (state.serial !== stateSerial) {
    throw new StalePlanError('serial', stateSerial, state.serial)
  }
  const digest = computeStateDigest(state.resources)
  if (digest !== stateDigest) {
    throw new StalePlanError('digest', stateDigest, digest)
  }
}

// ============================================================================
// Plan Artifacts
// ============================================================================

export interface PlanArtifactPaths {
  json: string
  markdown: string
}

function sanitize(value: string): string {
  return value.replace(/[^a-zA-Z0-9._-]/g, '-')
}

export function planId(plan: Plan): string {
  return `${sanitize(plan.metadata.project)}-${plan.metadata.createdAt.replace(/[:.]/g, '-')}`
}

/**
 * Write plan artifacts (JSON + Markdown) to disk.
 */
export function writePlanArtifact(plan: Plan, outputDir: string): PlanArtifactPaths {
  fs.mkdirSync(outputDir, { recursive: true })

  const id = planId(plan)
  const jsonPath = path.join(outputDir, `${id}.json`)
  const mdPath = path.join(outputDir, `${id}.md`)

  fs.writeFileSync(jsonPath, JSON.stringify(plan, null, 2) + '\n')
  fs.writeFileSync(mdPath, buildPlanMarkdown(plan) + '\n')

  return { json: jsonPath, markdown: mdPath }
}

const ACTIONS: readonly string[] = ['create', 'update', 'delete', 'no-op']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isChange(value: unknown): value is ResourceChange {
  return isRecord(value) &&
    typeof value.address === 'string' &&
    typeof value.type === 'string' &&
    typeof value.action === 'string' &&
    ACTIONS.includes(value.action) &&
    (value.action === 'delete' || value.action === 'no-op' || isRecord(value.resource))
}

function isPlan(value: unknown): value is Plan {
  if (!isRecord(value) || value.version !== PLAN_VERSION) return false
  const meta = value.metadata
  return isRecord(meta) &&
    typeof meta.project === 'string' &&
    typeof meta.stateLineage === 'string' &&
    typeof meta.stateSerial === 'number' &&
    typeof meta.stateDigest === 'string' &&
    Array.isArray(value.changes) &&
    value.changes.every(isChange)
}

/**
 * Read a saved plan. Structure is checked; freshness is checked at apply.
 */
export function readPlanArtifact(planPath: string): Plan {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(planPath, 'utf-8'))
  } catch (err) {
    throw new InvalidPlanError(planPath, err instanceof Error ? err.message : String(err), err)
  }
  if (!isPlan(parsed)) {
    throw new InvalidPlanError(planPath, `not a version ${PLAN_VERSION} plan`)
  }
  return parsed
}

/**
 * Read the most recent plan saved for a project, or null when there is none.
 * Files are matched on the project recorded inside them, since another
 * project's name may share the file name prefix.
 */
export function readLatestPlan(project: string, artifactDir: string): Plan | null {
  if (!fs.existsSync(artifactDir)) return null

  const prefix = `${sanitize(project)}-`
  const files = fs.readdirSync(artifactDir)
    .filter(f => f.startsWith(prefix) && f.endsWith('.json'))

  let latest: Plan | null = null
  for (const file of files) {
    const plan = readPlanArtifact(path.join(artifactDir, file))
    if (plan.metadata.project !== project) continue
    if (!latest || plan.metadata.createdAt > latest.metadata.createdAt) {
      latest = plan
    }
  }
  return latest
}

function changeIcon(action: Action): string {
  switch (action) {
    case 'create': return '+'
    case 'delete': return '-'
    case 'update': return '~'
    default: return '='
  }
}

function buildPlanMarkdown(plan: Plan): string {
  const { metadata } = plan
  const summary = summarizePlan(plan)
  const lines: string[] = []

  lines.push(metadata.destroy ? '# Flowform Destroy Plan' : '# Flowform Plan')
  lines.push('')
  lines.push(`- **ID:** ${planId(plan)}`)
  lines.push(`- **Project:** ${metadata.project}`)
  lines.push(`- **Generated:** ${metadata.createdAt}`)
  lines.push(`- **State:** lineage ${metadata.stateLineage}, serial ${metadata.stateSerial}`)
  lines.push(`- **Refreshed:** ${metadata.refresh ? 'yes' : 'no'}`)
  lines.push('')

  lines.push('## Summary')
  lines.push('')
  lines.push('| Metric | Count |')
  lines.push('|--------|-------|')
  lines.push(`| To add | ${summary.create} |`)
  lines.push(`| To change | ${summary.update} |`)
  lines.push(`| To destroy | ${summary.delete} |`)
  lines.push(`| Unchanged | ${summary.noop} |`)
  lines.push('')

  const actionable = plan.changes.filter(change => change.action !== 'no-op')
  if (actionable.length > 0) {
    lines.push('## Changes')
    lines.push('')
    for (const change of actionable) {
      lines.push(`- \`${changeIcon(change.action)}\` **${change.address}**`)
      for (const [field, diff] of Object.entries(change.diff ?? {})) {
        lines.push(`  - \`${field}\`: \`${JSON.stringify(diff.from ?? null)}\` → \`${JSON.stringify(diff.to ?? null)}\``)
      }
    }
    lines.push('')
  }

  return lines.join('\n')
}
