/**
 * Flowform Engine
 *
 * Ties the state store, planner, executor and drift detector to one project
 * and one state file. Every operation that may write state holds the state
 * lock for its whole duration.
 */

import { StalePlanError, StateProjectMismatchError } from '../lib/errors.js'
import { logger as rootLogger } from '../lib/logger.js'
import type { Logger } from '../lib/logger.js'
import { createEmptyState, StateStore } from '../lib/state-store.js'
import { buildDestroyPlan, executePlan } from './apply.js'
import { detectDrift } from './drift.js'
import type { DriftResult } from './drift.js'
import { computePlan } from './plan.js'
import type { ResourceTypeRegistry } from './registry.js'
import type {
  ApplyResult,
  HandlerContext,
  Plan,
  ProgressCallback,
  Resource,
  State
} from './types.js'

export interface EngineOptions {
  project: string
  statePath: string
  registry: ResourceTypeRegistry
  /** Extra placeholder values; `projectKey` is always the project */
  variables?: Record<string, string>
  logger?: Logger
}

export interface PlanOptions {
  destroy?: boolean
  /** Read live attributes before diffing (default true) */
  refresh?: boolean
}

export interface ApplyOptions {
  onProgress?: ProgressCallback
  signal?: AbortSignal
}

export class Engine {
  readonly project: string
  readonly store: StateStore
  readonly registry: ResourceTypeRegistry
  private readonly variables: Record<string, string>
  private readonly logger: Logger

  constructor(options: EngineOptions) {
    this.project = options.project
    this.registry = options.registry
    this.logger = (options.logger ?? rootLogger).child({ project: options.project })
    this.store = new StateStore(options.statePath, { logger: this.logger })
    this.variables = { ...options.variables, projectKey: options.project }
  }

  get context(): HandlerContext {
    return { project: this.project, variables: { ...this.variables }, logger: this.logger }
  }

  /**
   * Load state, refusing a state file written for another project.
   */
  loadState(): State {
    const state = this.store.load(this.project)
    if (state.project !== this.project) {
      throw new StateProjectMismatchError(this.project, state.project)
    }
    return state
  }

  /**
   * Compute a plan. With refresh on (the default) the lock is held and
   * out-of-band changes are persisted before diffing.
   */
  async plan(resources: Resource[], options: PlanOptions = {}): Promise<Plan> {
    const { destroy = false, refresh = true } = options

    const run = (): Promise<Plan> => computePlan({
      resources,
      state: this.loadState(),
      registry: this.registry,
      context: this.context,
      destroy,
      refresh: refresh ? (state) => this.refreshAndSave(state) : undefined
    })

    return refresh ? this.store.withLock(run) : run()
  }

  /**
   * Apply a plan. A plan computed against a state file that did not exist yet
   * is applied to a fresh state carrying the plan's lineage.
   */
  async apply(plan: Plan, options: ApplyOptions = {}): Promise<ApplyResult> {
    if (plan.metadata.project !== this.project) {
      throw new StateProjectMismatchError(this.project, plan.metadata.project)
    }

    return this.store.withLock(() => {
      const state = this.store.exists()
        ? this.loadState()
        : createEmptyState(this.project, plan.metadata.stateLineage, plan.metadata.stateSerial)
      return this.execute(plan, state, options)
    })
  }

  /**
   * Delete everything tracked in state, dependents first.
   */
  async destroy(options: ApplyOptions = {}): Promise<ApplyResult> {
    return this.store.withLock(() => {
      const state = this.loadState()
      const plan = buildDestroyPlan(state, this.registry, this.project)
      return this.execute(plan, state, options)
    })
  }

  /**
   * Read live attributes for every tracked resource and persist what changed.
   */
  async refresh(): Promise<DriftResult> {
    return this.store.withLock(async () => {
      const drift = await detectDrift({ state: this.loadState(), registry: this.registry, context: this.context })
      const state = drift.changes.length > 0 ? this.store.save(drift.state) : drift.state
      return { changes: drift.changes, state }
    })
  }

  /**
   * Report drift without touching the state file.
   */
  async drift(): Promise<DriftResult> {
    return detectDrift({ state: this.loadState(), registry: this.registry, context: this.context })
  }

  /**
   * Persist a state derived from an earlier load (for example a drift
   * result). Fails when the state file moved on in between.
   */
  async saveState(state: State): Promise<State> {
    if (state.project !== this.project) {
      throw new StateProjectMismatchError(this.project, state.project)
    }
    return this.store.withLock(() => {
      if (this.store.exists()) {
        const current = this.loadState()
        if (current.lineage !== state.lineage) {
          throw new StalePlanError('lineage', state.lineage, current.lineage)
        }
        if (current.serial !== state.serial) {
          throw new StalePlanError('serial', state.serial, current.serial)
        }
      }
      return this.store.save(state)
    })
  }

  private async refreshAndSave(state: State): Promise<State> {
    const drift = await detectDrift({ state, registry: this.registry, context: this.context })
    return drift.changes.length > 0 ? this.store.save(drift.state) : state
  }

  private execute(plan: Plan, state: State, options: ApplyOptions): Promise<ApplyResult> {
    return executePlan({
      plan,
      state,
      registry: this.registry,
      context: this.context,
      persist: (next) => this.store.save(next),
      onProgress: options.onProgress,
      signal: options.signal
    })
  }
}
