/**
 * Flowform Dependency Graph
 *
 * Builds the dependency DAG of a resource set and produces its deterministic
 * linearization: priority class first, dependency precedence second,
 * declaration order as the tie-break.
 */

import {
  DependencyCycleError,
  DuplicateAddressError,
  UnresolvedReferenceError
} from '../lib/errors.js'
import type { Resource, ResourceInstance } from './types.js'
import { resourceDependencies } from './types.js'

// ============================================================================
// Types
// ============================================================================

export interface GraphNode {
  address: string
  priority: number
  /** Addresses this node depends on, restricted to the graph */
  dependencies: string[]
  /** Declaration position, used as the final tie-break */
  index: number
}

// ============================================================================
// Graph
// ============================================================================

export class DependencyGraph {
  private readonly nodes = new Map<string, GraphNode>()
  private readonly dependents = new Map<string, string[]>()
  private orderCache: string[] | null = null

  /**
   * Nodes must be unique and acyclic; use buildGraph() or fromState() to get
   * the checks.
   */
  constructor(nodes: GraphNode[]) {
    for (const node of nodes) {
      this.nodes.set(node.address, node)
      this.dependents.set(node.address, [])
    }
    for (const node of nodes) {
      for (const dep of node.dependencies) {
        this.dependents.get(dep)?.push(node.address)
      }
    }
  }

  get size(): number {
    return this.nodes.size
  }

  has(address: string): boolean {
    return this.nodes.has(address)
  }

  getNode(address: string): GraphNode | undefined {
    return this.nodes.get(address)
  }

  dependenciesOf(address: string): string[] {
    return [...(this.nodes.get(address)?.dependencies ?? [])]
  }

  /**
   * Find the first cycle reachable in declaration order. The returned path
   * repeats its first address at the end, e.g. `[a, b, a]`.
   */
  findCycle(): string[] | null {
    const visited = new Set<string>()
    const recursionStack = new Set<string>()
    const path: string[] = []

    const dfs = (address: string): string[] | null => {
      visited.add(address)
      recursionStack.add(address)
      path.push(address)

      for (const dep of this.dependenciesOf(address)) {
        if (recursionStack.has(dep)) {
          return [...path.slice(path.indexOf(dep)), dep]
        }
        if (!visited.has(dep)) {
          const cycle = dfs(dep)
          if (cycle) return cycle
        }
      }

      path.pop()
      recursionStack.delete(address)
      return null
    }

    for (const node of this.sortedNodes()) {
      if (!visited.has(node.address)) {
        const cycle = dfs(node.address)
        if (cycle) return cycle
      }
    }
    return null
  }

  /**
   * Effective priority: the maximum of a node's own priority and the
   * effective priorities of its dependencies. Scheduling by it keeps every
   * priority class ahead of the next without ever placing a node before one
   * of its dependencies.
   */
  effectivePriorities(): Map<string, number> {
    const result = new Map<string, number>()

    const resolve = (address: string): number => {
      const known = result.get(address)
      if (known !== undefined) return known
      const node = this.nodes.get(address)
      if (!node) return Number.NEGATIVE_INFINITY
      let priority = node.priority
      for (const dep of node.dependencies) {
        priority = Math.max(priority, resolve(dep))
      }
      result.set(address, priority)
      return priority
    }

    for (const node of this.sortedNodes()) {
      resolve(node.address)
    }
    return result
  }

  /**
   * Kahn's algorithm with a ready queue ordered by
   * (effective priority, declaration index).
   */
  linearize(): string[] {
    if (this.orderCache) {
      return [...this.orderCache]
    }

    const cycle = this.findCycle()
    if (cycle) {
      throw new DependencyCycleError(cycle)
    }

    const priorities = this.effectivePriorities()
    const rank = (address: string): [number, number] => [
      priorities.get(address) ?? 0,
      this.nodes.get(address)?.index ?? 0
    ]
    const before = (a: string, b: string): boolean => {
      const [pa, ia] = rank(a)
      const [pb, ib] = rank(b)
      return pa !== pb ? pa < pb : ia < ib
    }
    const enqueue = (queue: string[], address: string): void => {
      const insertAt = queue.findIndex(queued => before(address, queued))
      if (insertAt === -1) queue.push(address)
      else queue.splice(insertAt, 0, address)
    }

    const inDegree = new Map<string, number>()
    const ready: string[] = []
    for (const node of this.sortedNodes()) {
      inDegree.set(node.address, node.dependencies.length)
      if (node.dependencies.length === 0) enqueue(ready, node.address)
    }

    const sorted: string[] = []
    while (ready.length > 0) {
      const current = ready.shift()
      if (current === undefined) break
      sorted.push(current)

      for (const dependent of this.dependents.get(current) ?? []) {
        const degree = (inDegree.get(dependent) ?? 1) - 1
        inDegree.set(dependent, degree)
        if (degree === 0) enqueue(ready, dependent)
      }
    }

    this.orderCache = sorted
    return [...sorted]
  }

  /** Destroy order: dependents before their dependencies */
  reverseLinearize(): string[] {
    return this.linearize().reverse()
  }

  private sortedNodes(): GraphNode[] {
    return [...this.nodes.values()].sort((a, b) => a.index - b.index)
  }
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Build the graph of a desired resource set.
 *
 * Every dependency must name a desired resource or an address in `known`
 * (typically the state's addresses). Edges to known-but-not-desired addresses
 * carry no ordering and are dropped.
 */
export function buildGraph(resources: Resource[], known: Iterable<string> = []): DependencyGraph {
  const addresses = new Set<string>()
  for (const resource of resources) {
    if (addresses.has(resource.address)) {
      throw new DuplicateAddressError(resource.address)
    }
    addresses.add(resource.address)
  }

  const knownSet = new Set(known)
  const nodes = resources.map((resource, index): GraphNode => {
    const dependencies: string[] = []
    for (const dep of resourceDependencies(resource)) {
      if (addresses.has(dep)) {
        dependencies.push(dep)
      } else if (!knownSet.has(dep)) {
        throw new UnresolvedReferenceError(resource.address, dep)
      }
    }
    return { address: resource.address, priority: resource.priority, dependencies, index }
  })

  const graph = new DependencyGraph(nodes)
  const cycle = graph.findCycle()
  if (cycle) {
    throw new DependencyCycleError(cycle)
  }
  return graph
}

/**
 * Build the graph of recorded state entries, ordered by address. Recorded
 * dependencies outside the given entries are ignored.
 */
export function graphFromState(instances: ResourceInstance[]): DependencyGraph {
  const sorted = [...instances].sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0))
  const addresses = new Set(sorted.map(i => i.address))
  const nodes = sorted.map((instance, index): GraphNode => ({
    address: instance.address,
    priority: instance.priority,
    dependencies: [...new Set(instance.dependencies)].filter(dep => addresses.has(dep) && dep !== instance.address),
    index
  }))
  return new DependencyGraph(nodes)
}
