/**
 * Flowform State Store
 *
 * Durable record of applied resources plus integrity metadata (lineage,
 * serial, digest). Writes go to a temp file that is fsynced and renamed into
 * place; the previous version is kept as `<path>.backup`. An exclusive
 * `<path>.lock` guards every mutating operation.
 */

import fs from 'node:fs'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import lockfile from 'proper-lockfile'
import { digestOf } from './digest.js'
import { StateCorruptError, StateLockError } from './errors.js'
import { logger as rootLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { Attributes, ResourceInstance, State } from '../domain/types.js'

export const STATE_VERSION = 1

// ============================================================================
// Digests
// ============================================================================

export function computeAttributesHash(attributes: Attributes): string {
  return digestOf(attributes)
}

/**
 * Digest over the resource map. Timestamps and hashes are excluded so the
 * digest tracks content only.
 */
export function computeStateDigest(resources: Record<string, ResourceInstance>): string {
  const content: Record<string, unknown> = {}
  for (const address of Object.keys(resources).sort()) {
    const instance = resources[address]
    content[address] = {
      type: instance.type,
      dependencies: instance.dependencies,
      attributes: instance.attributes
    }
  }
  return digestOf(content)
}

export function verifyState(state: State): { valid: boolean; expected: string; actual: string } {
  const actual = computeStateDigest(state.resources)
  return { valid: state.digest === actual, expected: state.digest, actual }
}

export function createEmptyState(project: string, lineage: string = randomUUID(), serial: number = 0): State {
  return {
    version: STATE_VERSION,
    project,
    lineage,
    serial,
    digest: computeStateDigest({}),
    resources: {}
  }
}

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isInstance(value: unknown): value is ResourceInstance {
  return isRecord(value) &&
    typeof value.address === 'string' &&
    typeof value.type === 'string' &&
    typeof value.name === 'string' &&
    typeof value.priority === 'number' &&
    Array.isArray(value.dependencies) &&
    isRecord(value.attributes)
}

function isState(value: unknown): value is State {
  return isRecord(value) &&
    value.version === STATE_VERSION &&
    typeof value.project === 'string' &&
    typeof value.lineage === 'string' &&
    typeof value.serial === 'number' &&
    typeof value.digest === 'string' &&
    isRecord(value.resources) &&
    Object.values(value.resources).every(isInstance)
}

function isLockHeld(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ELOCKED'
}

// ============================================================================
// Store
// ============================================================================

export interface StateStoreOptions {
  logger?: Logger
}

export class StateStore {
  readonly path: string
  private readonly logger: Logger

  constructor(statePath: string, options: StateStoreOptions = {}) {
    this.path = path.resolve(statePath)
    this.logger = (options.logger ?? rootLogger).child({ statePath: this.path })
  }

  get backupPath(): string {
    return `${this.path}.backup`
  }

  get lockPath(): string {
    return `${this.path}.lock`
  }

  exists(): boolean {
    return fs.existsSync(this.path)
  }

  /**
   * Read the persisted state, or an empty state with a fresh lineage when no
   * file exists yet.
   */
  load(project: string): State {
    if (!this.exists()) {
      this.logger.debug('No state file, starting empty state', { project })
      return createEmptyState(project)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(fs.readFileSync(this.path, 'utf-8'))
    } catch (err) {
      throw new StateCorruptError(this.path, 'not valid JSON', err)
    }
    if (!isState(parsed)) {
      throw new StateCorruptError(this.path, `not a version ${STATE_VERSION} state record`)
    }

    const check = verifyState(parsed)
    if (!check.valid) {
      this.logger.warn('State digest does not match its content', {
        expected: check.expected,
        actual: check.actual
      })
    }
    this.logger.debug('Loaded state', {
      serial: parsed.serial,
      resources: Object.keys(parsed.resources).length
    })
    return parsed
  }

  /**
   * Persist `state` with serial advanced and digest recomputed. Returns the
   * record as written; the argument is not modified.
   */
  save(state: State): State {
    const next: State = {
      ...state,
      version: STATE_VERSION,
      serial: state.serial + 1,
      digest: computeStateDigest(state.resources)
    }

    fs.mkdirSync(path.dirname(this.path), { recursive: true })
    if (this.exists()) {
      fs.copyFileSync(this.path, this.backupPath)
    }

    const tmpPath = `${this.path}.${process.pid}.tmp`
    try {
      const fd = fs.openSync(tmpPath, 'w')
      try {
        fs.writeFileSync(fd, JSON.stringify(next, null, 2) + '\n', 'utf-8')
        fs.fsyncSync(fd)
      } finally {
        fs.closeSync(fd)
      }
      fs.renameSync(tmpPath, this.path)
    } catch (err) {
      fs.rmSync(tmpPath, { force: true })
      throw err
    }

    this.logger.debug('Saved state', { serial: next.serial, digest: next.digest })
    return next
  }

  /**
   * Run `fn` holding the exclusive state lock. A held lock fails immediately
   * with StateLockError. The lock is released even when `fn` throws.
   */
  async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    fs.mkdirSync(path.dirname(this.path), { recursive: true })

    let release: () => Promise<void>
    try {
      release = await lockfile.lock(this.path, {
        realpath: false,
        lockfilePath: this.lockPath,
        retries: 0,
        onCompromised: (err) => {
          this.logger.error('State lock compromised', { error: err.message })
        }
      })
    } catch (err) {
      if (isLockHeld(err)) {
        throw new StateLockError(this.path, err)
      }
      throw err
    }
    this.logger.debug('Acquired state lock')

    try {
      return await fn()
    } finally {
      try {
        await release()
        this.logger.debug('Released state lock')
      } catch (err) {
        this.logger.warn('Failed to release state lock', {
          error: err instanceof Error ? err.message : String(err)
        })
      }
    }
  }

  /** Whether another holder currently owns the lock */
  isLocked(): Promise<boolean> {
    return lockfile.check(this.path, { realpath: false, lockfilePath: this.lockPath })
  }
}
