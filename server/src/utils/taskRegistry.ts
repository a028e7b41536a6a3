import type pino from 'pino'
import { getLogger } from '../lib/logger'

/**
 * Resolve after `ms`, or as soon as `signal` aborts or `wake` is called.
 * Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal, onWakeable?: (wake: () => void) => void): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const done = () => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, Math.max(0, ms))
    signal?.addEventListener('abort', done, { once: true })
    onWakeable?.(done)
  })
}

/** Resolves when the signal aborts. */
export function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }
    signal.addEventListener('abort', () => resolve(), { once: true })
  })
}

export interface TaskHandle {
  readonly name: string
  readonly done: Promise<void>
  readonly finished: boolean
  /** Idempotent; a no-op once the task has finished. */
  cancel(): void
}

export interface SpawnOptions {
  /** Called when the task rejects while not cancelled. */
  onError?: (err: unknown) => void
}

/**
 * Owns every background task of the process (job tracking, reclaimer) so that
 * none is dropped silently and all can be cancelled on shutdown.
 */
export class TaskRegistry {
  private readonly running = new Set<TaskHandle>()

  constructor(private readonly log: pino.Logger = getLogger('jobs')) {}

  get size(): number {
    return this.running.size
  }

  spawn(name: string, fn: (signal: AbortSignal) => Promise<void>, options: SpawnOptions = {}): TaskHandle {
    const controller = new AbortController()
    let finished = false
    const done = Promise.resolve()
      .then(() => fn(controller.signal))
      .catch((err: unknown) => {
        if (controller.signal.aborted) return
        if (options.onError) {
          options.onError(err)
        } else {
          this.log.error({ msg: 'Background task failed', task: name, err })
        }
      })
      .finally(() => {
        finished = true
        this.running.delete(handle)
      })
    const handle: TaskHandle = {
      name,
      done,
      get finished() {
        return finished
      },
      cancel() {
        if (finished || controller.signal.aborted) return
        controller.abort()
      },
    }
    this.running.add(handle)
    return handle
  }

  /** Cancel everything and wait for the tasks to settle. */
  async shutdown(): Promise<void> {
    const tasks = [...this.running]
    tasks.forEach((task) => task.cancel())
    await Promise.all(tasks.map((task) => task.done))
  }
}
