/**
 * @file Confined Executor
 *
 * A single-consumer task queue that owns a tracker's state. Transport callbacks
 * never touch tracker state directly: they post a task, and the executor runs
 * posted tasks one at a time, in posting order, on a microtask after the
 * callback has returned.
 *
 * Trust validation cannot wait: the TLS layer needs its answer before the
 * handshake continues. {@link ConfinedExecutor.invokeSync} runs such a decision
 * immediately inside the confined context and hands the result back.
 *
 * ```
 *   [ws callbacks]                        [owning context]
 *        |                                        |
 *        |-- post(open) ----------> queue ------> task 1
 *        |-- post(message) -------> queue ------> task 2
 *        |-- post(close) ---------> queue ------> task 3
 *        |
 *        |-- invokeSync(trust) ---------------> decision --> returned to ws
 * ```
 *
 * @module ws-change-tracker/transport/confined-executor
 */

/**
 * A unit of work run inside the confined context.
 */
export type ConfinedTask = () => void

/**
 * Options for {@link ConfinedExecutor}.
 */
export interface ConfinedExecutorOptions {
  /**
   * Receives errors thrown by posted tasks. The queue keeps draining.
   */
  onTaskError: (error: unknown) => void
}

/**
 * Runs tasks one at a time, in order, on behalf of a single owner.
 *
 * @example
 * ```typescript
 * const executor = new ConfinedExecutor({ onTaskError: (e) => console.error(e) })
 * socket.on('message', (data) => executor.post(() => tracker.handleMessage(data)))
 * await executor.whenIdle()
 * ```
 */
export class ConfinedExecutor {
  private readonly queue: ConfinedTask[] = []
  private readonly idleWaiters: Array<() => void> = []
  private readonly onTaskError: (error: unknown) => void
  private scheduled = false
  private depth = 0

  constructor(options: ConfinedExecutorOptions) {
    this.onTaskError = options.onTaskError
  }

  /**
   * Number of posted tasks not yet run.
   */
  get pendingTasks(): number {
    return this.queue.length
  }

  /**
   * Whether the caller is running inside a confined task.
   */
  get isOwningContext(): boolean {
    return this.depth > 0
  }

  /**
   * Queues a task. Returns immediately.
   */
  post(task: ConfinedTask): void {
    this.queue.push(task)
    this.scheduleDrain()
  }

  /**
   * Runs a task inside the confined context and returns its result.
   *
   * Used for decisions the transport must receive before it proceeds. The task
   * runs ahead of tasks already queued; errors propagate to the caller.
   */
  invokeSync<T>(task: () => T): T {
    this.depth++
    try {
      return task()
    } finally {
      this.depth--
    }
  }

  /**
   * Resolves once every task posted so far, and any they post, has run.
   */
  whenIdle(): Promise<void> {
    if (this.queue.length === 0 && !this.scheduled) {
      return Promise.resolve()
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  private scheduleDrain(): void {
    if (this.scheduled) {
      return
    }
    this.scheduled = true
    queueMicrotask(() => this.drain())
  }

  private drain(): void {
    try {
      let task = this.queue.shift()
      while (task) {
        this.runTask(task)
        task = this.queue.shift()
      }
    } finally {
      this.scheduled = false
      // An error hook that threw leaves tasks behind
      if (this.queue.length > 0) {
        this.scheduleDrain()
      } else {
        for (const resolve of this.idleWaiters.splice(0)) {
          resolve()
        }
      }
    }
  }

  private runTask(task: ConfinedTask): void {
    this.depth++
    try {
      task()
    } catch (error) {
      this.onTaskError(error)
    } finally {
      this.depth--
    }
  }
}
