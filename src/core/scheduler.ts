import { EventEmitter } from 'events'
import { performance } from 'node:perf_hooks'
import { CheckTask, CheckResult, ProbeFailure, ProbeReport } from './types/execution'
import { ConnectionError, StatusMismatchError, TransportError } from './errors'
import { logger } from '../logger'

export interface SchedulerEvents {
  taskStart: (task: CheckTask) => void
  taskComplete: (result: CheckResult) => void
  taskFailed: (result: CheckResult) => void
  allTasksComplete: (results: CheckResult[]) => void
}

export type TaskHandler = (task: CheckTask) => Promise<ProbeReport>

/**
 * Maps whatever a probe threw onto the failure record carried by a CheckResult
 */
export function toProbeFailure(error: unknown): ProbeFailure {
  if (error instanceof StatusMismatchError) {
    return { kind: 'status-mismatch', message: error.message, httpStatus: error.status, details: error.details }
  }
  if (error instanceof TransportError) {
    return { kind: 'transport', message: error.message, httpStatus: null, details: null }
  }
  if (error instanceof ConnectionError) {
    return { kind: 'connection', message: error.message, httpStatus: null, details: null }
  }
  return {
    kind: 'unexpected',
    message: error instanceof Error ? error.message : String(error),
    httpStatus: null,
    details: null,
  }
}

/**
 * Starts every queued task at once and settles each into exactly one CheckResult.
 * There is no concurrency cap and no retry: a task that throws becomes a failure
 * result and never affects its siblings.
 */
export class Scheduler extends EventEmitter {
  private queue: CheckTask[] = []
  private activeTasks = new Map<string, CheckTask>()
  private results: CheckResult[] = []
  private isRunning = false
  private taskHandler?: TaskHandler

  setTaskHandler(handler: TaskHandler): void {
    this.taskHandler = handler
  }

  addTasks(tasks: CheckTask[]): void {
    this.queue.push(...tasks)
  }

  addTask(task: CheckTask): void {
    this.queue.push(task)
  }

  async run(): Promise<CheckResult[]> {
    if (this.isRunning) {
      throw new Error('Scheduler is already running')
    }

    const handler = this.taskHandler
    if (!handler) {
      throw new Error('Task handler must be set before running scheduler')
    }

    this.isRunning = true
    this.results = []

    return new Promise((resolve) => {
      this.once('allTasksComplete', resolve)
      this.startQueued(handler)
    })
  }

  getStatus() {
    return {
      isRunning: this.isRunning,
      queueSize: this.queue.length,
      activeTasks: this.activeTasks.size,
      completedTasks: this.results.length,
    }
  }

  private startQueued(handler: TaskHandler): void {
    const tasks = this.queue.splice(0, this.queue.length)

    for (const task of tasks) {
      this.activeTasks.set(task.id, task)
    }

    for (const task of tasks) {
      void this.processTask(task, handler)
    }

    this.checkDone()
  }

  private async processTask(task: CheckTask, handler: TaskHandler): Promise<void> {
    this.safeEmit('taskStart', task)
    const started = performance.now()

    let result: CheckResult
    try {
      const report = await handler(task)
      result = {
        description: task.target.description,
        target: task.target,
        sequenceIndex: task.sequenceIndex,
        outcome: { status: 'success', elapsedMs: Math.round(performance.now() - started), httpStatus: report.httpStatus },
      }
    } catch (error) {
      result = {
        description: task.target.description,
        target: task.target,
        sequenceIndex: task.sequenceIndex,
        outcome: { status: 'failure', elapsedMs: Math.round(performance.now() - started), error: toProbeFailure(error) },
      }
    }

    this.activeTasks.delete(task.id)
    this.results.push(result)

    this.safeEmit(result.outcome.status === 'success' ? 'taskComplete' : 'taskFailed', result)
    this.checkDone()
  }

  // A throwing listener must not leave a task unsettled
  private safeEmit(event: 'taskStart' | 'taskComplete' | 'taskFailed', payload: CheckTask | CheckResult): void {
    try {
      this.emit(event, payload)
    } catch (listenerError) {
      logger.error(`Listener for "${event}" failed:`, listenerError)
    }
  }

  private checkDone(): void {
    if (this.isRunning && this.queue.length === 0 && this.activeTasks.size === 0) {
      this.isRunning = false
      this.emit('allTasksComplete', this.results)
    }
  }
}

export function createScheduler(): Scheduler {
  return new Scheduler()
}
