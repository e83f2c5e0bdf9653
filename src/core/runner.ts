import { EventEmitter } from 'events'
import { CheckTask, CheckResult, ProbeReport } from './types/execution'
import { Target } from './types/target'
import { RunSummary } from './types/reporting'
import { Scheduler, createScheduler } from './scheduler'
import { ReportCollector } from '../reporting/report-collector'
import { ProberSet, createDefaultProbers } from '../probes'
import { logger } from '../logger'

export interface RunnerEvents {
  runStart: (targetCount: number) => void
  targetStart: (task: CheckTask) => void
  targetComplete: (result: CheckResult) => void
  targetFailed: (result: CheckResult) => void
  runComplete: (summary: RunSummary) => void
}

export interface RunnerOptions {
  quiet?: boolean
  // Replaces the network probers, e.g. with in-process fakes
  probers?: Partial<ProberSet>
}

/**
 * Runs one probe per target, all at once, and returns the results in target order
 */
export class Runner extends EventEmitter {
  private scheduler: Scheduler
  private reportCollector: ReportCollector
  private probers: ProberSet
  private readonly targets: readonly Target[]
  private quiet: boolean

  constructor(targets: readonly Target[], options: RunnerOptions = {}) {
    super()
    this.targets = targets
    this.quiet = options.quiet ?? false
    this.probers = { ...createDefaultProbers(), ...options.probers }

    this.scheduler = createScheduler()
    this.reportCollector = new ReportCollector(targets.length)

    this.setupEventForwarding()

    this.scheduler.setTaskHandler((task) => this.dispatch(task.target))
  }

  async run(): Promise<RunSummary> {
    this.reportCollector.clear()

    const tasks: CheckTask[] = this.targets.map((target, sequenceIndex) => ({
      id: `target-${sequenceIndex}`,
      target,
      sequenceIndex,
    }))

    if (!this.quiet) {
      logger.info(`Checking ${tasks.length} target(s)`)
    }
    this.emit('runStart', tasks.length)

    this.scheduler.addTasks(tasks)
    await this.scheduler.run()

    this.reportCollector.completeRun()
    const summary = this.reportCollector.getSummary()

    if (!this.quiet) {
      logger.info(`Finished: ${summary.succeeded} succeeded, ${summary.failed} failed`)
    }
    this.emit('runComplete', summary)

    return summary
  }

  getReportCollector(): ReportCollector {
    return this.reportCollector
  }

  private dispatch(target: Target): Promise<ProbeReport> {
    switch (target.kind) {
      case 'tcp':
        return this.probers.tcp(target)
      case 'http':
        return this.probers.http(target)
      default: {
        const unreachable: never = target
        return Promise.reject(new Error(`Unsupported target kind: ${JSON.stringify(unreachable)}`))
      }
    }
  }

  /**
   * Every settled task lands in the collector before the runner re-emits it
   */
  private setupEventForwarding(): void {
    this.scheduler.on('taskStart', (task: CheckTask) => {
      logger.debug(`Probing ${task.target.kind} target "${task.target.description}" (${task.target.address})`)
      this.emit('targetStart', task)
    })

    this.scheduler.on('taskComplete', (result: CheckResult) => {
      this.reportCollector.addResult(result)
      logger.debug(`Reached "${result.description}" in ${result.outcome.elapsedMs}ms`)
      this.emit('targetComplete', result)
    })

    this.scheduler.on('taskFailed', (result: CheckResult) => {
      this.reportCollector.addResult(result)
      if (result.outcome.status === 'failure') {
        logger.debug(`Could not reach "${result.description}": ${result.outcome.error.message}`)
      }
      this.emit('targetFailed', result)
    })
  }
}

export function createRunner(targets: readonly Target[], options?: RunnerOptions): Runner {
  return new Runner(targets, options)
}
