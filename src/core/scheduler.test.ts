import { describe, it, expect, beforeEach, jest } from '@jest/globals'
import { Scheduler, TaskHandler, toProbeFailure } from './scheduler'
import { CheckTask, CheckResult } from './types/execution'
import { ConnectionError, StatusMismatchError, TransportError } from './errors'

describe('Scheduler', () => {
  let scheduler: Scheduler
  let mockTaskHandler: jest.Mock<TaskHandler>

  const createTask = (sequenceIndex: number): CheckTask => ({
    id: `target-${sequenceIndex}`,
    target: { kind: 'tcp', description: `Target ${sequenceIndex}`, address: `127.0.0.1:${1000 + sequenceIndex}` },
    sequenceIndex,
  })

  const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

  beforeEach(() => {
    scheduler = new Scheduler()
    mockTaskHandler = jest.fn<TaskHandler>()
  })

  describe('basic functionality', () => {
    it('should create scheduler', () => {
      expect(scheduler).toBeInstanceOf(Scheduler)
      expect(scheduler.getStatus()).toEqual({
        isRunning: false,
        queueSize: 0,
        activeTasks: 0,
        completedTasks: 0,
      })
    })

    it('should throw error if no task handler is set', async () => {
      scheduler.addTask(createTask(0))

      await expect(scheduler.run()).rejects.toThrow('Task handler must be set before running scheduler')
    })

    it('should resolve immediately with no tasks', async () => {
      scheduler.setTaskHandler(mockTaskHandler)

      await expect(scheduler.run()).resolves.toEqual([])
      expect(mockTaskHandler).not.toHaveBeenCalled()
    })

    it('should reject a second run while one is in flight', async () => {
      scheduler.setTaskHandler(() => delay(20).then(() => ({ httpStatus: null })))
      scheduler.addTask(createTask(0))

      const first = scheduler.run()
      await expect(scheduler.run()).rejects.toThrow('Scheduler is already running')
      await first
    })
  })

  describe('execution', () => {
    it('should settle a successful task into a success result', async () => {
      mockTaskHandler.mockResolvedValue({ httpStatus: 204 })
      scheduler.setTaskHandler(mockTaskHandler)
      scheduler.addTask(createTask(0))

      const [result] = await scheduler.run()

      expect(mockTaskHandler).toHaveBeenCalledTimes(1)
      expect(result?.sequenceIndex).toBe(0)
      expect(result?.description).toBe('Target 0')
      expect(result?.outcome).toEqual({ status: 'success', elapsedMs: expect.any(Number), httpStatus: 204 })
    })

    it('should turn a thrown error into a failure result without retrying', async () => {
      mockTaskHandler.mockRejectedValue(new ConnectionError('connect ECONNREFUSED', { code: 'ECONNREFUSED' }))
      scheduler.setTaskHandler(mockTaskHandler)
      scheduler.addTask(createTask(0))

      const [result] = await scheduler.run()

      expect(mockTaskHandler).toHaveBeenCalledTimes(1)
      expect(result?.outcome).toEqual({
        status: 'failure',
        elapsedMs: expect.any(Number),
        error: { kind: 'connection', message: 'connect ECONNREFUSED', httpStatus: null, details: null },
      })
    })

    it('should start every task before any of them settles', async () => {
      let inFlight = 0
      let peak = 0
      scheduler.setTaskHandler(async () => {
        inFlight++
        peak = Math.max(peak, inFlight)
        await delay(20)
        inFlight--
        return { httpStatus: null }
      })
      scheduler.addTasks([0, 1, 2, 3, 4].map(createTask))

      const results = await scheduler.run()

      expect(results).toHaveLength(5)
      expect(peak).toBe(5)
    })

    it('should report results in completion order', async () => {
      const delays = [30, 0, 15]
      scheduler.setTaskHandler(async (task) => {
        await delay(delays[task.sequenceIndex] ?? 0)
        return { httpStatus: null }
      })
      scheduler.addTasks([0, 1, 2].map(createTask))

      const results = await scheduler.run()

      expect(results.map((r) => r.sequenceIndex)).toEqual([1, 2, 0])
    })

    it('should keep a failing task from affecting its siblings', async () => {
      scheduler.setTaskHandler(async (task) => {
        if (task.sequenceIndex === 1) throw new Error('boom')
        return { httpStatus: null }
      })
      scheduler.addTasks([0, 1, 2].map(createTask))

      const results = await scheduler.run()
      const byIndex = new Map(results.map((r) => [r.sequenceIndex, r.outcome.status]))

      expect(byIndex.get(0)).toBe('success')
      expect(byIndex.get(1)).toBe('failure')
      expect(byIndex.get(2)).toBe('success')
    })
  })

  describe('events', () => {
    it('should emit taskStart, taskComplete and taskFailed', async () => {
      const started: string[] = []
      const completed: number[] = []
      const failed: number[] = []

      scheduler.on('taskStart', (task: CheckTask) => started.push(task.id))
      scheduler.on('taskComplete', (result: CheckResult) => completed.push(result.sequenceIndex))
      scheduler.on('taskFailed', (result: CheckResult) => failed.push(result.sequenceIndex))

      scheduler.setTaskHandler(async (task) => {
        if (task.sequenceIndex === 0) throw new TransportError('fetch failed')
        return { httpStatus: 200 }
      })
      scheduler.addTasks([0, 1].map(createTask))

      await scheduler.run()

      expect(started.sort()).toEqual(['target-0', 'target-1'])
      expect(completed).toEqual([1])
      expect(failed).toEqual([0])
    })

    it('should still settle every task when a listener throws', async () => {
      scheduler.on('taskComplete', () => {
        throw new Error('listener failure')
      })
      scheduler.setTaskHandler(async () => ({ httpStatus: null }))
      scheduler.addTasks([0, 1].map(createTask))

      const results = await scheduler.run()

      expect(results).toHaveLength(2)
    })
  })
})

describe('toProbeFailure', () => {
  it('should carry status and details of a status mismatch', () => {
    expect(toProbeFailure(new StatusMismatchError(404, 200, 'not here'))).toEqual({
      kind: 'status-mismatch',
      message: 'Unexpected HTTP status: 404 (expected 200)',
      httpStatus: 404,
      details: 'not here',
    })
  })

  it('should map transport errors without a status', () => {
    expect(toProbeFailure(new TransportError('Timeout after 10ms'))).toEqual({
      kind: 'transport',
      message: 'Timeout after 10ms',
      httpStatus: null,
      details: null,
    })
  })

  it('should map anything else to an unexpected failure', () => {
    expect(toProbeFailure('plain string')).toEqual({
      kind: 'unexpected',
      message: 'plain string',
      httpStatus: null,
      details: null,
    })
  })
})
