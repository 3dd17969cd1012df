import { describe, it, expect, afterEach, vi } from 'vitest'
import { TaskScheduler, msUntilDaily } from '../scheduler.service'
import { createScheduler } from '../index'
import { PriceCollector, type HistoryResult } from '../collector.service'
import { AnalysisService } from '../analysis.service'
import { CryptoCacheService } from '../cache.service'
import { InMemoryPriceRepository } from '@/test/inMemoryPriceRepository'
import { MemoryCacheStore } from '@/test/memoryCacheStore'
import { FakeMarketSource } from '@/test/fixtures'

describe('msUntilDaily', () => {
  it('当天未到则等待到当天，已过则顺延到明天', () => {
    expect(msUntilDaily('02:00', new Date(2024, 0, 1, 1, 0, 0))).toBe(60 * 60 * 1000)
    expect(msUntilDaily('02:00', new Date(2024, 0, 1, 3, 0, 0))).toBe(23 * 60 * 60 * 1000)
    expect(msUntilDaily('02:00', new Date(2024, 0, 1, 2, 0, 0))).toBe(24 * 60 * 60 * 1000)
  })

  it('拒绝非法时间', () => {
    expect(() => msUntilDaily('25:00', new Date())).toThrow('Invalid daily time')
    expect(() => msUntilDaily('2pm', new Date())).toThrow('Invalid daily time')
  })
})

describe('TaskScheduler', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('同名任务执行中时跳过', async () => {
    let release: () => void = () => {}
    const run = vi.fn(() => new Promise<void>(resolve => { release = resolve }))
    const scheduler = new TaskScheduler([])

    const first = scheduler.trigger('slow', run)
    await scheduler.trigger('slow', run)
    expect(run).toHaveBeenCalledTimes(1)
    expect(scheduler.isRunning('slow')).toBe(true)

    release()
    await first
    expect(scheduler.isRunning('slow')).toBe(false)
  })

  it('任务异常不向外抛出', async () => {
    const scheduler = new TaskScheduler([])
    await expect(scheduler.trigger('broken', () => Promise.reject(new Error('boom')))).resolves.toBeUndefined()
    expect(scheduler.isRunning('broken')).toBe(false)
  })

  it('按间隔执行，启动时可立即执行一次', async () => {
    vi.useFakeTimers()
    const run = vi.fn(() => Promise.resolve())
    const scheduler = new TaskScheduler([{ name: 'tick', intervalMs: 1000, run, runOnStart: true }])

    scheduler.start()
    scheduler.start()
    expect(scheduler.isStarted()).toBe(true)
    expect(run).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(3000)
    expect(run).toHaveBeenCalledTimes(4)

    await scheduler.stop()
    await vi.advanceTimersByTimeAsync(3000)
    expect(run).toHaveBeenCalledTimes(4)
    expect(scheduler.isStarted()).toBe(false)
  })

  it('每日任务在指定时间执行', async () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date(2024, 0, 1, 1, 59, 0))
    const run = vi.fn(() => Promise.resolve())
    const scheduler = new TaskScheduler([], [{ name: 'daily', at: '02:00', run }])

    scheduler.start()
    await vi.advanceTimersByTimeAsync(59 * 1000)
    expect(run).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(1000)
    expect(run).toHaveBeenCalledTimes(1)

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000)
    expect(run).toHaveBeenCalledTimes(2)

    await scheduler.stop()
  })
})

describe('createScheduler', () => {
  const historyResult: HistoryResult = {
    success: true,
    candlesStored: 0,
    failures: [],
    counts: { minute: 0, hour: 0, day: 0 },
  }

  const build = () => {
    const repository = new InMemoryPriceRepository()
    const cache = new CryptoCacheService(new MemoryCacheStore(), { priceTtlSeconds: 60, chartTtlSeconds: 300 })
    const collector = new PriceCollector(new FakeMarketSource(), repository, cache)
    const analysis = new AnalysisService(repository, cache)
    return { collector, analysis }
  }

  it('每日全量更新与进行中的 history 任务不重叠', async () => {
    const { collector, analysis } = build()
    let release: () => void = () => {}
    const collectHistory = vi.spyOn(collector, 'collectHistory').mockImplementation(
      () => new Promise<HistoryResult>(resolve => { release = () => resolve(historyResult) })
    )
    const refreshReport = vi.spyOn(analysis, 'refreshReport').mockResolvedValue({ generated_at: '2024-01-01T02:00:00.000Z', symbols: [] })
    const scheduler = createScheduler({ collector, analysis })

    const history = scheduler.runNow('history')
    await scheduler.runNow('daily-full-update')

    expect(collectHistory).toHaveBeenCalledTimes(1)
    expect(refreshReport).toHaveBeenCalledTimes(1)

    release()
    await history
    expect(scheduler.isRunning('history')).toBe(false)
  })

  it('每日全量更新依次执行采集与分析', async () => {
    const { collector, analysis } = build()
    const calls: string[] = []
    vi.spyOn(collector, 'collectHistory').mockImplementation(async () => {
      calls.push('history')
      return historyResult
    })
    vi.spyOn(analysis, 'refreshReport').mockImplementation(async () => {
      calls.push('analysis')
      return { generated_at: '2024-01-01T02:00:00.000Z', symbols: [] }
    })
    const scheduler = createScheduler({ collector, analysis })

    await scheduler.runNow('daily-full-update')

    expect(calls).toEqual(['history', 'analysis'])
  })

  it('未知任务名被拒绝', async () => {
    const scheduler = createScheduler(build())
    await expect(scheduler.runNow('weekly')).rejects.toThrow('Unknown task "weekly"')
  })
})
