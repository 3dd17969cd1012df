import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import axios, { AxiosInstance } from 'axios'
import { startTestApp, type TestApp } from '@/test/testApp'
import { EndpointChecker } from '@/services/endpointChecker.service'
import { HOUR_MS, makeCandles } from '@/test/fixtures'

const NOW = Date.UTC(2024, 0, 2, 12)

describe('HTTP 应用', () => {
  let app: TestApp
  let http: AxiosInstance

  beforeEach(async () => {
    app = await startTestApp({ now: NOW })
    http = axios.create({ baseURL: app.baseUrl, validateStatus: () => true })
  })

  afterEach(async () => {
    await app.close()
  })

  it('接口联调检查全部通过', async () => {
    const report = await new EndpointChecker(app.baseUrl).run()

    expect(report.results.filter(result => !result.passed)).toEqual([])
    expect(report).toMatchObject({ total: 17, passed: 17, failed: 0, success: true })
  })

  it('数据库断开时依赖检查失败', async () => {
    app.database.healthy = false

    const report = await new EndpointChecker(app.baseUrl).run()
    const failed = report.results.filter(result => !result.passed)

    expect(report.success).toBe(false)
    expect(failed).toHaveLength(1)
    expect(failed[0]).toMatchObject({
      name: '依赖 database',
      kind: 'dependency',
      failure: { kind: 'payload', detail: 'database 状态为 disconnected' },
    })
  })

  it('系统状态返回连通性', async () => {
    app.store.healthy = false
    const response = await http.get('/api/system/status')

    expect(response.status).toBe(200)
    expect(response.data.data).toEqual({
      database: 'connected',
      redis: 'disconnected',
      timestamp: new Date(NOW).toISOString(),
    })
  })

  it('响应带统一格式与请求ID', async () => {
    await app.repository.insertQuote({
      symbol: 'BTC',
      name: 'Bitcoin',
      price: 42000,
      change24h: 1.5,
      timestamp: new Date(NOW - 60 * 1000),
    })

    const response = await http.get('/api/latest_prices', { headers: { 'X-Request-ID': 'req-test-1' } })

    expect(response.status).toBe(200)
    expect(response.headers['x-request-id']).toBe('req-test-1')
    expect(response.data).toMatchObject({
      success: true,
      code: 200,
      message: '获取成功',
      request_id: 'req-test-1',
    })
    expect(response.data.data).toEqual([{
      name: 'Bitcoin',
      symbol: 'BTC',
      price: 42000,
      change_24h: 1.5,
      timestamp_ms: NOW - 60 * 1000,
      date: new Date(NOW - 60 * 1000).toISOString(),
    }])
  })

  it('查询参数非法返回 422', async () => {
    const response = await http.get('/api/chart_data', { params: { symbol: 'DOGE', limit: 5000 } })

    expect(response.status).toBe(422)
    expect(response.data).toMatchObject({ success: false, code: 422, error_code: 'VALIDATION_ERROR' })
    expect(response.data.errors.map((error: { field: string }) => error.field)).toEqual(['symbol', 'limit'])
  })

  it('参数大小写不敏感并使用默认值', async () => {
    await app.repository.upsertCandles('hour', makeCandles('ETH', [1, 2, 3], NOW - 3 * HOUR_MS))

    const response = await http.get('/api/chart_data', { params: { symbol: 'eth', timeframe: 'HOUR' } })

    expect(response.status).toBe(200)
    expect(response.data.data.map((candle: { close: number }) => candle.close)).toEqual([1, 2, 3])
  })

  it('K线接口返回指标', async () => {
    await app.repository.upsertCandles('day', makeCandles('BTC', [10, 11, 12, 13, 14], NOW - 5 * 24 * HOUR_MS, 24 * HOUR_MS))

    const response = await http.get('/api/kline_data', { params: { timeframe: 'day' } })

    expect(response.status).toBe(200)
    expect(response.data.data.symbol).toBe('BTC')
    expect(response.data.data.klines).toHaveLength(5)
    expect(response.data.data.indicators.ma5).toEqual([null, null, null, null, 12])
  })

  it('价格历史默认24小时', async () => {
    await app.repository.insertQuote({ symbol: 'BTC', name: 'Bitcoin', price: 1, change24h: 0, timestamp: new Date(NOW - 2 * 24 * HOUR_MS) })
    await app.repository.insertQuote({ symbol: 'BTC', name: 'Bitcoin', price: 2, change24h: 0, timestamp: new Date(NOW - HOUR_MS) })

    const response = await http.get('/api/price_history')
    expect(response.data.data.map((quote: { price: number }) => quote.price)).toEqual([2])

    const week = await http.get('/api/price_history', { params: { crypto: 'BTC', timeframe: '7d' } })
    expect(week.data.data.map((quote: { price: number }) => quote.price)).toEqual([1, 2])
  })

  it('分析报告两个路径返回相同结构', async () => {
    const report = await http.get('/api/analysis_report')
    const alias = await http.get('/api/analysis')

    expect(report.status).toBe(200)
    expect(report.data.data.symbols.map((item: { symbol: string }) => item.symbol)).toEqual(['BTC', 'ETH'])
    expect(alias.data.data).toEqual(report.data.data)
  })

  it('数据库不可用返回 503', async () => {
    app.repository.failing = true

    const response = await http.get('/api/latest_prices')

    expect(response.status).toBe(503)
    expect(response.data).toMatchObject({ success: false, error_code: 'SERVICE_UNAVAILABLE', message: '数据库服务不可用' })
  })

  it('未知路径返回 404', async () => {
    const response = await http.get('/api/unknown')

    expect(response.status).toBe(404)
    expect(response.data).toMatchObject({ code: 404, error_code: 'RESOURCE_NOT_FOUND', message: '路径 /api/unknown 未找到' })
  })

  it('刷新图表数据并清理图表缓存', async () => {
    app.source.candles.set('BTC:hour', makeCandles('BTC', [1, 2]))
    await app.store.set('crypto:chart:ETH:day:100', '[]')

    const response = await http.post('/api/refresh_charts')

    expect(response.status).toBe(200)
    expect(response.data.data).toEqual({
      candles_stored: 2,
      failures: [],
      counts: { minute: 0, hour: 2, day: 0 },
      cleared_cache_keys: 1,
    })
  })

  it('刷新全部失败返回 502', async () => {
    for (const key of ['BTC:minute', 'BTC:hour', 'BTC:day', 'ETH:minute', 'ETH:hour', 'ETH:day']) {
      app.source.candles.set(key, new Error('upstream down'))
    }

    const response = await http.post('/api/refresh_charts')
    expect(response.status).toBe(502)
    expect(response.data.error_code).toBe('EXTERNAL_API_ERROR')
  })

  it('缓存统计与清理', async () => {
    await app.store.set('crypto:price:BTC', '{}')
    await app.store.set('crypto:chart:BTC:hour:100', '[]')

    const stats = await http.get('/api/cache/stats')
    expect(stats.data.data).toMatchObject({ price_keys: 1, chart_keys: 1, total_keys: 2 })

    const status = await http.get('/api/cache/status')
    expect(status.data.data).toEqual(stats.data.data)

    const cleared = await http.post('/api/cache/clear', { type: 'charts' })
    expect(cleared.status).toBe(200)
    expect(cleared.data.data).toEqual({ type: 'charts', cleared: 1 })

    const all = await http.post('/api/cache/clear')
    expect(all.data.data).toEqual({ type: 'all', cleared: 1 })
  })

  it('不支持的缓存类型返回 400', async () => {
    const response = await http.post('/api/cache/clear', { type: 'everything' })

    expect(response.status).toBe(400)
    expect(response.data.error_code).toBe('INVALID_CACHE_TYPE')
  })

  it('Redis 不可用时缓存统计返回 503', async () => {
    app.store.failing = true

    const response = await http.get('/api/cache/stats')
    expect(response.status).toBe(503)
  })

  it('请求体不是合法JSON时返回 400', async () => {
    const response = await http.post('/api/cache/clear', '{"type":', {
      headers: { 'Content-Type': 'application/json' },
    })

    expect(response.status).toBe(400)
    expect(response.data.error_code).toBe('JSON_PARSE_ERROR')
  })

  it('页面与静态文件', async () => {
    const page = await http.get('/kline', { responseType: 'text' })
    expect(page.status).toBe(200)
    expect(page.headers['content-type']).toContain('text/html')
    expect(page.data).toContain('K线')

    const script = await http.get('/static/js/config.js', { responseType: 'text' })
    expect(script.status).toBe(200)
    expect(script.data).toContain('/api/latest_prices')
  })
})

describe('限流', () => {
  let app: TestApp
  let http: AxiosInstance

  beforeEach(async () => {
    app = await startTestApp({ rateLimitEnabled: true, now: NOW })
    http = axios.create({ baseURL: app.baseUrl, validateStatus: () => true })
  })

  afterEach(async () => {
    await app.close()
  })

  it('超过每分钟次数返回 429', async () => {
    const statuses: number[] = []
    for (let i = 0; i < 6; i++) {
      statuses.push((await http.post('/api/refresh_charts')).status)
    }

    expect(statuses).toEqual([200, 200, 200, 200, 200, 429])

    const limited = await http.post('/api/refresh_charts')
    expect(limited.headers['x-ratelimit-limit']).toBe('5')
    expect(limited.headers['retry-after']).toBe('60')
    expect(limited.data).toMatchObject({ success: false, code: 429, error_code: 'RATE_LIMIT_EXCEEDED' })
  })

  it('各接口独立计数', async () => {
    for (let i = 0; i < 5; i++) {
      await http.post('/api/refresh_charts')
    }

    const response = await http.get('/api/kline_data')
    expect(response.status).toBe(200)
    expect(response.headers['x-ratelimit-remaining']).toBe('9')
  })

  it('Redis 不可用时放行', async () => {
    app.store.failing = true

    const response = await http.get('/api/kline_data')
    expect(response.status).toBe(200)
    expect(response.headers['x-ratelimit-limit']).toBeUndefined()
  })
})
