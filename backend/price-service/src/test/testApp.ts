import type { Server } from 'http'
import { createApp } from '@/app'
import { CryptoCacheService } from '@/services/cache.service'
import { MarketService } from '@/services/market.service'
import { AnalysisService } from '@/services/analysis.service'
import { PriceCollector } from '@/services/collector.service'
import { SystemStatusService } from '@/services/systemStatus.service'
import { MemoryCacheStore } from './memoryCacheStore'
import { InMemoryPriceRepository } from './inMemoryPriceRepository'
import { FakeMarketSource } from './fixtures'

export interface TestApp {
  baseUrl: string
  store: MemoryCacheStore
  repository: InMemoryPriceRepository
  source: FakeMarketSource
  database: { healthy: boolean, healthCheck(): Promise<boolean> }
  close(): Promise<void>
}

/**
 * 在随机端口启动应用，依赖全部替换为内存实现
 */
export const startTestApp = async (options: { rateLimitEnabled?: boolean, now?: number } = {}): Promise<TestApp> => {
  const now = options.now ?? Date.now()
  const clock = () => new Date(now)
  const store = new MemoryCacheStore(() => now)
  const repository = new InMemoryPriceRepository()
  const source = new FakeMarketSource()
  const database = {
    healthy: true,
    async healthCheck() {
      return this.healthy
    },
  }

  const cache = new CryptoCacheService(store, { priceTtlSeconds: 60, chartTtlSeconds: 300 })
  const app = createApp({
    config: {
      allowedOrigins: ['http://localhost:5000'],
      frontendDir: 'frontend',
      rateLimitEnabled: options.rateLimitEnabled ?? false,
    },
    cache,
    market: new MarketService(repository, cache, clock),
    analysis: new AnalysisService(repository, cache, clock),
    collector: new PriceCollector(source, repository, cache, { clock }),
    status: new SystemStatusService(database, store, clock),
    rateLimitStore: store,
  })

  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening))
  })
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('test server has no TCP address')
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    store,
    repository,
    source,
    database,
    close: () => new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()))
    }),
  }
}
