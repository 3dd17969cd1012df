/**
 * 手动执行一次采集
 *
 * Usage:
 *   npm run collect               # 实时报价 + K线 + 分析报告
 *   npm run collect -- realtime   # 仅实时报价
 *   npm run collect -- history    # 仅K线
 *   npm run collect -- analysis   # 仅分析报告
 */
import { db } from '@/config/database';
import { redis } from '@/config/redis';
import { createServices } from '@/services';
import { errorMessage } from '@/middleware/errorHandler';

const TASKS = ['realtime', 'history', 'analysis'] as const;
const REDIS_CONNECT_TIMEOUT_MS = 3000;
type Task = typeof TASKS[number];

const isTask = (value: string): value is Task => (TASKS as readonly string[]).includes(value);

async function collect(tasks: Task[]): Promise<boolean> {
  await db.connect();
  try {
    await redis.connect(REDIS_CONNECT_TIMEOUT_MS);
  } catch (error) {
    console.warn(`⚠️  Redis 不可用，跳过缓存: ${errorMessage(error)}`);
  }

  const { collector, analysis } = createServices();
  let ok = true;

  try {
    if (tasks.includes('realtime')) {
      const result = await collector.collectRealtime();
      console.log(`${result.success ? '✅' : '❌'} 实时报价: 存储 ${result.stored.join(', ') || '无'}，跳过 ${result.skipped.join(', ') || '无'}，失败 ${result.failed.join(', ') || '无'}`);
      ok = ok && result.success;
    }

    if (tasks.includes('history')) {
      const result = await collector.collectHistory();
      console.log(`${result.success ? '✅' : '❌'} K线: 写入 ${result.candlesStored} 条，分钟 ${result.counts.minute} / 小时 ${result.counts.hour} / 日 ${result.counts.day}`);
      if (result.failures.length > 0) {
        console.log(`   失败: ${result.failures.join(', ')}`);
      }
      ok = ok && result.success;
    }

    if (tasks.includes('analysis')) {
      const report = await analysis.refreshReport();
      for (const item of report.symbols) {
        console.log(`📈 ${item.symbol}: 价格 ${item.latest_price ?? '-'}，趋势 ${item.trend}，RSI ${item.rsi?.toFixed(2) ?? '-'}`);
      }
    }
  } finally {
    await redis.disconnect();
    await db.disconnect();
  }

  return ok;
}

const requested = process.argv.slice(2).filter(isTask);

collect(requested.length > 0 ? requested : [...TASKS])
  .then(ok => process.exit(ok ? 0 : 1))
  .catch((error: unknown) => {
    console.error('❌ 采集失败:', error);
    process.exit(1);
  });
