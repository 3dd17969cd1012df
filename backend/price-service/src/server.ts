import type { Server } from 'http';
import { config } from '@/config/env';
import { db } from '@/config/database';
import { redis } from '@/config/redis';
import { createApp } from '@/app';
import { createScheduler, createServices } from '@/services';
import { TaskScheduler } from '@/services/scheduler.service';
import { handleUncaughtException, handleUnhandledRejection } from '@/middleware/errorHandler';
import { logger, logSystemInfo } from '@/utils/logger';

// 处理未捕获的异常
process.on('uncaughtException', handleUncaughtException);
process.on('unhandledRejection', handleUnhandledRejection);

class App {
  private server?: Server;
  private scheduler?: TaskScheduler;

  private async initializeDatabase(): Promise<void> {
    try {
      await db.connect();
      await db.verifySchema();
      logger.info('Database initialized successfully');
    } catch (error) {
      logger.error('Database initialization failed:', error);
      throw error;
    }
  }

  /**
   * 后台连接 Redis，不阻塞启动；连接成功前缓存与限流按不可用处理
   */
  private initializeRedis(): void {
    redis
      .connect()
      .then(() => logger.info('Redis initialized successfully'))
      .catch((error: unknown) => {
        logger.warn('Redis initialization failed, continuing without cache:', error);
      });
  }

  public async start(): Promise<void> {
    await this.initializeDatabase();
    this.initializeRedis();

    const services = createServices();
    const app = createApp({
      config,
      ...services,
      rateLimitStore: redis,
    });

    // 监听所有网络接口
    this.server = app.listen(config.port, '0.0.0.0', () => {
      logger.info('🚀 Crypto price monitor started successfully!');
      logger.info(`📡 Server running on port ${config.port} (all interfaces)`);
      logger.info(`🌍 Environment: ${config.nodeEnv}`);
      logger.info(`🔗 Health check: http://localhost:${config.port}/api/health`);

      // 记录系统信息
      logSystemInfo();
    });

    if (config.scheduler.enabled) {
      this.scheduler = createScheduler(services);
      this.scheduler.start();
    } else {
      logger.info('Scheduler disabled (ENABLE_SCHEDULER=false)');
    }

    process.on('SIGTERM', () => void this.shutdown('SIGTERM'));
    process.on('SIGINT', () => void this.shutdown('SIGINT'));
  }

  /**
   * 优雅关闭：停止接收请求，等待任务结束，断开数据库与Redis
   */
  private async shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    // 强制退出超时
    setTimeout(() => {
      logger.error('Forced shutdown due to timeout');
      process.exit(1);
    }, 30000).unref();

    try {
      await new Promise<void>((resolve, reject) => {
        if (!this.server) return resolve();
        this.server.close(error => (error ? reject(error) : resolve()));
      });
      await this.scheduler?.stop();
      await db.disconnect();
      await redis.disconnect();

      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  }
}

new App().start().catch((error: unknown) => {
  logger.error('Application startup failed:', error);
  process.exit(1);
});
