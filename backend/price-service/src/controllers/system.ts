import type { Request, Response } from 'express';
import { CryptoCacheService } from '@/services/cache.service';
import { SystemStatusService } from '@/services/systemStatus.service';
import { BusinessError, ServiceUnavailableError } from '@/middleware/errorHandler';
import { checkBody } from '@/middleware/validation';
import { cacheClearSchema } from '@/utils/validation';
import { sendSuccess } from '@/utils/response';
import { getLogger } from '@/utils/logger';

const logger = getLogger('system');

class SystemController {
  constructor(
    private readonly status: SystemStatusService,
    private readonly cache: CryptoCacheService
  ) {}

  health = async (req: Request, res: Response) => {
    sendSuccess(req, res, {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  };

  /**
   * 数据库与Redis连通性
   */
  systemStatus = async (req: Request, res: Response) => {
    const status = await this.status.getStatus();
    sendSuccess(req, res, status);
  };

  cacheStats = async (req: Request, res: Response) => {
    try {
      const stats = await this.cache.getStats();
      sendSuccess(req, res, stats);
    } catch (error) {
      logger.error('Failed to read cache stats', { error });
      throw new ServiceUnavailableError('Redis');
    }
  };

  /**
   * 清理缓存，type 为 all / prices / charts
   */
  cacheClear = async (req: Request, res: Response) => {
    const { error, value } = checkBody(cacheClearSchema, req);
    if (error) {
      throw new BusinessError(error.details[0]?.message ?? '不支持的缓存类型', 'INVALID_CACHE_TYPE');
    }

    let cleared: number;
    try {
      cleared = await this.cache.clear(value.type);
    } catch (clearError) {
      logger.error('Failed to clear cache', { error: clearError });
      throw new ServiceUnavailableError('Redis');
    }

    sendSuccess(req, res, { type: value.type, cleared }, '缓存已清理');
  };
}

export default SystemController;
