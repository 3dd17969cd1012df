import type { ConnectivityState, SystemStatus } from '@/types/market';
import type { Clock } from '@/services/market.service';

export interface HealthProbe {
  healthCheck(): Promise<boolean>;
}

const toState = async (probe: HealthProbe | null): Promise<ConnectivityState> => {
  if (!probe) return 'disabled';
  return (await probe.healthCheck()) ? 'connected' : 'disconnected';
};

/**
 * 依赖连通性（每次请求实时探测）
 */
export class SystemStatusService {
  constructor(
    private readonly database: HealthProbe,
    private readonly cache: HealthProbe | null,
    private readonly clock: Clock = () => new Date()
  ) {}

  public async getStatus(): Promise<SystemStatus> {
    const [database, redis] = await Promise.all([toState(this.database), toState(this.cache)]);
    return {
      database,
      redis,
      timestamp: this.clock().toISOString(),
    };
  }
}
