import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '@/middleware/errorHandler';
import { getLogger } from '@/utils/logger';

const logger = getLogger('checker');

export type CheckKind = 'page' | 'api' | 'static' | 'dependency';
export type FailureKind = 'transport' | 'status' | 'payload';

export interface CheckFailure {
  kind: FailureKind;
  detail: string;
}

export interface CheckResult {
  name: string;
  path: string;
  kind: CheckKind;
  passed: boolean;
  durationMs: number;
  failure?: CheckFailure;
}

export interface CheckReport {
  baseUrl: string;
  results: CheckResult[];
  total: number;
  passed: number;
  failed: number;
  success: boolean;
}

export const PAGE_CHECKS = [
  { path: '/', marker: '加密货币价格监控系统' },
  { path: '/bitcoin', marker: '比特币' },
  { path: '/ethereum', marker: '以太坊' },
  { path: '/kline', marker: 'K线' },
] as const;

export const API_PATHS = [
  '/api/health',
  '/api/latest_prices',
  '/api/chart_data',
  '/api/btc_data',
  '/api/eth_data',
  '/api/kline_data',
  '/api/system/status',
] as const;

export const STATIC_PATHS = [
  '/static/css/styles.css',
  '/static/js/config.js',
  '/static/js/crypto.js',
  '/static/js/app.js',
] as const;

export const STATUS_PATH = '/api/system/status';
export const DEPENDENCIES = ['database', 'redis'] as const;

export const DEFAULT_BASE_URL = 'http://localhost:5000';
const REQUEST_TIMEOUT_MS = 10000;

type Fetched =
  | { ok: true; status: number; body: string }
  | { ok: false; failure: CheckFailure };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseJson = (text: string): { ok: true; value: unknown } | { ok: false; error: string } => {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
};

/**
 * 接口联调检查：顺序请求，单次超时10秒，不重试
 */
export class EndpointChecker {
  private readonly client: AxiosInstance;

  constructor(public readonly baseUrl: string = DEFAULT_BASE_URL, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: baseUrl,
      timeout: REQUEST_TIMEOUT_MS,
    });
  }

  private async fetch(path: string): Promise<Fetched> {
    try {
      const response = await this.client.get<string>(path, {
        responseType: 'text',
        validateStatus: () => true,
      });
      if (response.status !== 200) {
        return { ok: false, failure: { kind: 'status', detail: `HTTP ${response.status}` } };
      }
      return { ok: true, status: response.status, body: String(response.data ?? '') };
    } catch (error) {
      return { ok: false, failure: { kind: 'transport', detail: errorMessage(error) } };
    }
  }

  private async timed(
    name: string,
    path: string,
    kind: CheckKind,
    check: () => Promise<CheckFailure | null>
  ): Promise<CheckResult> {
    const startedAt = Date.now();
    const failure = await check();
    const result: CheckResult = {
      name,
      path,
      kind,
      passed: failure === null,
      durationMs: Date.now() - startedAt,
    };
    if (failure) {
      result.failure = failure;
      logger.warn(`Check failed: ${name} (${failure.kind}: ${failure.detail})`);
    }
    return result;
  }

  public checkPage(path: string, marker: string): Promise<CheckResult> {
    return this.timed(`页面 ${path}`, path, 'page', async () => {
      const fetched = await this.fetch(path);
      if (!fetched.ok) return fetched.failure;
      if (!fetched.body.includes(marker)) {
        return { kind: 'payload', detail: `页面缺少关键字 "${marker}"` };
      }
      return null;
    });
  }

  public checkApi(path: string): Promise<CheckResult> {
    return this.timed(`接口 ${path}`, path, 'api', async () => {
      const fetched = await this.fetch(path);
      if (!fetched.ok) return fetched.failure;
      const parsed = parseJson(fetched.body);
      if (!parsed.ok) {
        return { kind: 'payload', detail: `响应不是有效的JSON: ${parsed.error}` };
      }
      return null;
    });
  }

  public checkStatic(path: string): Promise<CheckResult> {
    return this.timed(`静态文件 ${path}`, path, 'static', async () => {
      const fetched = await this.fetch(path);
      if (!fetched.ok) return fetched.failure;
      if (fetched.body.length === 0) {
        return { kind: 'payload', detail: '文件内容为空' };
      }
      return null;
    });
  }

  /**
   * 依赖连通性：data.database 与 data.redis 必须为 connected
   */
  public async checkDependencies(): Promise<CheckResult[]> {
    const startedAt = Date.now();
    const fetched = await this.fetch(STATUS_PATH);

    let data: Record<string, unknown> | null = null;
    let failure: CheckFailure | null = null;

    if (!fetched.ok) {
      failure = fetched.failure;
    } else {
      const parsed = parseJson(fetched.body);
      if (!parsed.ok) {
        failure = { kind: 'payload', detail: `响应不是有效的JSON: ${parsed.error}` };
      } else if (!isRecord(parsed.value) || !isRecord(parsed.value.data)) {
        failure = { kind: 'payload', detail: '响应缺少 data 字段' };
      } else {
        data = parsed.value.data;
      }
    }

    const durationMs = Date.now() - startedAt;

    return DEPENDENCIES.map(dependency => {
      const result: CheckResult = {
        name: `依赖 ${dependency}`,
        path: STATUS_PATH,
        kind: 'dependency',
        passed: false,
        durationMs,
      };

      const state = data ? data[dependency] : undefined;
      if (failure) {
        result.failure = failure;
      } else if (state !== 'connected') {
        result.failure = { kind: 'payload', detail: `${dependency} 状态为 ${String(state)}` };
      } else {
        result.passed = true;
      }

      if (result.failure) {
        logger.warn(`Check failed: ${result.name} (${result.failure.kind}: ${result.failure.detail})`);
      }
      return result;
    });
  }

  public async run(): Promise<CheckReport> {
    const results: CheckResult[] = [];

    for (const page of PAGE_CHECKS) {
      results.push(await this.checkPage(page.path, page.marker));
    }
    for (const path of API_PATHS) {
      results.push(await this.checkApi(path));
    }
    for (const path of STATIC_PATHS) {
      results.push(await this.checkStatic(path));
    }
    results.push(...(await this.checkDependencies()));

    const passed = results.filter(result => result.passed).length;
    return {
      baseUrl: this.baseUrl,
      results,
      total: results.length,
      passed,
      failed: results.length - passed,
      success: passed === results.length,
    };
  }
}
