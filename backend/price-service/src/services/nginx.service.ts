import fs from 'fs';
import path from 'path';
import { execFile } from 'child_process';
import axios from 'axios';
import { errorMessage } from '@/middleware/errorHandler';
import { getLogger } from '@/utils/logger';

const logger = getLogger('nginx');

export const NGINX_ACTIONS = ['start', 'stop', 'restart', 'status', 'test'] as const;
export type NginxAction = typeof NGINX_ACTIONS[number];

export const isNginxAction = (value: string): value is NginxAction =>
  (NGINX_ACTIONS as readonly string[]).includes(value);

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

/**
 * 基于 execFile 的命令执行，非零退出码不抛错；命令不存在时返回 127
 */
export const execFileRunner: ProcessRunner = {
  run: (command, args) =>
    new Promise(resolve => {
      execFile(command, args, { timeout: 15000 }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ code: 0, stdout, stderr });
          return;
        }
        const code = typeof error.code === 'number' ? error.code : 127;
        resolve({ code, stdout, stderr: stderr || error.message });
      });
    }),
};

export interface ProbeResult {
  url: string;
  reachable: boolean;
  ok: boolean;
  status?: number;
  error?: string;
}

export type HttpProbe = (url: string) => Promise<ProbeResult>;

export const httpProbe: HttpProbe = async (url) => {
  try {
    const response = await axios.get(url, {
      timeout: 5000,
      responseType: 'text',
      validateStatus: () => true,
    });
    return { url, reachable: true, ok: response.status < 400, status: response.status };
  } catch (error) {
    return { url, reachable: false, ok: false, error: errorMessage(error) };
  }
};

export interface NginxOptions {
  // Nginx 安装目录，可执行文件位于 sbin/nginx
  nginxPath: string;
  configPath: string;
  probeUrl: string;
  startWaitMs: number;
  stopWaitMs: number;
}

export interface NginxDependencies {
  runner: ProcessRunner;
  fileExists: (file: string) => boolean;
  sleep: (ms: number) => Promise<void>;
  probe: HttpProbe;
}

export interface ControlResult {
  success: boolean;
  message: string;
}

export interface NginxStatus {
  running: boolean;
  pids: number[];
  memoryKb: number | null;
  configPath: string;
  configExists: boolean;
  binaryPath: string;
  binaryExists: boolean;
  probe: ProbeResult;
}

export interface ConfigTestResult extends ControlResult {
  exitCode: number;
  output: string;
}

export const DEFAULT_NGINX_PATH = '/usr/local/nginx';

export const defaultNginxOptions = (nginxPath: string = DEFAULT_NGINX_PATH): NginxOptions => ({
  nginxPath,
  configPath: path.join(nginxPath, 'conf', 'nginx.conf'),
  probeUrl: 'http://localhost',
  startWaitMs: 2000,
  stopWaitMs: 2000,
});

const defaultDependencies: NginxDependencies = {
  runner: execFileRunner,
  fileExists: (file) => fs.existsSync(file),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
  probe: httpProbe,
};

/**
 * Nginx 进程管理：启动、停止、重启、状态、配置检查
 *
 * 状态切换依靠固定等待后重新检查进程。
 */
export class NginxController {
  private readonly deps: NginxDependencies;

  constructor(
    private readonly options: NginxOptions = defaultNginxOptions(),
    deps: Partial<NginxDependencies> = {}
  ) {
    this.deps = { ...defaultDependencies, ...deps };
  }

  public get binaryPath(): string {
    return path.join(this.options.nginxPath, 'sbin', 'nginx');
  }

  public async findPids(): Promise<number[]> {
    const result = await this.deps.runner.run('pgrep', ['-x', 'nginx']);
    if (result.code !== 0) {
      // pgrep 无匹配时退出码为 1
      if (result.code !== 1) {
        logger.warn(`pgrep exited with ${result.code}: ${result.stderr.trim()}`);
      }
      return [];
    }

    return result.stdout
      .split('\n')
      .map(line => Number.parseInt(line.trim(), 10))
      .filter(pid => Number.isInteger(pid) && pid > 0);
  }

  public async isRunning(): Promise<boolean> {
    return (await this.findPids()).length > 0;
  }

  /**
   * 进程常驻内存（KB，多进程求和）
   */
  public async memoryUsageKb(pids: number[]): Promise<number | null> {
    if (pids.length === 0) return null;

    const result = await this.deps.runner.run('ps', ['-o', 'rss=', '-p', pids.join(',')]);
    if (result.code !== 0) {
      logger.warn(`ps exited with ${result.code}: ${result.stderr.trim()}`);
      return null;
    }

    return result.stdout
      .split('\n')
      .map(line => Number.parseInt(line.trim(), 10))
      .filter(Number.isFinite)
      .reduce((sum, rss) => sum + rss, 0);
  }

  public async start(): Promise<ControlResult> {
    const pids = await this.findPids();
    if (pids.length > 0) {
      return { success: true, message: `Nginx 已在运行 (PID: ${pids.join(', ')})` };
    }

    if (!this.deps.fileExists(this.options.configPath)) {
      return { success: false, message: `配置文件不存在: ${this.options.configPath}` };
    }
    if (!this.deps.fileExists(this.binaryPath)) {
      return { success: false, message: `Nginx 可执行文件不存在: ${this.binaryPath}` };
    }

    logger.info(`Starting nginx with ${this.options.configPath}`);
    const result = await this.deps.runner.run(this.binaryPath, ['-c', this.options.configPath]);
    if (result.code !== 0) {
      return { success: false, message: `Nginx 启动失败: ${result.stderr.trim() || `退出码 ${result.code}`}` };
    }

    await this.deps.sleep(this.options.startWaitMs);

    const started = await this.findPids();
    if (started.length === 0) {
      return { success: false, message: 'Nginx 启动后未检测到进程' };
    }
    return { success: true, message: `Nginx 启动成功 (PID: ${started.join(', ')})` };
  }

  public async stop(): Promise<ControlResult> {
    if (!(await this.isRunning())) {
      return { success: true, message: 'Nginx 未在运行' };
    }

    let graceful = false;
    if (this.deps.fileExists(this.binaryPath)) {
      logger.info('Sending quit signal to nginx');
      const result = await this.deps.runner.run(this.binaryPath, ['-c', this.options.configPath, '-s', 'quit']);
      graceful = result.code === 0;
      if (!graceful) {
        logger.warn(`Graceful stop failed (${result.code}): ${result.stderr.trim()}`);
      }
    }

    if (graceful) {
      await this.deps.sleep(this.options.stopWaitMs);
    }

    if (!graceful || (await this.isRunning())) {
      logger.warn('Forcing nginx termination');
      await this.deps.runner.run('pkill', ['-9', '-x', 'nginx']);
      await this.deps.sleep(this.options.stopWaitMs);
    }

    const remaining = await this.findPids();
    if (remaining.length > 0) {
      return { success: false, message: `Nginx 停止失败，进程仍在运行 (PID: ${remaining.join(', ')})` };
    }
    return { success: true, message: 'Nginx 已停止' };
  }

  /**
   * 停止后启动，停止失败时不再尝试启动
   */
  public async restart(): Promise<ControlResult> {
    const stopped = await this.stop();
    if (!stopped.success) {
      return { success: false, message: `重启失败: ${stopped.message}` };
    }
    return this.start();
  }

  public async status(): Promise<NginxStatus> {
    const pids = await this.findPids();
    const [memoryKb, probe] = await Promise.all([
      this.memoryUsageKb(pids),
      this.deps.probe(this.options.probeUrl),
    ]);

    return {
      running: pids.length > 0,
      pids,
      memoryKb,
      configPath: this.options.configPath,
      configExists: this.deps.fileExists(this.options.configPath),
      binaryPath: this.binaryPath,
      binaryExists: this.deps.fileExists(this.binaryPath),
      probe,
    };
  }

  /**
   * nginx -t 配置检查
   */
  public async testConfig(): Promise<ConfigTestResult> {
    const result = await this.deps.runner.run(this.binaryPath, ['-t', '-c', this.options.configPath]);
    // nginx -t 的结果输出在 stderr
    const output = `${result.stderr}${result.stdout}`.trim();
    return {
      success: result.code === 0,
      exitCode: result.code,
      output,
      message: result.code === 0 ? '配置文件检查通过' : `配置文件检查失败 (退出码 ${result.code})`,
    };
  }
}
