import { errorMessage } from '@/middleware/errorHandler';
import { getLogger } from '@/utils/logger';

const logger = getLogger('scheduler');

export interface IntervalTask {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
  runOnStart?: boolean;
}

export interface DailyTask {
  name: string;
  // 本地时间 HH:MM
  at: string;
  run: () => Promise<unknown>;
}

/**
 * 距离下一次 HH:MM 的毫秒数（已过则顺延到明天）
 */
export const msUntilDaily = (at: string, now: Date): number => {
  const match = /^(\d{1,2}):(\d{2})$/.exec(at);
  if (!match) {
    throw new Error(`Invalid daily time "${at}", expected HH:MM`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new Error(`Invalid daily time "${at}", expected HH:MM`);
  }

  const next = new Date(now);
  next.setHours(hours, minutes, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next.getTime() - now.getTime();
};

/**
 * 进程内定时任务调度
 *
 * 同名任务不会重叠执行：上一轮未结束时本轮跳过。任务异常只记录日志。
 */
export class TaskScheduler {
  private timers: NodeJS.Timeout[] = [];
  private running = new Set<string>();
  private inFlight = new Set<Promise<void>>();
  private started = false;

  constructor(
    private readonly intervalTasks: IntervalTask[],
    private readonly dailyTasks: DailyTask[] = []
  ) {}

  public isStarted(): boolean {
    return this.started;
  }

  public isRunning(name: string): boolean {
    return this.running.has(name);
  }

  public start(): void {
    if (this.started) {
      logger.info('Scheduler already running');
      return;
    }
    this.started = true;

    for (const task of this.intervalTasks) {
      this.timers.push(setInterval(() => void this.trigger(task.name, task.run), task.intervalMs));
      if (task.runOnStart) {
        void this.trigger(task.name, task.run);
      }
      logger.info(`Scheduled "${task.name}" every ${Math.round(task.intervalMs / 1000)}s`);
    }

    for (const task of this.dailyTasks) {
      this.scheduleDaily(task);
      logger.info(`Scheduled "${task.name}" daily at ${task.at}`);
    }
  }

  private scheduleDaily(task: DailyTask): void {
    const timer = setTimeout(() => {
      this.timers = this.timers.filter(item => item !== timer);
      void this.trigger(task.name, task.run);
      if (this.started) this.scheduleDaily(task);
    }, msUntilDaily(task.at, new Date()));
    this.timers.push(timer);
  }

  /**
   * 立即执行一次任务，返回本次执行的 Promise（被跳过时立即完成）
   */
  public trigger(name: string, run: () => Promise<unknown>): Promise<void> {
    if (this.running.has(name)) {
      logger.warn(`Task "${name}" still running, skipping this round`);
      return Promise.resolve();
    }

    this.running.add(name);
    const startedAt = Date.now();

    const execution = run()
      .then(() => {
        logger.info(`Task "${name}" finished in ${Date.now() - startedAt}ms`);
      })
      .catch((error: unknown) => {
        logger.error(`Task "${name}" failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running.delete(name);
        this.inFlight.delete(execution);
      });

    this.inFlight.add(execution);
    return execution;
  }

  /**
   * 按名称立即执行一个已注册的任务
   */
  public runNow(name: string): Promise<void> {
    const task = [...this.intervalTasks, ...this.dailyTasks].find(item => item.name === name);
    if (!task) {
      return Promise.reject(new Error(`Unknown task "${name}"`));
    }
    return this.trigger(task.name, task.run);
  }

  /**
   * 停止所有定时器并等待执行中的任务结束
   */
  public async stop(): Promise<void> {
    this.started = false;
    this.timers.forEach(timer => clearTimeout(timer));
    this.timers = [];
    await Promise.all([...this.inFlight]);
    logger.info('Scheduler stopped');
  }
}
