import type { CommandResult, ProcessRunner } from '@/services/nginx.service'

/**
 * 模拟 nginx 进程状态的命令执行器
 */
export class FakeNginxRunner implements ProcessRunner {
  public pids: number[] = []
  public calls: string[] = []
  public startFails = false
  // 启动命令成功但进程随即退出
  public startExitsImmediately = false
  public quitFails = false
  // quit 成功但进程未退出
  public quitIgnored = false
  public killIgnored = false
  public configValid = true
  private nextPid = 1000

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push([command, ...args].join(' '))

    if (command === 'pgrep') {
      return this.pids.length > 0
        ? { code: 0, stdout: `${this.pids.join('\n')}\n`, stderr: '' }
        : { code: 1, stdout: '', stderr: '' }
    }

    if (command === 'ps') {
      return { code: 0, stdout: this.pids.map(() => ' 2048').join('\n'), stderr: '' }
    }

    if (command === 'pkill') {
      if (!this.killIgnored) this.pids = []
      return { code: 0, stdout: '', stderr: '' }
    }

    if (args.includes('-t')) {
      return this.configValid
        ? { code: 0, stdout: '', stderr: 'nginx: configuration file test is successful\n' }
        : { code: 1, stdout: '', stderr: 'nginx: [emerg] unexpected "}"\n' }
    }

    if (args.includes('-s')) {
      if (this.quitFails) return { code: 1, stdout: '', stderr: 'nginx: [error] invalid PID number' }
      if (!this.quitIgnored) this.pids = []
      return { code: 0, stdout: '', stderr: '' }
    }

    if (this.startFails) {
      return { code: 1, stdout: '', stderr: 'nginx: [emerg] bind() to 0.0.0.0:80 failed' }
    }
    if (!this.startExitsImmediately) {
      this.pids = [this.nextPid, this.nextPid + 1]
      this.nextPid += 2
    }
    return { code: 0, stdout: '', stderr: '' }
  }
}
