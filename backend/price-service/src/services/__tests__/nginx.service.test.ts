import { describe, it, expect, beforeEach } from 'vitest'
import { NginxController, defaultNginxOptions, isNginxAction } from '../nginx.service'
import { FakeNginxRunner } from '@/test/fakeProcessRunner'

const BINARY = '/opt/nginx/sbin/nginx'
const CONFIG = '/opt/nginx/conf/nginx.conf'

describe('NginxController', () => {
  let runner: FakeNginxRunner
  let files: Set<string>
  let sleeps: number[]
  let controller: NginxController

  beforeEach(() => {
    runner = new FakeNginxRunner()
    files = new Set([BINARY, CONFIG])
    sleeps = []
    controller = new NginxController(defaultNginxOptions('/opt/nginx'), {
      runner,
      fileExists: file => files.has(file),
      sleep: async ms => {
        sleeps.push(ms)
      },
      probe: async url => ({ url, reachable: true, ok: true, status: 200 }),
    })
  })

  it('默认路径', () => {
    expect(defaultNginxOptions()).toMatchObject({
      nginxPath: '/usr/local/nginx',
      configPath: '/usr/local/nginx/conf/nginx.conf',
      startWaitMs: 2000,
    })
    expect(controller.binaryPath).toBe(BINARY)
    expect(isNginxAction('restart')).toBe(true)
    expect(isNginxAction('reload')).toBe(false)
  })

  it('启动后等待并确认进程存在', async () => {
    const result = await controller.start()

    expect(result).toEqual({ success: true, message: 'Nginx 启动成功 (PID: 1000, 1001)' })
    expect(runner.calls).toContain(`${BINARY} -c ${CONFIG}`)
    expect(sleeps).toEqual([2000])
  })

  it('已在运行时启动不重复拉起进程', async () => {
    runner.pids = [42]

    const result = await controller.start()

    expect(result.success).toBe(true)
    expect(result.message).toContain('已在运行')
    expect(runner.calls).toEqual(['pgrep -x nginx'])
  })

  it('缺少配置文件或可执行文件时启动失败', async () => {
    files.delete(CONFIG)
    expect(await controller.start()).toEqual({ success: false, message: `配置文件不存在: ${CONFIG}` })

    files.add(CONFIG)
    files.delete(BINARY)
    expect(await controller.start()).toEqual({ success: false, message: `Nginx 可执行文件不存在: ${BINARY}` })
  })

  it('启动命令失败或进程未存活时报告失败', async () => {
    runner.startFails = true
    const failed = await controller.start()
    expect(failed.success).toBe(false)
    expect(failed.message).toContain('bind()')

    runner.startFails = false
    runner.startExitsImmediately = true
    expect(await controller.start()).toEqual({ success: false, message: 'Nginx 启动后未检测到进程' })
  })

  it('未运行时停止直接成功', async () => {
    expect(await controller.stop()).toEqual({ success: true, message: 'Nginx 未在运行' })
    expect(runner.calls).toEqual(['pgrep -x nginx'])
  })

  it('优雅停止', async () => {
    runner.pids = [42]

    expect(await controller.stop()).toEqual({ success: true, message: 'Nginx 已停止' })
    expect(runner.calls).toContain(`${BINARY} -c ${CONFIG} -s quit`)
    expect(runner.calls).not.toContain('pkill -9 -x nginx')
  })

  it('优雅停止失败时强制结束', async () => {
    runner.pids = [42]
    runner.quitFails = true

    expect(await controller.stop()).toEqual({ success: true, message: 'Nginx 已停止' })
    expect(runner.calls).toContain('pkill -9 -x nginx')
  })

  it('quit 后进程仍存活时强制结束', async () => {
    runner.pids = [42]
    runner.quitIgnored = true

    expect((await controller.stop()).success).toBe(true)
    expect(runner.calls).toContain('pkill -9 -x nginx')
  })

  it('强制结束后仍存活则停止失败', async () => {
    runner.pids = [42]
    runner.quitIgnored = true
    runner.killIgnored = true

    expect(await controller.stop()).toEqual({ success: false, message: 'Nginx 停止失败，进程仍在运行 (PID: 42)' })
  })

  it('重启后进程处于运行状态', async () => {
    runner.pids = [42]

    const result = await controller.restart()

    expect(result.success).toBe(true)
    expect(runner.pids).toEqual([1000, 1001])
  })

  it('停止失败时重启不再尝试启动', async () => {
    runner.pids = [42]
    runner.quitIgnored = true
    runner.killIgnored = true

    const result = await controller.restart()

    expect(result.success).toBe(false)
    expect(result.message).toContain('重启失败')
    expect(runner.calls).not.toContain(`${BINARY} -c ${CONFIG}`)
  })

  it('状态汇总进程、内存、文件与HTTP检查', async () => {
    runner.pids = [42, 43]
    files.delete(CONFIG)

    const status = await controller.status()

    expect(status).toEqual({
      running: true,
      pids: [42, 43],
      memoryKb: 4096,
      configPath: CONFIG,
      configExists: false,
      binaryPath: BINARY,
      binaryExists: true,
      probe: { url: 'http://localhost', reachable: true, ok: true, status: 200 },
    })
  })

  it('未运行时不统计内存', async () => {
    const status = await controller.status()
    expect(status.running).toBe(false)
    expect(status.memoryKb).toBeNull()
    expect(runner.calls.some(call => call.startsWith('ps '))).toBe(false)
  })

  it('配置检查返回退出码', async () => {
    expect(await controller.testConfig()).toEqual({
      success: true,
      exitCode: 0,
      output: 'nginx: configuration file test is successful',
      message: '配置文件检查通过',
    })

    runner.configValid = false
    const failed = await controller.testConfig()
    expect(failed.success).toBe(false)
    expect(failed.exitCode).toBe(1)
    expect(runner.calls).toContain(`${BINARY} -t -c ${CONFIG}`)
  })
})
