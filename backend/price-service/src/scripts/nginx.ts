/**
 * Nginx 进程管理脚本
 *
 * Usage:
 *   npm run nginx -- status
 *   npm run nginx -- restart --nginx-path /opt/nginx --config /opt/nginx/conf/nginx.conf
 */
import { NginxController, defaultNginxOptions } from '@/services/nginx.service';
import { nginxUsage, parseNginxArgs } from '@/scripts/args';

const main = async (): Promise<number> => {
  const opts = parseNginxArgs(process.argv.slice(2));

  if (opts.help) {
    console.log(nginxUsage());
    return 0;
  }
  if (opts.errors.length > 0 || opts.action === null) {
    opts.errors.forEach(error => console.error(`❌ ${error}`));
    console.error(nginxUsage());
    return 1;
  }

  const options = defaultNginxOptions(opts.nginxPath ?? undefined);
  if (opts.configPath) options.configPath = opts.configPath;
  if (opts.probeUrl) options.probeUrl = opts.probeUrl;

  const controller = new NginxController(options);

  switch (opts.action) {
    case 'status': {
      const status = await controller.status();
      console.log('📊 Nginx 状态');
      console.log(`   运行状态: ${status.running ? `✅ 运行中 (PID: ${status.pids.join(', ')})` : '❌ 未运行'}`);
      console.log(`   内存占用: ${status.memoryKb === null ? '-' : `${(status.memoryKb / 1024).toFixed(1)} MB`}`);
      console.log(`   配置文件: ${status.configExists ? '✅' : '❌'} ${status.configPath}`);
      console.log(`   可执行文件: ${status.binaryExists ? '✅' : '❌'} ${status.binaryPath}`);
      const probe = status.probe;
      const probeText = probe.reachable ? `HTTP ${probe.status}` : `不可达 (${probe.error})`;
      console.log(`   HTTP检查: ${probe.ok ? '✅' : '❌'} ${probe.url} ${probeText}`);
      return status.running ? 0 : 1;
    }
    case 'test': {
      const result = await controller.testConfig();
      if (result.output) console.log(result.output);
      console.log(`${result.success ? '✅' : '❌'} ${result.message}`);
      return result.success ? 0 : 1;
    }
    case 'start':
    case 'stop':
    case 'restart': {
      const result = await controller[opts.action]();
      console.log(`${result.success ? '✅' : '❌'} ${result.message}`);
      return result.success ? 0 : 1;
    }
  }
};

main()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    console.error('❌ Nginx 管理脚本执行失败:', error);
    process.exit(1);
  });
