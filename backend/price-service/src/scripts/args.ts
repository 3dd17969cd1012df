import { NGINX_ACTIONS, type NginxAction, isNginxAction } from '@/services/nginx.service';
import { DEFAULT_BASE_URL } from '@/services/endpointChecker.service';

export interface NginxCliOptions {
  action: NginxAction | null;
  nginxPath: string | null;
  configPath: string | null;
  probeUrl: string | null;
  help: boolean;
  errors: string[];
}

export const nginxUsage = (): string => `
Nginx 进程管理

Usage:
  npm run nginx -- <${NGINX_ACTIONS.join('|')}> [options]

Options:
  --nginx-path <DIR>   Nginx 安装目录 (默认 /usr/local/nginx)
  --config <FILE>      配置文件 (默认 <nginx-path>/conf/nginx.conf)
  --probe-url <URL>    状态检查的HTTP地址 (默认 http://localhost)
  --help, -h           显示帮助
`.trim();

export const parseNginxArgs = (argv: string[]): NginxCliOptions => {
  const opts: NginxCliOptions = {
    action: null,
    nginxPath: null,
    configPath: null,
    probeUrl: null,
    help: false,
    errors: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      opts.help = true;
    } else if (arg === '--nginx-path') {
      opts.nginxPath = argv[++i] ?? null;
    } else if (arg === '--config') {
      opts.configPath = argv[++i] ?? null;
    } else if (arg === '--probe-url') {
      opts.probeUrl = argv[++i] ?? null;
    } else if (arg.startsWith('-')) {
      opts.errors.push(`未知参数: ${arg}`);
    } else if (opts.action === null && isNginxAction(arg)) {
      opts.action = arg;
    } else {
      opts.errors.push(`无效操作: ${arg}`);
    }
  }

  if (!opts.help && opts.action === null && opts.errors.length === 0) {
    opts.errors.push('缺少操作参数');
  }

  return opts;
};

export interface CheckerCliOptions {
  baseUrl: string;
  help: boolean;
}

export const parseCheckerArgs = (argv: string[]): CheckerCliOptions => {
  const opts: CheckerCliOptions = { baseUrl: DEFAULT_BASE_URL, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      opts.help = true;
    } else if (arg === '--base-url') {
      opts.baseUrl = argv[++i] ?? opts.baseUrl;
    }
  }

  // 去掉末尾斜杠，路径统一以 / 开头
  opts.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  return opts;
};
