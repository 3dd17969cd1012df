/**
 * 接口联调检查
 *
 * Usage:
 *   npm run check:endpoints -- --base-url http://localhost:5000
 */
import { EndpointChecker } from '@/services/endpointChecker.service';
import { parseCheckerArgs } from '@/scripts/args';

const main = async (): Promise<number> => {
  const opts = parseCheckerArgs(process.argv.slice(2));
  if (opts.help) {
    console.log('Usage: npm run check:endpoints -- [--base-url <URL>]');
    return 0;
  }

  console.log(`🔍 检查 ${opts.baseUrl}\n`);

  const report = await new EndpointChecker(opts.baseUrl).run();

  for (const result of report.results) {
    const detail = result.failure ? ` - ${result.failure.kind}: ${result.failure.detail}` : '';
    console.log(`${result.passed ? '✅' : '❌'} ${result.name} (${result.durationMs}ms)${detail}`);
  }

  console.log(`\n📊 共 ${report.total} 项，通过 ${report.passed}，失败 ${report.failed}`);
  console.log(report.success ? '🎉 全部检查通过' : '⚠️  存在失败的检查项');

  return report.success ? 0 : 1;
};

main()
  .then(code => process.exit(code))
  .catch((error: unknown) => {
    console.error('❌ 检查脚本执行失败:', error);
    process.exit(1);
  });
