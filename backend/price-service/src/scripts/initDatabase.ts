/**
 * 数据库初始化
 *
 * 建表由 drizzle-kit push 完成，本脚本负责清表与校验：
 *   npm run db:init   # drizzle-kit push 后校验表结构
 *   npm run db:reset  # 删除所有表后重新 push
 */
import { db } from '@/config/database';

async function initDatabase(drop: boolean) {
  try {
    console.log('🔧 连接数据库...');
    await db.connect();

    if (drop) {
      console.log('⚠️  删除所有表...');
      await db.dropTables();
      console.log('✅ 表已删除，等待 drizzle-kit push 重建');
    } else {
      await db.verifySchema();
      console.log('✅ 数据库初始化完成');
      console.log('   表: crypto_prices, price_history');
    }
    return true;
  } catch (error) {
    console.error('❌ 数据库初始化失败:', error);
    return false;
  } finally {
    await db.disconnect();
  }
}

initDatabase(process.argv.includes('--drop'))
  .then(ok => process.exit(ok ? 0 : 1))
  .catch((error: unknown) => {
    console.error('❌ 脚本执行失败:', error);
    process.exit(1);
  });
