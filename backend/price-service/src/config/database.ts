import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from '@/db/schema';
import { config } from '@/config/env';
import { getLogger } from '@/utils/logger';

const logger = getLogger('database');

export type Db = ReturnType<typeof drizzle<typeof schema>>;

class DatabaseService {
  private static instance: DatabaseService;
  private pool: Pool;
  private db: Db;
  private connected: boolean = false;

  private constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 10,
      connectionTimeoutMillis: 5000,
      idleTimeoutMillis: 30000,
    });

    // 空闲连接出错不应导致进程退出
    this.pool.on('error', (err) => {
      logger.error('PostgreSQL pool error:', err);
      this.connected = false;
    });

    this.db = drizzle(this.pool, { schema });
  }

  public static getInstance(): DatabaseService {
    if (!DatabaseService.instance) {
      DatabaseService.instance = new DatabaseService(config.databaseUrl);
    }
    return DatabaseService.instance;
  }

  public getClient(): Db {
    return this.db;
  }

  public isConnected(): boolean {
    return this.connected;
  }

  public async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
      logger.info('Database connected');
    } catch (error) {
      logger.error('Failed to connect to database:', error);
      throw error;
    }
  }

  /**
   * 校验表结构已由 drizzle-kit 同步，缺表时提示先执行 db:init
   */
  public async verifySchema(): Promise<void> {
    const result = await this.pool.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = current_schema() AND table_name = ANY($1)`,
      [schema.REQUIRED_TABLES]
    );
    const missing = schema.findMissingTables(result.rows.map(row => row.table_name));
    if (missing.length > 0) {
      throw new Error(`Missing tables: ${missing.join(', ')}. Run "npm run db:init" first.`);
    }
    logger.info('Database schema verified');
  }

  /**
   * 删除所有表（仅用于初始化脚本，随后由 drizzle-kit push 重建）
   */
  public async dropTables(): Promise<void> {
    await this.db.execute(sql`DROP TABLE IF EXISTS ${schema.priceHistory}, ${schema.cryptoPrices}`);
    logger.warn('Database tables dropped, all price data removed');
  }

  public async disconnect(): Promise<void> {
    try {
      await this.pool.end();
      this.connected = false;
      logger.info('Database disconnected');
    } catch (error) {
      logger.error('Failed to disconnect from database:', error);
      throw error;
    }
  }

  public async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      this.connected = true;
      return true;
    } catch (error) {
      logger.error('Database health check failed:', error);
      this.connected = false;
      return false;
    }
  }
}

export const db = DatabaseService.getInstance();
