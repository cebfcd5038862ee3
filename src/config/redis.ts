import { Redis, RedisOptions } from 'ioredis';
import { RedisConfig } from './index';
import { logger } from '../utils/logger';

/**
 * Owns the Redis connection used by the session store. Constructed once at
 * startup and torn down on shutdown.
 */
export class RedisManager {
  private client?: Redis;

  constructor(private readonly config: RedisConfig) {}

  async connect(): Promise<Redis> {
    if (this.client) {
      return this.client;
    }

    const client = this.createConnection();
    this.setupEventHandlers(client);
    await client.connect();
    await client.ping();

    this.client = client;
    logger.info('Redis connection established');
    return client;
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = undefined;
      await client.quit();
      logger.info('Redis connection closed');
    }
  }

  private createConnection(): Redis {
    const options: RedisOptions = {
      lazyConnect: true,
      maxRetriesPerRequest: 3,
      connectTimeout: 10000,
      commandTimeout: 5000,
      db: this.config.db,
    };

    logger.info('Redis connection settings', {
      host: this.config.url ? undefined : this.config.host,
      port: this.config.url ? undefined : this.config.port,
      db: this.config.db,
      usesUrl: !!this.config.url,
      hasPassword: !!this.config.password,
    });

    if (this.config.url) {
      return new Redis(this.config.url, options);
    }

    return new Redis({
      ...options,
      host: this.config.host,
      port: this.config.port,
      password: this.config.password,
    });
  }

  private setupEventHandlers(client: Redis): void {
    client.on('ready', () => {
      logger.info('Redis ready');
    });

    client.on('error', (error: Error) => {
      logger.error('Redis connection error', { error });
    });

    client.on('close', () => {
      logger.warn('Redis connection closed by server');
    });

    client.on('reconnecting', () => {
      logger.info('Redis reconnecting');
    });
  }
}
