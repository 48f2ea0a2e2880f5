import {
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { drizzle, MySql2Database } from 'drizzle-orm/mysql2';
import { createPool, Pool } from 'mysql2/promise';
import { toNumber } from '../config/env.validation';
import * as schema from './schema';

export const DATABASE_POOL = 'DATABASE_POOL';
export const DATABASE_CONNECTION = 'DATABASE_CONNECTION';

export type Database = MySql2Database<typeof schema>;

@Global()
@Module({
  providers: [
    {
      provide: DATABASE_POOL,
      useFactory: (configService: ConfigService): Pool =>
        createPool({
          host: configService.get<string>('DB_HOST', 'localhost'),
          port: toNumber(configService.get('DB_PORT'), 3306),
          user: configService.get<string>('DB_USER', 'root'),
          password: configService.get<string>('DB_PASSWORD', ''),
          database: configService.get<string>('DB_NAME', 'memoire_rag_db'),
          waitForConnections: true,
          connectionLimit: toNumber(configService.get('DB_POOL_MAX'), 10),
          queueLimit: 0,
          charset: 'utf8mb4',
        }),
      inject: [ConfigService],
    },
    {
      provide: DATABASE_CONNECTION,
      useFactory: (pool: Pool): Database =>
        drizzle(pool, { schema, mode: 'default' }),
      inject: [DATABASE_POOL],
    },
  ],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log('MySQL pool closed');
  }
}
