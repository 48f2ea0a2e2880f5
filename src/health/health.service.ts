import { Inject, Injectable, Logger } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { sql } from 'drizzle-orm';
import { toError } from '../common/errors';
import { DATABASE_CONNECTION, type Database } from '../database/database.module';
import { QDRANT_CLIENT } from '../vector-index/vector-index.constants';

export interface HealthStatus {
  status: 'healthy' | 'degraded';
  services: {
    mysql: boolean;
    qdrant: boolean;
  };
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: Database,
    @Inject(QDRANT_CLIENT) private readonly qdrantClient: QdrantClient,
  ) {}

  async check(): Promise<HealthStatus> {
    const [mysql, qdrant] = await Promise.all([
      this.probe('MySQL', () => this.db.execute(sql`select 1`)),
      this.probe('Qdrant', () => this.qdrantClient.getCollections()),
    ]);

    return {
      status: mysql && qdrant ? 'healthy' : 'degraded',
      services: { mysql, qdrant },
    };
  }

  private async probe(name: string, call: () => Promise<unknown>): Promise<boolean> {
    try {
      await call();
      return true;
    } catch (error) {
      this.logger.warn(`${name} health check failed: ${toError(error).message}`);
      return false;
    }
  }
}
