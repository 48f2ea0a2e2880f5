import { Module } from '@nestjs/common';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [VectorIndexModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
