import { Module } from '@nestjs/common';
import { GenerationModule } from '../generation/generation.module';
import { IngestionModule } from '../ingestion/ingestion.module';
import { StorageModule } from '../storage/storage.module';
import { VectorIndexModule } from '../vector-index/vector-index.module';
import { PROJECT_REPOSITORY } from './projects.constants';
import { ProjectsController } from './projects.controller';
import { ProjectsService } from './projects.service';
import { DrizzleProjectRepository } from './repositories/drizzle-project.repository';

@Module({
  imports: [GenerationModule, IngestionModule, StorageModule, VectorIndexModule],
  controllers: [ProjectsController],
  providers: [
    { provide: PROJECT_REPOSITORY, useClass: DrizzleProjectRepository },
    ProjectsService,
  ],
})
export class ProjectsModule {}
