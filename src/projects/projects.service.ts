/**
 * Projects Service
 *
 * A project carries the consultation rules (RC) of one tender and the
 * memoir sections drafted for it from the indexed reference memoirs.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, ValidationError } from '../common/errors';
import type { Project, Section } from '../database/schema';
import {
  generateStoragePath,
  getFileExtension,
  validateFileType,
} from '../documents/utils/file-validation';
import { SectionGeneratorService } from '../generation/section-generator.service';
import {
  describeSection,
  isSectionType,
  sectionTitle,
  SECTION_TYPES,
} from '../generation/section-types';
import { DocumentExtractorService } from '../ingestion/extract/document-extractor.service';
import { TempFileService } from '../ingestion/temp/temp-file.service';
import { StorageService } from '../storage/storage.service';
import type { SearchOptions } from '../vector-index/types';
import { VectorIndexService } from '../vector-index/vector-index.service';
import {
  PROJECT_REPOSITORY,
  RC_QUERY_CHARS,
  RC_STORAGE_PREFIX,
} from './projects.constants';
import type { ProjectRepository } from './repositories/project.repository';

@Injectable()
export class ProjectsService {
  private readonly logger = new Logger(ProjectsService.name);

  constructor(
    @Inject(PROJECT_REPOSITORY)
    private readonly repository: ProjectRepository,
    private readonly storageService: StorageService,
    private readonly tempFileService: TempFileService,
    private readonly extractor: DocumentExtractorService,
    private readonly vectorIndex: VectorIndexService,
    private readonly generator: SectionGeneratorService,
  ) {}

  async create(name: string): Promise<Project> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('Project name must not be empty');
    }

    const project = await this.repository.create({
      id: uuidv4(),
      name: trimmed,
      status: 'draft',
    });
    this.logger.log(`Created project ${project.id} (${project.name})`);
    return project;
  }

  async findOne(id: string): Promise<Project> {
    const project = await this.repository.findById(id);
    if (!project) {
      throw new NotFoundError('Project', id);
    }
    return project;
  }

  /**
   * Store the RC file, extract its text and keep the evaluation criteria
   * drawn from it as the project's drafting context
   */
  async attachRc(
    projectId: string,
    filename: string,
    bytes: Buffer,
  ): Promise<Project> {
    await this.findOne(projectId);

    const typeCheck = validateFileType(filename);
    if (!typeCheck.valid) {
      throw new ValidationError(typeCheck.error ?? 'Invalid file type');
    }

    const extraction = await this.tempFileService.withTempFile(
      bytes,
      getFileExtension(filename),
      (filePath) => this.extractor.extract(filePath),
    );
    if (!extraction.fullText) {
      throw new ValidationError(`No text could be extracted from ${filename}`);
    }

    const criteria = await this.generator.extractRcCriteria(extraction.fullText);

    const rcStoragePath = generateStoragePath(
      filename,
      `${RC_STORAGE_PREFIX}/${projectId}`,
    );
    await this.storageService.put(rcStoragePath, bytes);

    this.logger.log(
      `Attached RC ${filename} to project ${projectId}: ` +
        `${extraction.charCount} chars, criteria ${criteria.content.length} chars`,
    );

    return this.repository.update(projectId, {
      rcStoragePath,
      rcContext: criteria.content,
      status: 'in_progress',
    });
  }

  /**
   * Draft one memoir section from the references most similar to it
   */
  async generateSection(
    projectId: string,
    sectionType: string,
    options: SearchOptions = {},
  ): Promise<Section> {
    const project = await this.findOne(projectId);

    if (!isSectionType(sectionType)) {
      throw new ValidationError(
        `Unknown section type '${sectionType}'. Valid types: ${Object.keys(SECTION_TYPES).join(', ')}`,
      );
    }

    const query = this.buildQuery(sectionType, project.rcContext);
    const references = await this.vectorIndex.search(query, options);
    const generated = await this.generator.generate(
      sectionType,
      project.rcContext,
      references,
    );

    const orderNum = (await this.repository.maxSectionOrder(projectId)) + 1;
    const section = await this.repository.createSection({
      id: uuidv4(),
      projectId,
      sectionType,
      title: sectionTitle(sectionType),
      content: generated.content,
      orderNum,
      inputTokens: generated.inputTokens,
      outputTokens: generated.outputTokens,
    });

    this.logger.log(
      `Generated section ${sectionType} #${orderNum} for project ${projectId} ` +
        `from ${references.length} references`,
    );
    return section;
  }

  async listSections(projectId: string): Promise<Section[]> {
    await this.findOne(projectId);
    return this.repository.findSections(projectId);
  }

  buildQuery(sectionType: string, rcContext: string | null): string {
    const description = describeSection(sectionType);
    return rcContext
      ? `${description}\n\n${rcContext.slice(0, RC_QUERY_CHARS)}`
      : description;
  }
}
