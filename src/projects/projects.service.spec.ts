import { ConfigService } from '@nestjs/config';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { NotFoundError, ValidationError } from '../common/errors';
import { SectionGeneratorService } from '../generation/section-generator.service';
import { SectionPromptBuilder } from '../generation/section-prompt.builder';
import { DocumentExtractorService } from '../ingestion/extract/document-extractor.service';
import { DocxParser } from '../ingestion/extract/parsers/docx.parser';
import { ParserFactory } from '../ingestion/extract/parsers/parser.factory';
import { PdfParser } from '../ingestion/extract/parsers/pdf.parser';
import { FrequencyRepeatedLineDetector } from '../ingestion/normalize/repeated-line.detector';
import { TextNormalizerService } from '../ingestion/normalize/text-normalizer.service';
import { TempFileService } from '../ingestion/temp/temp-file.service';
import { StorageService } from '../storage/storage.service';
import { FakeChatModel, FakeChatModelFactory } from '../testing/fake-chat-model';
import { InMemoryProjectRepository } from '../testing/in-memory-project.repository';
import { InMemoryStorageProvider } from '../testing/in-memory-storage.provider';
import {
  createVectorIndexFixture,
  type VectorIndexFixture,
} from '../testing/vector-index.fixture';
import { ProjectsService } from './projects.service';

const CRITERIA = 'Critères : valeur technique 60 %, prix 40 %';
const SECTION_BODY = '## Sécurité et santé\n\nMesures de prévention.';

describe('ProjectsService', () => {
  let tempBase: string;
  let fixture: VectorIndexFixture;
  let storageProvider: InMemoryStorageProvider;
  let repository: InMemoryProjectRepository;
  let model: FakeChatModel;
  let extractor: DocumentExtractorService;
  let service: ProjectsService;

  beforeEach(async () => {
    tempBase = await mkdtemp(join(tmpdir(), 'projects-'));
    fixture = createVectorIndexFixture();
    storageProvider = new InMemoryStorageProvider();
    repository = new InMemoryProjectRepository();
    model = new FakeChatModel(
      (prompt) =>
        prompt.startsWith('Analyse ce Règlement de Consultation')
          ? CRITERIA
          : SECTION_BODY,
      { inputTokens: 900, outputTokens: 300 },
    );

    const normalizer = new TextNormalizerService(
      new FrequencyRepeatedLineDetector(),
    );
    extractor = new DocumentExtractorService(
      new ParserFactory(new PdfParser(normalizer), new DocxParser(normalizer)),
    );

    service = new ProjectsService(
      repository,
      new StorageService(storageProvider),
      new TempFileService(new ConfigService({ LOAD_TEMP_DIR: tempBase })),
      extractor,
      fixture.vectorIndex,
      new SectionGeneratorService(
        new FakeChatModelFactory(model),
        new SectionPromptBuilder(),
      ),
    );
  });

  afterEach(async () => {
    await rm(tempBase, { recursive: true, force: true });
  });

  async function indexReferences(): Promise<void> {
    await fixture.vectorIndex.upsertChunks('ref-1', [
      {
        content: 'Plan de sécurité et prévention des chutes',
        chunkIndex: 0,
        charStart: 0,
        charEnd: 41,
        metadata: { filename: 'memoire-2022.pdf' },
      },
      {
        content: 'Planning du béton',
        chunkIndex: 1,
        charStart: 41,
        charEnd: 58,
        metadata: { filename: 'memoire-2023.pdf' },
      },
    ]);
    await fixture.vectorIndex.index('ref-1');
  }

  describe('create', () => {
    it('trims the name and starts as a draft', async () => {
      const project = await service.create('  Lycée Jean Moulin  ');

      expect(project.name).toBe('Lycée Jean Moulin');
      expect(project.status).toBe('draft');
      expect(project.rcContext).toBeNull();
    });

    it('rejects a blank name', async () => {
      await expect(service.create('   ')).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('attachRc', () => {
    it('stores the RC and keeps its criteria as context', async () => {
      const project = await service.create('Gymnase');
      jest.spyOn(extractor, 'extract').mockResolvedValue({
        sections: [],
        fullText: 'Article 5 : jugement des offres',
        charCount: 31,
        metadata: {},
      });

      const updated = await service.attachRc(
        project.id,
        'rc.pdf',
        Buffer.from('%PDF'),
      );

      expect(updated.rcContext).toBe(CRITERIA);
      expect(updated.status).toBe('in_progress');
      expect(updated.rcStoragePath?.startsWith(`rc/${project.id}/rc_`)).toBe(
        true,
      );
      expect(storageProvider.objects.size).toBe(1);
      expect(model.prompts[0]).toContain('Article 5 : jugement des offres');
      expect(await readdir(tempBase)).toEqual([]);
    });

    it('rejects unsupported files before storing anything', async () => {
      const project = await service.create('Gymnase');

      await expect(
        service.attachRc(project.id, 'rc.txt', Buffer.from('texte')),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(storageProvider.objects.size).toBe(0);
      expect(model.prompts).toEqual([]);
    });

    it('rejects an RC without extractable text', async () => {
      const project = await service.create('Gymnase');
      jest.spyOn(extractor, 'extract').mockResolvedValue({
        sections: [],
        fullText: '',
        charCount: 0,
        metadata: {},
      });

      await expect(
        service.attachRc(project.id, 'scan.pdf', Buffer.from('%PDF')),
      ).rejects.toThrow('No text could be extracted from scan.pdf');
      expect(storageProvider.objects.size).toBe(0);
    });
  });

  describe('generateSection', () => {
    it('drafts from the closest references and numbers sections', async () => {
      await indexReferences();
      const project = await service.create('Gymnase');

      const first = await service.generateSection(project.id, 'securite');
      const second = await service.generateSection(project.id, 'planning');

      expect(first).toMatchObject({
        projectId: project.id,
        sectionType: 'securite',
        title: 'Sécurité et santé',
        content: SECTION_BODY,
        orderNum: 1,
        inputTokens: 900,
        outputTokens: 300,
      });
      expect(second.orderNum).toBe(2);
      expect(model.prompts[0]).toContain(
        'Extrait de référence 1 (similarité: 1.00, source: memoire-2022.pdf):\n' +
          'Plan de sécurité et prévention des chutes',
      );
      expect(
        (await service.listSections(project.id)).map((s) => s.sectionType),
      ).toEqual(['securite', 'planning']);
    });

    it('applies the similarity threshold to references', async () => {
      await indexReferences();
      const project = await service.create('Gymnase');

      await service.generateSection(project.id, 'securite', {
        similarityThreshold: 0.5,
      });

      expect(model.prompts[0]).toContain('Extrait de référence 1 ');
      expect(model.prompts[0]).not.toContain('Extrait de référence 2 ');
    });

    it('searches with the section description and RC context', async () => {
      const project = await service.create('Gymnase');
      await repository.update(project.id, { rcContext: CRITERIA });

      await service.generateSection(project.id, 'planning');

      expect(fixture.embeddings.queryCalls).toEqual([
        `Planning prévisionnel (Gantt, délais)\n\n${CRITERIA}`,
      ]);
    });

    it('rejects unknown section types without calling the model', async () => {
      const project = await service.create('Gymnase');

      await expect(
        service.generateSection(project.id, 'budget'),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(model.prompts).toEqual([]);
    });

    it('fails with NotFoundError for an unknown project', async () => {
      await expect(
        service.generateSection('missing', 'securite'),
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.listSections('missing')).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });
});
