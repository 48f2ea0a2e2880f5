import { GenerationProviderError } from '../common/errors';
import { FakeChatModel, FakeChatModelFactory } from '../testing/fake-chat-model';
import { SectionGeneratorService } from './section-generator.service';
import { SectionPromptBuilder } from './section-prompt.builder';

describe('SectionGeneratorService', () => {
  let model: FakeChatModel;
  let factory: FakeChatModelFactory;
  let service: SectionGeneratorService;

  beforeEach(() => {
    model = new FakeChatModel(() => '  ## Sécurité\n\nContenu  ', {
      inputTokens: 1200,
      outputTokens: 640,
    });
    factory = new FakeChatModelFactory(model);
    service = new SectionGeneratorService(factory, new SectionPromptBuilder());
  });

  it('returns trimmed content with token usage', async () => {
    const result = await service.generate('securite', 'Contexte RC', []);

    expect(result).toEqual({
      content: '## Sécurité\n\nContenu',
      inputTokens: 1200,
      outputTokens: 640,
    });
    expect(factory.calls).toEqual([{ temperature: 0.7, maxTokens: 4096 }]);
    expect(model.prompts).toHaveLength(1);
    expect(model.prompts[0]).toContain('Contexte RC');
  });

  it('extracts criteria at a lower temperature', async () => {
    await service.extractRcCriteria('Critère 1 : valeur technique 60%');

    expect(factory.calls).toEqual([{ temperature: 0.3, maxTokens: 500 }]);
    expect(model.prompts[0]).toContain('Critère 1 : valeur technique 60%');
  });

  it('wraps provider failures', async () => {
    model.failure = new Error('rate limited');

    await expect(service.generate('planning', null, [])).rejects.toThrow(
      new GenerationProviderError(
        "Failed to generate section 'planning': rate limited",
      ),
    );
    await expect(service.extractRcCriteria('RC')).rejects.toBeInstanceOf(
      GenerationProviderError,
    );
  });
});
