import { Module } from '@nestjs/common';
import { CHAT_MODEL_FACTORY } from './generation.constants';
import { LLMProviderFactory } from './llm-provider.factory';
import { SectionGeneratorService } from './section-generator.service';
import { SectionPromptBuilder } from './section-prompt.builder';
import { SectionTypesController } from './section-types.controller';

@Module({
  controllers: [SectionTypesController],
  providers: [
    LLMProviderFactory,
    { provide: CHAT_MODEL_FACTORY, useExisting: LLMProviderFactory },
    SectionPromptBuilder,
    SectionGeneratorService,
  ],
  exports: [SectionGeneratorService],
})
export class GenerationModule {}
