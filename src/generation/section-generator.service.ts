/**
 * Section Generator Service
 * Drafts memoir sections and RC criteria through the configured chat model
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { BaseMessage } from '@langchain/core/messages';
import { GenerationProviderError, toError } from '../common/errors';
import { isRecord } from '../common/utils';
import {
  CHAT_MODEL_FACTORY,
  CRITERIA_MAX_TOKENS,
  CRITERIA_TEMPERATURE,
  SECTION_MAX_TOKENS,
  SECTION_TEMPERATURE,
} from './generation.constants';
import type {
  ChatModelFactory,
  ChatModelOptions,
} from './llm-provider.factory';
import {
  SectionPromptBuilder,
  type ReferenceChunk,
} from './section-prompt.builder';

export interface GenerationResult {
  content: string;
  inputTokens: number;
  outputTokens: number;
}

@Injectable()
export class SectionGeneratorService {
  private readonly logger = new Logger(SectionGeneratorService.name);

  constructor(
    @Inject(CHAT_MODEL_FACTORY)
    private readonly chatModelFactory: ChatModelFactory,
    private readonly promptBuilder: SectionPromptBuilder,
  ) {}

  async generate(
    sectionType: string,
    rcContext: string | null,
    referenceChunks: ReferenceChunk[],
  ): Promise<GenerationResult> {
    const prompt = this.promptBuilder.build(
      sectionType,
      rcContext,
      referenceChunks,
    );

    this.logger.log(
      `Generating section ${sectionType}: prompt ${prompt.length} chars, ` +
        `${referenceChunks.length} references`,
    );

    try {
      return await this.complete(prompt, {
        temperature: SECTION_TEMPERATURE,
        maxTokens: SECTION_MAX_TOKENS,
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error(
        `Generation failed for section ${sectionType}: ${cause.message}`,
        cause.stack,
      );
      throw new GenerationProviderError(
        `Failed to generate section '${sectionType}': ${cause.message}`,
        cause,
      );
    }
  }

  async extractRcCriteria(rcText: string): Promise<GenerationResult> {
    this.logger.log(`Extracting RC criteria from ${rcText.length} chars`);

    try {
      return await this.complete(this.promptBuilder.buildCriteriaPrompt(rcText), {
        temperature: CRITERIA_TEMPERATURE,
        maxTokens: CRITERIA_MAX_TOKENS,
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Criteria extraction failed: ${cause.message}`);
      throw new GenerationProviderError(
        `Failed to extract RC criteria: ${cause.message}`,
        cause,
      );
    }
  }

  private async complete(
    prompt: string,
    options: ChatModelOptions,
  ): Promise<GenerationResult> {
    const startTime = Date.now();
    const model = this.chatModelFactory.createChatModel(options);
    const response = await model.invoke(prompt);

    const content = this.textOf(response);
    const inputTokens = response.usage_metadata?.input_tokens ?? 0;
    const outputTokens = response.usage_metadata?.output_tokens ?? 0;

    this.logger.log(
      `Completion: ${content.length} chars in ${Date.now() - startTime}ms ` +
        `(${inputTokens} in / ${outputTokens} out tokens)`,
    );

    return { content, inputTokens, outputTokens };
  }

  private textOf(message: BaseMessage): string {
    if (typeof message.content === 'string') {
      return message.content.trim();
    }

    return message.content
      .map((part: unknown) => {
        if (typeof part === 'string') {
          return part;
        }
        return isRecord(part) && typeof part.text === 'string' ? part.text : '';
      })
      .join('')
      .trim();
  }
}
