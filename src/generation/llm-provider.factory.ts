/**
 * LLM Provider Factory
 * Chat models for drafting: Anthropic (default), OpenAI, Ollama
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import { ChatOpenAI } from '@langchain/openai';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ConfigurationError } from '../common/errors';
import { LLM_PROVIDERS } from '../config/env.validation';

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export interface ChatModelOptions {
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

export interface ChatModelFactory {
  createChatModel(options?: ChatModelOptions): BaseChatModel;
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o',
  ollama: 'llama3',
};

@Injectable()
export class LLMProviderFactory implements ChatModelFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  createChatModel(options: ChatModelOptions = {}): BaseChatModel {
    const provider = this.getProvider();
    const model = this.getModelName(provider);

    this.logger.log(`Creating chat model: ${provider}/${model}`);

    switch (provider) {
      case 'anthropic':
        return this.createAnthropicModel(model, options);
      case 'openai':
        return this.createOpenAIModel(model, options);
      case 'ollama':
        return this.createOllamaModel(model, options);
    }
  }

  getProvider(): LLMProvider {
    const provider = this.configService.get<string>('LLM_PROVIDER', 'anthropic');
    const known = LLM_PROVIDERS.find((candidate) => candidate === provider);

    if (!known) {
      this.logger.warn(
        `Invalid LLM provider: ${provider}, defaulting to anthropic`,
      );
      return 'anthropic';
    }
    return known;
  }

  getModelName(provider: LLMProvider): string {
    return this.configService.get<string>(
      `LLM_MODEL_${provider.toUpperCase()}`,
      DEFAULT_MODELS[provider],
    );
  }

  private createAnthropicModel(
    model: string,
    options: ChatModelOptions,
  ): ChatAnthropic {
    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');
    if (!apiKey) {
      throw new ConfigurationError(
        'ANTHROPIC_API_KEY is required for Anthropic provider',
      );
    }

    return new ChatAnthropic({
      model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: options.maxRetries ?? 2,
      apiKey,
    });
  }

  private createOpenAIModel(
    model: string,
    options: ChatModelOptions,
  ): ChatOpenAI {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new ConfigurationError(
        'OPENAI_API_KEY is required for OpenAI provider',
      );
    }

    return new ChatOpenAI({
      model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: options.maxRetries ?? 2,
      apiKey,
    });
  }

  private createOllamaModel(
    model: string,
    options: ChatModelOptions,
  ): ChatOllama {
    return new ChatOllama({
      model,
      temperature: options.temperature,
      numPredict: options.maxTokens,
      baseUrl: this.configService.get<string>(
        'OLLAMA_BASE_URL',
        'http://localhost:11434',
      ),
    });
  }
}
