import {
  BaseChatModel,
  type BaseChatModelParams,
} from '@langchain/core/language_models/chat_models';
import { AIMessage, type BaseMessage } from '@langchain/core/messages';
import type { ChatResult } from '@langchain/core/outputs';
import type {
  ChatModelFactory,
  ChatModelOptions,
} from '../generation/llm-provider.factory';

export interface FakeChatUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * Chat model answering from a function of the prompt, with fixed usage
 */
export class FakeChatModel extends BaseChatModel {
  readonly prompts: string[] = [];
  failure: Error | null = null;

  constructor(
    private readonly reply: (prompt: string) => string,
    private readonly usage: FakeChatUsage = { inputTokens: 0, outputTokens: 0 },
    fields: BaseChatModelParams = {},
  ) {
    super(fields);
  }

  _llmType(): string {
    return 'fake-chat';
  }

  async _generate(messages: BaseMessage[]): Promise<ChatResult> {
    const prompt = messages
      .map((message) =>
        typeof message.content === 'string' ? message.content : '',
      )
      .join('\n');
    this.prompts.push(prompt);

    if (this.failure) {
      throw this.failure;
    }

    const text = this.reply(prompt);
    return {
      generations: [
        {
          text,
          message: new AIMessage({
            content: text,
            usage_metadata: {
              input_tokens: this.usage.inputTokens,
              output_tokens: this.usage.outputTokens,
              total_tokens: this.usage.inputTokens + this.usage.outputTokens,
            },
          }),
        },
      ],
    };
  }
}

export class FakeChatModelFactory implements ChatModelFactory {
  readonly calls: ChatModelOptions[] = [];

  constructor(readonly model: FakeChatModel) {}

  createChatModel(options: ChatModelOptions = {}): FakeChatModel {
    this.calls.push(options);
    return this.model;
  }
}
