import { Injectable, Logger } from '@nestjs/common';
import { getEncoding, Tiktoken } from 'js-tiktoken';

/**
 * Token Counter Service
 * cl100k_base, the encoding of the OpenAI embedding models. Counts are
 * informational (stored on chunks), chunk windows are cut on characters.
 */
@Injectable()
export class TokenCounterService {
  private readonly logger = new Logger(TokenCounterService.name);
  private readonly encoding: Tiktoken;
  private readonly ENCODING_NAME = 'cl100k_base';

  constructor() {
    this.encoding = getEncoding(this.ENCODING_NAME);
    this.logger.log(
      `Token counter initialized with encoding: ${this.ENCODING_NAME}`,
    );
  }

  countTokens(text: string): number {
    return this.encoding.encode(text).length;
  }
}
