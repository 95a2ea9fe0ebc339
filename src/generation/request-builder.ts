import type { Chunk } from '../chunking/types';

export interface FaqRequest {
  prompt: string; // System prompt
  content: string; // User message
}

// Turns a rendered generation prompt and its chunk into the provider request
export interface RequestBuilder {
  build(chunk: Chunk, renderedPrompt: string): FaqRequest;
}

export interface FaqRequestBuilderOptions {
  /** Caller rules for tone, audience or language, appended to every prompt. */
  houseStyle?: string | undefined;
}

export class FaqRequestBuilder implements RequestBuilder {
  private readonly houseStyle: string;

  constructor(options: FaqRequestBuilderOptions = {}) {
    this.houseStyle = (options.houseStyle ?? '').trim();
  }

  build(chunk: Chunk, renderedPrompt: string): FaqRequest {
    const prompt = this.houseStyle
      ? `${renderedPrompt.trimEnd()}\n\nHouse style:\n${this.houseStyle}`
      : renderedPrompt;

    return {
      prompt,
      content: `Excerpt ${chunk.index + 1}:\n\n${chunk.text}`,
    };
  }
}
