import type { Chunk } from '../chunking/types';
import type { LLMProvider } from '../providers/llm-provider';
import {
  FAQ_GENERATION_JSON_SCHEMA,
  FAQ_GENERATION_SCHEMA_NAME,
} from '../schemas/faq-generation-schema';
import { TemplateRenderer, FAQ_GENERATION_TEMPLATE } from '../prompts/template-renderer';
import { locateEvidence } from '../locate/evidence-locator';
import { TokenUsageTracker, type PricingConfig, type TokenUsageStats } from '../types/token-usage';
import {
  FaqforgeError,
  GenerationError,
  ParseError,
  ValidationError,
  handleUnknownError,
} from '../errors/index';
import { debug } from '../output/logger';
import { FaqRequestBuilder, type RequestBuilder } from './request-builder';
import { parseGenerationResponse } from './response-parser';
import type { CharSpan, GenerationAdapter, GenerationParams, RawCandidate } from './types';

export interface LLMGenerationAdapterOptions {
  renderer?: TemplateRenderer;
  pricing?: PricingConfig;
  /** Appended to every generation prompt, e.g. "Use British spelling." */
  houseStyle?: string;
}

/**
 * Generation adapter over a structured-output LLM provider. Renders the FAQ
 * prompt for each chunk, parses the reply and grounds each pair's evidence
 * quote back to document offsets.
 */
export class LLMGenerationAdapter implements GenerationAdapter {
  private readonly renderer: TemplateRenderer;
  private readonly tracker: TokenUsageTracker;
  private readonly requests: RequestBuilder;

  constructor(private readonly provider: LLMProvider, options: LLMGenerationAdapterOptions = {}) {
    this.renderer = options.renderer ?? new TemplateRenderer();
    this.requests = new FaqRequestBuilder({ houseStyle: options.houseStyle });
    this.tracker = new TokenUsageTracker(options.pricing);
  }

  get defaultModel(): string {
    return this.provider.model;
  }

  async generate(chunk: Chunk, params: GenerationParams): Promise<RawCandidate[]> {
    const rendered = this.renderer.render(
      FAQ_GENERATION_TEMPLATE,
      this.renderer.createContext(chunk, params.maxFaqsPerChunk)
    );
    const request = this.requests.build(chunk, rendered);

    let data: unknown;
    try {
      const result = await this.provider.runPromptStructured<unknown>(
        request.content,
        request.prompt,
        { name: FAQ_GENERATION_SCHEMA_NAME, schema: FAQ_GENERATION_JSON_SCHEMA },
        { model: params.model, temperature: params.temperature }
      );
      this.tracker.record(result.usage);
      data = result.data;
    } catch (e: unknown) {
      throw this.toChunkError(e, chunk.index);
    }

    const pairs = parseGenerationResponse(data, chunk.index).slice(0, params.maxFaqsPerChunk);
    debug(`Chunk ${chunk.index}: ${pairs.length} FAQ pair(s) from ${this.provider.model}`);

    return pairs.map((pair) => ({
      question: pair.question,
      answer: pair.answer,
      sourceChunkIndex: chunk.index,
      charSpan: this.spanFor(chunk, pair.evidence),
    }));
  }

  usage(): TokenUsageStats {
    return this.tracker.stats();
  }

  private spanFor(chunk: Chunk, evidence: string | undefined): CharSpan {
    if (evidence !== undefined) {
      const match = locateEvidence(chunk, evidence);
      if (match) return match.charSpan;
    }
    return [chunk.startOffset, chunk.endOffset];
  }

  // Malformed replies are parse failures; everything else counts as a failed call
  private toChunkError(e: unknown, chunkIndex: number): FaqforgeError {
    if (e instanceof ValidationError) {
      return new ParseError(e.message, chunkIndex);
    }
    if (e instanceof GenerationError) {
      return new GenerationError(e.message, chunkIndex, e.originalError ?? e);
    }
    const err = handleUnknownError(e, 'FAQ generation');
    return new GenerationError(err.message, chunkIndex, e);
  }
}
