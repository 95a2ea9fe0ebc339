import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FaqPipeline } from '../src/pipeline/faq-pipeline';
import { PipelineStatus } from '../src/pipeline/types';
import { createDocument } from '../src/document/document';
import type { Chunk } from '../src/chunking/types';
import { ConfigError, EmptyDocumentError } from '../src/errors/index';
import type { GenerationAdapter, GenerationParams, RawCandidate } from '../src/generation/types';
import { RejectionReason } from '../src/quality/types';
import { setSilentMode } from '../src/output/logger';
import type { TokenUsageStats } from '../src/types/token-usage';

const TEXT = 'Alpha one.\n\nBeta two.\n\nGamma three.';
const SMALL_CHUNKS = { maxChunkChars: 25, overlapChars: 5 };

type Pair = Pick<RawCandidate, 'question' | 'answer'>;

class ScriptedAdapter implements GenerationAdapter {
  readonly defaultModel = 'fake-model';
  readonly calls: Array<{ chunk: Chunk; params: GenerationParams }> = [];

  constructor(
    private readonly script: (chunk: Chunk) => Promise<Pair[]>,
    private readonly stats?: TokenUsageStats
  ) {}

  async generate(chunk: Chunk, params: GenerationParams): Promise<RawCandidate[]> {
    this.calls.push({ chunk, params });
    const pairs = await this.script(chunk);
    return pairs.map((pair) => ({
      ...pair,
      sourceChunkIndex: chunk.index,
      charSpan: [chunk.startOffset, chunk.endOffset],
    }));
  }

  usage(): TokenUsageStats {
    return this.stats ?? { totalInputTokens: 0, totalOutputTokens: 0 };
  }
}

function byChunk(pairs: Record<number, Pair[]>): (chunk: Chunk) => Promise<Pair[]> {
  return (chunk) => Promise.resolve(pairs[chunk.index] ?? []);
}

describe('FaqPipeline', () => {
  beforeEach(() => {
    setSilentMode(true);
  });

  afterEach(() => {
    setSilentMode(false);
  });

  it('turns a document into merged, ranked FAQ entries', async () => {
    const adapter = new ScriptedAdapter(
      byChunk({
        0: [{ question: 'What is X?', answer: 'X is a widget' }],
        1: [
          { question: "What's X?", answer: 'X is a widget used in Y' },
          { question: 'What is the main topic?', answer: 'Widgets.' },
        ],
      })
    );
    const pipeline = new FaqPipeline({ adapter, config: SMALL_CHUNKS });

    const result = await pipeline.run(createDocument(TEXT, 'widgets.md'));

    expect(result.status).toBe(PipelineStatus.COMPLETED);
    expect(result.chunks.map((c) => [c.startOffset, c.endOffset])).toEqual([
      [0, 23],
      [23, 35],
    ]);
    expect(result.entries).toEqual([
      {
        question: "What's X?",
        answer: '[chunk 1] X is a widget used in Y\n\n[chunk 0] X is a widget',
        sourceChunks: [0, 1],
        confidence: 0.4778,
        clusterSize: 2,
        answerMerged: true,
      },
    ]);
    expect(result.rejected.map((c) => [c.question, c.rejectedReason])).toEqual([
      ['What is the main topic?', RejectionReason.BOILERPLATE],
    ]);
    expect(result.summary).toMatchObject({
      source: 'widgets.md',
      candidates: 3,
      accepted: 2,
      rejectedByReason: { Boilerplate: 1 },
      clusters: 1,
      entries: 1,
    });
    expect(result.summary.run.chunksSucceeded).toBe(2);
  });

  it('passes generation settings to the adapter', async () => {
    const adapter = new ScriptedAdapter(byChunk({}));
    await new FaqPipeline({ adapter, config: { ...SMALL_CHUNKS, maxFaqsPerChunk: 2, temperature: 0.3 } }).run(
      createDocument(TEXT, 'widgets.md')
    );

    expect(adapter.calls.map((c) => c.params)).toEqual([
      { maxFaqsPerChunk: 2, model: 'fake-model', temperature: 0.3 },
      { maxFaqsPerChunk: 2, model: 'fake-model', temperature: 0.3 },
    ]);
  });

  it('prefers the configured model over the adapter default', async () => {
    const adapter = new ScriptedAdapter(byChunk({}));
    await new FaqPipeline({ adapter, config: { ...SMALL_CHUNKS, model: 'custom-model' } }).run(
      createDocument(TEXT, 'widgets.md')
    );

    expect(adapter.calls[0]?.params.model).toBe('custom-model');
  });

  it('reports an empty document without calling the adapter', async () => {
    const adapter = new ScriptedAdapter(byChunk({}));

    const result = await new FaqPipeline({ adapter }).run(createDocument('  \n\n  ', 'blank.txt'));

    expect(result.status).toBe(PipelineStatus.EMPTY);
    expect(adapter.calls).toHaveLength(0);
    expect(result.entries).toEqual([]);
    if (result.status !== PipelineStatus.EMPTY) return;
    expect(result.error).toBeInstanceOf(EmptyDocumentError);
    expect(result.error.message).toBe('Document blank.txt produced no chunks');
    expect(result.summary.chunking.totalChunks).toBe(0);
  });

  it('rejects invalid configuration before any model call', () => {
    const adapter = new ScriptedAdapter(byChunk({}));

    expect(() => new FaqPipeline({ adapter, config: { maxChunkChars: 400, overlapChars: 500 } })).toThrow(
      ConfigError
    );
    expect(() => new FaqPipeline({ adapter, config: { similarityThreshold: 1.5 } })).toThrow(
      'Invalid pipeline configuration: similarityThreshold: Number must be less than or equal to 1'
    );
    expect(adapter.calls).toHaveLength(0);
  });

  it('returns a partial result when the run is aborted', async () => {
    const controller = new AbortController();
    const adapter = new ScriptedAdapter((chunk) => {
      if (chunk.index === 0) return Promise.resolve([{ question: 'What is X?', answer: 'X is a widget' }]);
      controller.abort(new Error('user stop'));
      return new Promise<Pair[]>(() => undefined);
    });
    const pipeline = new FaqPipeline({ adapter, config: { ...SMALL_CHUNKS, generationConcurrency: 1 } });

    const result = await pipeline.run(createDocument(TEXT, 'widgets.md'), { signal: controller.signal });

    expect(result.status).toBe(PipelineStatus.PARTIAL);
    expect(result.entries.map((e) => [e.question, e.confidence])).toEqual([['What is X?', 0.2473]]);
    expect(result.summary.run.failures).toEqual([
      { chunkIndex: 1, kind: 'Cancelled', message: 'Run aborted: user stop' },
    ]);
  });

  it('applies maxFaqs after clustering', async () => {
    const adapter = new ScriptedAdapter(
      byChunk({
        0: [{ question: 'What is X?', answer: 'X is a widget' }],
        1: [{ question: 'Which regions are supported?', answer: 'Berlin and Paris, from version 2.' }],
      })
    );

    const result = await new FaqPipeline({ adapter, config: { ...SMALL_CHUNKS, maxFaqs: 1 } }).run(
      createDocument(TEXT, 'widgets.md')
    );

    expect(result.entries.map((e) => e.question)).toEqual(['Which regions are supported?']);
    expect(result.summary.clusters).toBe(2);
    expect(result.summary.entries).toBe(1);
  });

  it('includes token usage from the adapter', async () => {
    const stats: TokenUsageStats = { totalInputTokens: 1200, totalOutputTokens: 300, totalCost: 0.0054 };
    const adapter = new ScriptedAdapter(byChunk({}), stats);

    const result = await new FaqPipeline({ adapter, config: SMALL_CHUNKS }).run(createDocument(TEXT, 'widgets.md'));

    expect(result.summary.tokenUsage).toEqual(stats);
  });

  it('gives the same entries for the same input', async () => {
    const script = byChunk({
      0: [{ question: 'What is X?', answer: 'X is a widget' }],
      1: [{ question: "What's X?", answer: 'X is a widget used in Y' }],
    });
    const run = (): Promise<unknown> =>
      new FaqPipeline({ adapter: new ScriptedAdapter(script), config: { ...SMALL_CHUNKS, generationConcurrency: 2 } })
        .run(createDocument(TEXT, 'widgets.md'))
        .then((r) => r.entries);

    expect(await run()).toEqual(await run());
  });
});
