import type { Chunk } from '../chunking/types';
import { CancellationError, ParseError, handleUnknownError } from '../errors/index';
import type { CharSpan, GenerationAdapter, GenerationParams, RawCandidate } from '../generation/types';
import { debug, warn } from '../output/logger';
import { RunTally } from './run-tally';
import { runWithConcurrency } from './run-with-concurrency';
import type { ChunkFailureKind, CollectionOptions, CollectionResult } from './types';

function describeAbort(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  // AbortSignal.timeout() aborts with a DOMException named TimeoutError
  if (reason instanceof Error && reason.name === 'TimeoutError') return 'Run timed out';
  if (reason instanceof Error) return `Run aborted: ${reason.message}`;
  return 'Run aborted';
}

/**
 * Settles with `promise`, or rejects with a CancellationError as soon as
 * `signal` aborts. The abandoned call is left to finish on its own and its
 * outcome is dropped.
 */
function abandonOnAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancellationError(describeAbort(signal)));
      return;
    }
    const onAbort = (): void => reject(new CancellationError(describeAbort(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (e: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(e);
      }
    );
  });
}

function combineSignals(options: CollectionOptions): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.timeoutMs !== undefined) signals.push(AbortSignal.timeout(options.timeoutMs));
  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

function isValidSpan(span: CharSpan, windowStart: number, windowEnd: number): boolean {
  const [start, end] = span;
  return (
    Number.isInteger(start) &&
    Number.isInteger(end) &&
    start >= windowStart &&
    end <= windowEnd &&
    start < end
  );
}

/**
 * Pins a candidate to the chunk that produced it. The chunk index always wins
 * over whatever the adapter reported; a span outside the chunk's window
 * (overlap included) falls back to the chunk's own content span.
 */
export function attachProvenance(candidate: RawCandidate, chunk: Chunk): RawCandidate {
  const windowStart = chunk.startOffset - chunk.overlapWithPrev;
  const charSpan: CharSpan = isValidSpan(candidate.charSpan, windowStart, chunk.endOffset)
    ? [candidate.charSpan[0], candidate.charSpan[1]]
    : [chunk.startOffset, chunk.endOffset];

  return {
    question: candidate.question,
    answer: candidate.answer,
    sourceChunkIndex: chunk.index,
    charSpan,
  };
}

function classifyFailure(e: unknown): ChunkFailureKind {
  if (e instanceof CancellationError) return 'Cancelled';
  if (e instanceof ParseError) return 'ParseError';
  return 'GenerationError';
}

/**
 * Calls the adapter once per chunk, at most `concurrency` at a time, and
 * gathers the candidates back in chunk order. A failing chunk is recorded and
 * skipped. On abort or timeout in-flight calls are abandoned, unstarted
 * chunks are marked cancelled, and everything collected so far is returned.
 */
export async function collectCandidates(
  chunks: readonly Chunk[],
  adapter: GenerationAdapter,
  params: GenerationParams,
  options: CollectionOptions
): Promise<CollectionResult> {
  const tally = new RunTally(chunks.length);
  const signal = combineSignals(options);

  const results = await runWithConcurrency(
    chunks,
    options.concurrency,
    async (chunk) => {
      tally.markStarted(chunk.index);
      debug(`Generating candidates for chunk ${chunk.index + 1}/${chunks.length}`);

      let candidates: RawCandidate[] | undefined;
      try {
        const raw = await abandonOnAbort(adapter.generate(chunk, params), signal);
        candidates = raw.map((candidate) => attachProvenance(candidate, chunk));
        tally.recordSuccess(chunk.index, candidates.length);
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Generating candidates for chunk ${chunk.index}`);
        const kind = classifyFailure(e);
        tally.recordFailure(chunk.index, kind, err.message);
        if (kind !== 'Cancelled') {
          warn(`Chunk ${chunk.index} failed (${kind}): ${err.message}`);
        }
      }

      options.onChunkComplete?.({
        chunkIndex: chunk.index,
        completed: tally.completed,
        total: chunks.length,
        ok: candidates !== undefined,
      });
      return candidates;
    },
    signal
  );

  if (signal?.aborted) {
    tally.cancelRemaining(
      chunks.map((c) => c.index),
      describeAbort(signal)
    );
  }

  const candidates = results.flatMap((r) => r ?? []);
  return { candidates, summary: tally.toSummary() };
}
