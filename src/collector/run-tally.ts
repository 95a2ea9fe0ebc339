import type { ChunkFailure, ChunkFailureKind, RunSummary } from './types';

/*
 * Per-run accumulator for chunk outcomes. Created fresh for every run and
 * passed along explicitly; nothing here is shared between runs.
 */
export class RunTally {
  private readonly started = new Set<number>();
  private readonly settled = new Set<number>();
  private readonly failures: ChunkFailure[] = [];
  private succeeded = 0;
  private candidates = 0;
  private wasCancelled = false;

  constructor(private readonly totalChunks: number) {}

  get completed(): number {
    return this.settled.size;
  }

  markStarted(chunkIndex: number): void {
    this.started.add(chunkIndex);
  }

  recordSuccess(chunkIndex: number, candidateCount: number): void {
    this.settled.add(chunkIndex);
    this.succeeded += 1;
    this.candidates += candidateCount;
  }

  recordFailure(chunkIndex: number, kind: ChunkFailureKind, message: string): void {
    this.settled.add(chunkIndex);
    this.failures.push({ chunkIndex, kind, message });
    if (kind === 'Cancelled') this.wasCancelled = true;
  }

  /**
   * Marks every chunk without an outcome as cancelled.
   */
  cancelRemaining(chunkIndices: readonly number[], reason: string): void {
    for (const chunkIndex of chunkIndices) {
      if (!this.settled.has(chunkIndex)) {
        this.recordFailure(chunkIndex, 'Cancelled', reason);
      }
    }
  }

  toSummary(): RunSummary {
    const failures = [...this.failures].sort((a, b) => a.chunkIndex - b.chunkIndex);
    const cancelled = failures.filter((f) => f.kind === 'Cancelled').length;
    return {
      totalChunks: this.totalChunks,
      chunksAttempted: this.started.size,
      chunksSucceeded: this.succeeded,
      chunksFailed: failures.length - cancelled,
      chunksCancelled: cancelled,
      candidatesCollected: this.candidates,
      failures,
      cancelled: this.wasCancelled,
    };
  }
}
