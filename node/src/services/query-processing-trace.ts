// node/src/services/query-processing-trace.ts: per-request stage timings returned in the result's debug block
import { randomBytes } from 'crypto';
import type { StageName } from '@/types/core';

export interface StageTiming {
  name: StageName;
  durationMs: number;
  error?: string;
}

export class QueryProcessingTrace {
  readonly traceId = `qp_${randomBytes(8).toString('hex')}`;
  readonly startedAt: number;
  private readonly stages: StageTiming[] = [];
  private finishedAt?: number;

  constructor(
    readonly sessionId: string,
    private readonly now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  /** Records a stage that began at `startedAt` and has just ended. */
  record(name: StageName, startedAt: number, error?: string): void {
    this.stages.push(error ? { name, durationMs: this.now() - startedAt, error } : { name, durationMs: this.now() - startedAt });
  }

  finish(): number {
    if (this.finishedAt === undefined) this.finishedAt = this.now();
    return this.finishedAt - this.startedAt;
  }

  timings(): StageTiming[] {
    return [...this.stages];
  }
}
