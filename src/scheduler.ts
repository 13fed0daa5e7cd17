import type { InjectionQueue } from "./injection-queue";
import { buildNarrationPrompt } from "./llm";
import { errorMessage, log, logError } from "./log";
import type { NarrationGenerator } from "./narrator";
import type { InjectedRequest, NarrationTask, TrackMetadata } from "./types";

export type SchedulerHooks = {
  onTriggered?: (task: NarrationTask) => void;
  onQueued?: (item: InjectedRequest, queueLength: number) => void;
  onFailed?: (task: NarrationTask, message: string) => void;
};

export type SchedulerOptions = {
  maxConcurrent?: number;
  hooks?: SchedulerHooks;
};

export class InsertionScheduler {
  private readonly pending: NarrationTask[] = [];
  private readonly maxConcurrent: number;
  private readonly hooks: SchedulerHooks;
  private inFlight = 0;
  private seq = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly generator: NarrationGenerator,
    private readonly queue: InjectionQueue,
    opts: SchedulerOptions = {}
  ) {
    this.maxConcurrent = Math.max(1, opts.maxConcurrent ?? 2);
    this.hooks = opts.hooks ?? {};
  }

  /** Called from the metadata path; never waits on generation. */
  onBatchReady(history: TrackMetadata[], next: TrackMetadata | null): void {
    this.seq += 1;
    const task: NarrationTask = {
      seq: this.seq,
      prompt: buildNarrationPrompt(history, next),
      triggeredAt: new Date().toISOString()
    };
    this.pending.push(task);
    log("narration.triggered", { seq: task.seq, tracks: history.length, pending: this.pending.length, inFlight: this.inFlight });
    this.hooks.onTriggered?.(task);
    this.pump();
  }

  inFlightCount(): number {
    return this.inFlight;
  }

  pendingCount(): number {
    return this.pending.length;
  }

  idle(): Promise<void> {
    if (this.inFlight === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.inFlight < this.maxConcurrent && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) break;
      this.inFlight += 1;
      this.run(task).catch((error) => logError("narration.worker.crashed", error, { seq: task.seq }));
    }
  }

  private async run(task: NarrationTask): Promise<void> {
    try {
      await this.generate(task);
    } finally {
      this.inFlight -= 1;
      this.pump();
      this.settleIdle();
    }
  }

  private async generate(task: NarrationTask): Promise<void> {
    const startedAt = Date.now();
    let item: InjectedRequest;
    try {
      const request = await this.generator.narrate(task.prompt);
      item = { ...request, seq: task.seq };
    } catch (error) {
      logError("narration.failed", error, { seq: task.seq, elapsedMs: Date.now() - startedAt });
      this.hooks.onFailed?.(task, errorMessage(error));
      return;
    }

    const queueLength = this.queue.push(item);
    log("narration.queued", { seq: task.seq, requestId: item.id, queueLength, elapsedMs: Date.now() - startedAt });
    this.hooks.onQueued?.(item, queueLength);
  }

  private settleIdle(): void {
    if (this.inFlight > 0 || this.pending.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
