/**
 * reporter.ts — Background progress reporting loop
 *
 * Polls the aggregator on a fixed interval and writes a rendered snapshot.
 * The loop is its own task with an AbortSignal: stop() aborts the wait,
 * draws one last frame and resolves within `stopTimeoutMs` even if the
 * loop is wedged in a slow write.
 */

import { setTimeout as sleep } from "timers/promises";
import type { ProgressStyle } from "../config/schema";
import { describeError } from "../utils/errors";
import { log } from "../utils/logger";
import type { ProgressAggregator } from "./aggregator";
import { renderSnapshot } from "./render";

export interface ProgressOutput {
  write(chunk: string): unknown;
}

export interface ReporterOptions {
  style?: ProgressStyle;
  intervalMs?: number;
  stopTimeoutMs?: number;
  output?: ProgressOutput;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export class ProgressReporter {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly style: ProgressStyle;
  private readonly intervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly output: ProgressOutput;

  constructor(
    private readonly aggregator: ProgressAggregator,
    options: ReporterOptions = {}
  ) {
    this.style = options.style ?? "bar";
    this.intervalMs = options.intervalMs ?? 500;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 1000;
    this.output = options.output ?? process.stdout;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    const { controller, loop } = this;
    if (!controller || !loop) return;
    this.controller = null;
    this.loop = null;

    controller.abort();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.stopTimeoutMs);
    });
    try {
      await Promise.race([loop, timeout]);
    } finally {
      clearTimeout(timer);
    }
    this.draw();
    if (this.style === "simple") this.output.write("\n");
  }

  private draw(): void {
    this.output.write(renderSnapshot(this.aggregator.snapshot(), this.style));
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        this.draw();
        await sleep(this.intervalMs, undefined, { signal });
      }
    } catch (error) {
      if (!isAbortError(error)) {
        log("error", "progress", undefined, "Progress reporter stopped", {
          error: describeError(error),
        });
      }
    }
  }
}
