import { setTimeout as sleep } from "timers/promises";
import { describe, expect, it } from "vitest";
import { ProgressAggregator } from "./aggregator";
import { ProgressReporter } from "./reporter";

function collector() {
  const chunks: string[] = [];
  return { chunks, output: { write: (chunk: string) => chunks.push(chunk) } };
}

describe("ProgressReporter", () => {
  it("redraws on an interval until stopped", async () => {
    const aggregator = new ProgressAggregator();
    aggregator.registerGroup("a", 1, 10, "A");
    const { chunks, output } = collector();
    const reporter = new ProgressReporter(aggregator, { style: "simple", intervalMs: 10, output });

    reporter.start();
    expect(reporter.running).toBe(true);
    await sleep(45);
    await reporter.stop();
    expect(reporter.running).toBe(false);

    const drawn = chunks.length;
    expect(drawn).toBeGreaterThanOrEqual(3);
    expect(chunks[chunks.length - 1]).toBe("\n");
    expect(chunks[chunks.length - 2]).toBe("\rA waiting: 0.0% (0/1) | Overall: 0.0% (0/1)");

    await sleep(30);
    expect(chunks.length).toBe(drawn);
  });

  it("stops promptly even mid-interval", async () => {
    const reporter = new ProgressReporter(new ProgressAggregator(), {
      intervalMs: 60_000,
      output: collector().output,
    });
    reporter.start();
    const started = Date.now();
    await reporter.stop();
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("treats stop without start as a no-op", async () => {
    const { chunks, output } = collector();
    const reporter = new ProgressReporter(new ProgressAggregator(), { output });
    await reporter.stop();
    expect(chunks).toEqual([]);
  });
});
