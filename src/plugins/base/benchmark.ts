/**
 * Analysis plugin timing runs and appending the numbers to the benchmark log.
 */

import path from "node:path";

import { BENCHMARK_LOG } from "../../constants.js";
import { benchmarkOptionsFrom } from "../../trigger/benchmark/base.js";
import { appendText, expandPath } from "../../utils/file-io.js";
import { logger } from "../../utils/logging.js";
import { withFileLock } from "../../utils/scoped.js";

import type {
  AnalysisPlugin,
  Settings,
  TriggerHookContext,
  TriggerRunContext,
} from "../../types/index.js";

/**
 * One line of the benchmark log.
 */
export interface BenchmarkEntry {
  bug: string;
  plugin: string;
  sliceSize: number;
  mean: number;
  stdev: number;
  variance: number;
  samples: number[];
}

/**
 * Sample statistics of a list of timings.
 *
 * @param samples - At least one sample
 * @returns Mean, sample standard deviation and sample variance
 */
export function summarize(samples: readonly number[]): {
  mean: number;
  stdev: number;
  variance: number;
} {
  const mean = samples.reduce((sum, value) => sum + value, 0) / samples.length;
  if (samples.length < 2) {
    return { mean, stdev: 0, variance: 0 };
  }
  const variance =
    samples.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (samples.length - 1);
  return { mean, stdev: Math.sqrt(variance), variance };
}

/**
 * Path of the benchmark log.
 *
 * @param settings - Global settings
 * @returns Absolute path
 */
export function benchmarkLogPath(settings: Settings): string {
  return path.join(expandPath(settings.trigger.results_directory), BENCHMARK_LOG);
}

/**
 * Render a log line (newline included).
 *
 * @param entry - Entry to render
 * @returns `bug, plugin, slice, mean, stdev, variance, samples`
 */
export function formatBenchmarkEntry(entry: BenchmarkEntry): string {
  return `${[
    entry.bug,
    entry.plugin,
    String(entry.sliceSize),
    String(entry.mean),
    String(entry.stdev),
    String(entry.variance),
    entry.samples.map(String).join(" "),
  ].join(", ")}\n`;
}

/**
 * Parse the benchmark log. Malformed lines are skipped.
 *
 * @param content - Log content
 * @returns Entries in file order
 */
export function parseBenchmarkLog(content: string): BenchmarkEntry[] {
  const entries: BenchmarkEntry[] = [];
  for (const line of content.split("\n")) {
    const fields = line.split(",").map((field) => field.trim());
    const [bug, plugin, sliceSize, mean, stdev, variance, samples] = fields;
    if (
      bug === undefined ||
      plugin === undefined ||
      sliceSize === undefined ||
      mean === undefined ||
      stdev === undefined ||
      variance === undefined ||
      samples === undefined
    ) {
      continue;
    }
    const numbers = [sliceSize, mean, stdev, variance].map(Number);
    if (numbers.some((value) => Number.isNaN(value))) {
      logger.debug(`Skipping malformed benchmark line: ${line}`);
      continue;
    }
    entries.push({
      bug,
      plugin,
      sliceSize: numbers[0] ?? 0,
      mean: numbers[1] ?? 0,
      stdev: numbers[2] ?? 0,
      variance: numbers[3] ?? 0,
      samples: samples === "" ? [] : samples.split(" ").map(Number),
    });
  }
  return entries;
}

/**
 * Replaces the trigger's run with its benchmark strategy.
 */
export class BenchmarkPlugin implements AnalysisPlugin {
  readonly capability = "analysis" as const;
  readonly name = "benchmark";
  readonly help = "Benchmark the execution";
  readonly flags = ["-b", "--benchmark"] as const;

  async preTriggerRun({ trigger, settings }: TriggerHookContext): Promise<void> {
    const benchmark = trigger.createBenchmark(
      benchmarkOptionsFrom(settings.benchmark, settings.trigger.show_progress),
    );
    await benchmark.prepare();
    trigger.useRunner(async () => benchmark.run());
  }

  async postTriggerRun({ trigger, mainPlugin, settings }: TriggerRunContext): Promise<void> {
    const samples = trigger.result;
    if (samples === null || samples.length === 0) {
      logger.warn(`No benchmark samples recorded for ${trigger.bug}`);
      return;
    }

    const line = formatBenchmarkEntry({
      bug: trigger.bug,
      plugin: mainPlugin.name,
      sliceSize: samples.length,
      ...summarize(samples),
      samples: [...samples],
    });

    const log = benchmarkLogPath(settings);
    await withFileLock(log, async () => {
      appendText(log, line);
    });
    logger.verbose(`Benchmark results appended to ${log}`);
  }

  async postTriggerClean({ trigger }: TriggerHookContext): Promise<void> {
    trigger.useRunner(null);
  }
}
