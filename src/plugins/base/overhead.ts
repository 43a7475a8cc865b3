/**
 * Meta plugin comparing benchmark timings of main plugins against plain
 * successful runs.
 */

import { z } from "zod";

import { fileExists, readText } from "../../utils/file-io.js";
import { logger, table } from "../../utils/logging.js";

import { benchmarkLogPath, parseBenchmarkLog } from "./benchmark.js";

import type { ProgramCatalog } from "../../catalog/catalog.js";
import type { PluginRegistry } from "../registry.js";
import type { BenchmarkEntry } from "./benchmark.js";
import type {
  AnalysisPlugin,
  MainPlugin,
  MetaOption,
  MetaPlugin,
  MetaResultContext,
  MetaRunContext,
  PluginSelection,
} from "../../types/index.js";

const BASELINE = "success";

const OverheadOptionsSchema = z.object({
  plugin: z.array(z.string()).min(1),
});

/**
 * Overhead of one plugin on one bug. `ratio` is null when either side has
 * no timing.
 */
export interface OverheadCell {
  bug: string;
  plugin: string;
  ratio: number | null;
}

/**
 * Latest mean per bug and plugin.
 */
function latestMeans(entries: readonly BenchmarkEntry[]): Map<string, number> {
  const means = new Map<string, number>();
  for (const entry of entries) {
    means.set(`${entry.bug}\u0000${entry.plugin}`, entry.mean);
  }
  return means;
}

/**
 * Compute the overhead of each plugin over the baseline.
 *
 * Timings are durations except for request-rate bugs, where a higher value
 * is better and the ratio is inverted.
 *
 * @param entries - Parsed benchmark log
 * @param bugs - Bugs to report on
 * @param plugins - Plugins to compare to the baseline
 * @param isRate - Whether a bug's timings are request rates
 * @returns One cell per bug and plugin
 */
export function computeOverhead(
  entries: readonly BenchmarkEntry[],
  bugs: readonly string[],
  plugins: readonly string[],
  isRate: (bug: string) => boolean,
): OverheadCell[] {
  const means = latestMeans(entries);
  const cells: OverheadCell[] = [];

  for (const bug of bugs) {
    const baseline = means.get(`${bug}\u0000${BASELINE}`);
    for (const plugin of plugins) {
      const measured = means.get(`${bug}\u0000${plugin}`);
      let ratio: number | null = null;
      if (baseline !== undefined && measured !== undefined && baseline > 0 && measured > 0) {
        ratio = isRate(bug) ? baseline / measured : measured / baseline;
      }
      cells.push({ bug, plugin, ratio });
    }
  }

  return cells;
}

/**
 * Render the overhead table: one row per bug, one column per plugin.
 *
 * @param cells - Output of computeOverhead
 * @param bugs - Row order
 * @param plugins - Column order
 * @returns Table text
 */
export function renderOverheadReport(
  cells: readonly OverheadCell[],
  bugs: readonly string[],
  plugins: readonly string[],
): string {
  const rows = bugs.map((bug) => [
    bug,
    ...plugins.map((plugin) => {
      const cell = cells.find((c) => c.bug === bug && c.plugin === plugin);
      return cell?.ratio == null ? "n/a" : `${cell.ratio.toFixed(2)}x`;
    }),
  ]);
  return table(["bug", ...plugins], rows);
}

function isRateBug(catalog: ProgramCatalog): (bug: string) => boolean {
  return (bug) => catalog.has(bug) && catalog.entry(bug).trigger.kind === "apache";
}

/**
 * Benchmarks the chosen plugins and the baseline on every bug, then prints
 * their relative cost.
 */
export class OverheadPlugin implements MetaPlugin {
  readonly capability = "meta" as const;
  readonly name = "overhead";
  readonly help = "Compare the runtime of plugins against successful runs";

  options(registry: PluginRegistry): MetaOption[] {
    return [
      {
        flags: "-p, --plugin <name>",
        description: "Plugin to measure (repeatable)",
        repeatable: true,
        required: true,
        choices: registry
          .list("main")
          .map((plugin) => plugin.name)
          .filter((name) => name !== BASELINE),
      },
    ];
  }

  async beforeRun({ analysisPlugins, options, registry }: MetaRunContext): Promise<PluginSelection> {
    const { plugin } = OverheadOptionsSchema.parse(options);

    const mainPlugins: MainPlugin[] = [...new Set(plugin)].map((name) =>
      registry.get("main", name),
    );
    mainPlugins.push(registry.get("main", BASELINE));

    const selected: AnalysisPlugin[] = [...analysisPlugins];
    if (!selected.some((p) => p.name === "benchmark")) {
      selected.push(registry.get("analysis", "benchmark"));
    }

    return { mainPlugins, analysisPlugins: selected };
  }

  async afterRun({ bugs, mainPlugins, catalog, settings }: MetaResultContext): Promise<number> {
    const log = benchmarkLogPath(settings);
    if (!fileExists(log)) {
      logger.error(`No benchmark log at ${log}`);
      return 1;
    }

    const plugins = mainPlugins.map((p) => p.name).filter((name) => name !== BASELINE);
    const cells = computeOverhead(
      parseBenchmarkLog(readText(log)),
      bugs,
      plugins,
      isRateBug(catalog),
    );

    console.log(renderOverheadReport(cells, bugs, plugins));
    return 0;
  }
}
