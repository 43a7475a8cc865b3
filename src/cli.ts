/**
 * Command-line interface: one sub-command per main and meta plugin.
 */

import chalk from "chalk";
import { Command, InvalidArgumentError, Option } from "commander";

import { PROGRAM_ARGUMENT_ERROR } from "./constants.js";
import { runBugs } from "./orchestrator/run-bugs.js";
import { logger, table, type LogLevel } from "./utils/logging.js";

import type { HarnessContext } from "./orchestrator/context.js";
import type {
  AnalysisPlugin,
  MainPlugin,
  MetaOption,
  MetaPlugin,
} from "./types/index.js";
import type { PluginRegistry } from "./plugins/registry.js";

/**
 * Global options of the program.
 */
type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
};

/**
 * Log level requested on the command line, if any.
 *
 * @param options - Global options
 * @returns Level to use, or undefined to keep the configured one
 */
export function requestedLogLevel(options: GlobalOptions): LogLevel | undefined {
  if (options.debug === true) {
    return "debug";
  }
  if (options.verbose === true) {
    return "verbose";
  }
  if (options.quiet === true) {
    return "warn";
  }
  return undefined;
}

/**
 * Expand the bug arguments: `all` stands for every installed bug.
 *
 * @param requested - Bug arguments
 * @param context - Harness context
 * @returns Bugs to run and the names not in the catalog
 */
export function resolveBugs(
  requested: readonly string[],
  context: HarnessContext,
): { bugs: string[]; unknown: string[] } {
  const bugs: string[] = [];
  const unknown: string[] = [];
  for (const name of requested) {
    const names = name === "all" ? context.catalog.installed() : [name];
    for (const bug of names) {
      if (!context.catalog.has(bug)) {
        unknown.push(bug);
      } else if (!bugs.includes(bug)) {
        bugs.push(bug);
      }
    }
  }
  return { bugs, unknown };
}

function analysisOption(plugin: AnalysisPlugin): Option {
  return new Option(plugin.flags.join(", "), plugin.help);
}

function selectedAnalysis(
  registry: PluginRegistry,
  options: Record<string, unknown>,
): AnalysisPlugin[] {
  return registry
    .list("analysis")
    .filter((plugin) => options[analysisOption(plugin).attributeName()] === true);
}

function metaOption(definition: MetaOption): Option {
  const option = new Option(definition.flags, definition.description);
  const { choices } = definition;

  if (definition.repeatable === true) {
    option.argParser((value: string, previous: string[] | undefined) => {
      if (choices !== undefined && !choices.includes(value)) {
        throw new InvalidArgumentError(`Allowed choices are ${choices.join(", ")}.`);
      }
      return [...(previous ?? []), value];
    });
  } else if (choices !== undefined) {
    option.choices(choices);
  }
  if (definition.required === true) {
    option.makeOptionMandatory();
  }
  return option;
}

/**
 * Add a sub-command running bugs under a main or meta plugin.
 */
function addRunCommand(
  program: Command,
  context: HarnessContext,
  plugin: MainPlugin | MetaPlugin,
): void {
  const command = program
    .command(plugin.name)
    .description(plugin.help)
    .argument("<bugs...>", 'Bugs to trigger ("all" for every installed bug)');

  for (const analysis of context.registry.list("analysis")) {
    command.addOption(analysisOption(analysis));
  }
  if (plugin.capability === "meta") {
    for (const definition of plugin.options(context.registry)) {
      command.addOption(metaOption(definition));
    }
  }

  command.action(async (requested: string[], options: Record<string, unknown>) => {
    const { bugs, unknown } = resolveBugs(requested, context);
    if (unknown.length > 0) {
      command.error(`Unknown bug(s): ${unknown.join(", ")}`, {
        exitCode: PROGRAM_ARGUMENT_ERROR,
      });
    }

    const result = await runBugs(context, {
      bugs,
      plugin,
      analysisPlugins: selectedAnalysis(context.registry, options),
      options,
    });
    process.exitCode = result.verdict;
  });
}

/**
 * Build the CLI for a loaded harness.
 *
 * @param context - Harness context with its plugins loaded
 * @returns Commander program
 */
export function createProgram(context: HarnessContext): Command {
  const program = new Command();

  program.configureHelp({
    styleTitle: (str) => chalk.bold.cyan(str),
    styleCommandText: (str) => chalk.green(str),
    styleCommandDescription: (str) => chalk.dim(str),
    styleDescriptionText: (str) => str,
    styleOptionText: (str) => chalk.yellow(str),
    styleArgumentText: (str) => chalk.magenta(str),
    styleSubcommandText: (str) => chalk.green(str),
  });

  program
    .name("bugbase")
    .description("Reproduce catalogued bugs under pluggable analyses")
    .version("0.4.0")
    .option("-v, --verbose", "Detailed progress output")
    .option("--debug", "Enable debug output")
    .option("-q, --quiet", "Only show warnings and errors")
    .hook("preAction", () => {
      const level = requestedLogLevel(program.opts<GlobalOptions>());
      if (level !== undefined) {
        logger.configure({ level });
      }
    });

  program.commandsGroup("Trigger Commands:");
  for (const plugin of context.registry.list("main")) {
    addRunCommand(program, context, plugin);
  }

  program.commandsGroup("Meta Commands:");
  for (const plugin of context.registry.list("meta")) {
    addRunCommand(program, context, plugin);
  }

  program.commandsGroup("Maintenance:");

  program
    .command("list")
    .description("List catalogued bugs and whether their program is installed")
    .action(() => {
      const rows = context.catalog
        .names()
        .map((bug) => [
          bug,
          context.catalog.entry(bug).trigger.kind,
          context.catalog.isInstalled(bug) ? "yes" : "no",
        ]);
      console.log(table(["bug", "launch", "installed"], rows));
    });

  program
    .command("configure")
    .description("Let every plugin check and prepare its environment")
    .option("-f, --force", "Redo the configuration from scratch")
    .action(async (options: { force?: boolean }) => {
      await context.dispatcher.configure(options.force === true, context.settings);
      logger.success("Plugins configured");
    });

  return program;
}
