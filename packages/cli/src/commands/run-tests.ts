/**
 * @summary CLI command running a project's test suite with vitest.
 *
 * `coinlab test` runs the tests under a directory once, `--discover` lists
 * the test files instead, and `--init` scaffolds the skeleton test first
 * (without running anything unless `--discover` is also given).
 *
 * Used by:
 * - The program factory (program.ts) to register the 'test' command
 */

import { relative, resolve } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { writeSkeletonTest } from "./init.js";
import { reportFailure } from "./report.js";

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * What the test command needs from a test framework.
 */
export interface TestRunner {
  /** Test files under `dir`, relative to the working directory, sorted */
  discover(dir: string): Promise<string[]>;

  /** Run every test under `dir` once; true when all of them passed */
  run(dir: string): Promise<boolean>;
}

/**
 * Runner backed by the vitest node API. vitest is loaded on first use so
 * the other commands start without it.
 */
export const vitestRunner: TestRunner = {
  async discover(dir) {
    const { createVitest } = await import("vitest/node");
    const vitest = await createVitest("test", { dir: resolve(dir), watch: false });
    try {
      const specs = await vitest.globTestFiles();
      return specs.map(([, file]) => relative(process.cwd(), file)).sort();
    } finally {
      await vitest.close();
    }
  },

  async run(dir) {
    const { startVitest } = await import("vitest/node");
    const vitest = await startVitest("test", [], { dir: resolve(dir), watch: false });
    if (vitest === undefined) {
      return false;
    }
    const files = vitest.state.getFiles();
    return files.length > 0 && files.every((file) => file.result?.state !== "fail");
  },
};

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export interface TestCommandOptions {
  /** List test files without running them */
  discover?: boolean;

  /** Write the skeleton test into the directory first */
  init?: boolean;

  /** Overwrite an existing skeleton when initializing */
  force?: boolean;

  /** Template to copy when initializing */
  templatePath?: string;
}

export interface TestCommandResult {
  /** Skeleton written by `init` */
  created?: string;

  /** Files listed by `discover` */
  discovered?: string[];

  /** Outcome of the run, when one happened */
  passed?: boolean;
}

/**
 * @throws Error if `init` would overwrite a skeleton without `force`
 */
export async function runTestCommand(
  dir: string,
  options: TestCommandOptions = {},
  runner: TestRunner = vitestRunner
): Promise<TestCommandResult> {
  const result: TestCommandResult = {};

  if (options.init) {
    result.created = await writeSkeletonTest(dir, {
      force: options.force,
      templatePath: options.templatePath,
    });
  }

  if (options.discover) {
    result.discovered = await runner.discover(dir);
  } else if (!options.init) {
    result.passed = await runner.run(dir);
  }

  return result;
}

/**
 * Register the 'test' command.
 *
 * @example
 * ```bash
 * coinlab test
 * coinlab test --discover
 * coinlab test --init
 * ```
 */
export function registerTestCommand(program: Command, runner: TestRunner = vitestRunner): void {
  program
    .command("test [dir]")
    .description("Run the test suite in a directory (default: tests)")
    .option("-d, --discover", "List the test files without running them", false)
    .option("-i, --init", "Create the directory and add a skeleton test", false)
    .option("-f, --force", "Overwrite an existing skeleton with --init", false)
    .action(async (dir: string | undefined, options: TestCommandFlags) => {
      try {
        const result = await runTestCommand(dir ?? "tests", options, runner);

        if (result.created !== undefined) {
          console.log(chalk.green("Created"), result.created);
        }
        if (result.discovered !== undefined) {
          if (result.discovered.length === 0) {
            console.log(chalk.yellow("No test files found"));
          }
          for (const file of result.discovered) {
            console.log(file);
          }
        }
        if (result.passed === false) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportFailure(error);
      }
    });
}

interface TestCommandFlags {
  discover: boolean;
  init: boolean;
  force: boolean;
}
