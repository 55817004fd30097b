/**
 * @summary CLI command scaffolding a skeleton test file.
 *
 * Used by:
 * - The program factory (program.ts) to register the 'init' command
 */

import { copyFile, mkdir, access } from "node:fs/promises";
import { join } from "node:path";
import chalk from "chalk";
import type { Command } from "commander";
import { SKELETON_TEMPLATE_PATH } from "../paths.js";
import { reportFailure } from "./report.js";

/** Name of the scaffolded file */
export const SKELETON_FILE_NAME = "skeleton.test.ts";

export interface InitOptions {
  /** Replace an existing skeleton file */
  force?: boolean;

  /** Template to copy */
  templatePath?: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Create `dir` if needed and copy the skeleton test into it.
 *
 * @returns Path of the written file
 * @throws Error if the file exists and `force` is not set
 */
export async function writeSkeletonTest(dir: string, options: InitOptions = {}): Promise<string> {
  const dest = join(dir, SKELETON_FILE_NAME);
  if (!options.force && (await exists(dest))) {
    throw new Error(`${dest} already exists (use --force to overwrite)`);
  }

  await mkdir(dir, { recursive: true });
  await copyFile(options.templatePath ?? SKELETON_TEMPLATE_PATH, dest);
  return dest;
}

/**
 * Register the 'init' command.
 *
 * @example
 * ```bash
 * coinlab init
 * coinlab init test/contracts --force
 * ```
 */
export function registerInitCommand(program: Command): void {
  program
    .command("init [dir]")
    .description("Write a skeleton test using alice, bob and a simulated network")
    .option("-f, --force", "Overwrite an existing skeleton", false)
    .action(async (dir: string | undefined, options: InitCommandOptions) => {
      try {
        const dest = await writeSkeletonTest(dir ?? "tests", { force: options.force });
        console.log(chalk.green("Created"), dest);
      } catch (error) {
        reportFailure(error);
      }
    });
}

interface InitCommandOptions {
  force: boolean;
}
