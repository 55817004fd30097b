/**
 * @summary Tests for CLI commands and their helpers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import { Command } from "commander";
import {
  DeterministicKeychain,
  InsufficientFundsError,
  decodePuzzleHash,
  encodePuzzleHash,
  standardPuzzle,
} from "@coinlab/core";
import { createProgram } from "../program.js";
import { SKELETON_TEMPLATE_PATH } from "../paths.js";
import {
  describeKey,
  parseAmount,
  parseCount,
  parseKeyIndex,
  registerTestCommand,
  runSimulation,
  runTestCommand,
  writeSkeletonTest,
  type TestRunner,
} from "../commands/index.js";

const PUZZLE_HASH = "4f".repeat(32);
const START = 1620061201;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe("describeKey", () => {
  it("matches the wallet a session derives at that index", () => {
    const { publicKey } = new DeterministicKeychain("test-seed").derive(1);
    const puzzleHash = standardPuzzle(publicKey).hash();

    const key = describeKey(1, "test-seed");

    expect(key).toEqual({
      index: 1,
      publicKey,
      puzzleHash,
      address: encodePuzzleHash(puzzleHash, "txch"),
    });
  });

  it("uses the requested address prefix", () => {
    const key = describeKey(0, "test-seed", "xch");

    expect(decodePuzzleHash(key.address)).toEqual({ prefix: "xch", puzzleHash: key.puzzleHash });
  });
});

describe("argument parsing", () => {
  it("parses key indexes", () => {
    expect(parseKeyIndex("3")).toBe(3);
    expect(() => parseKeyIndex("-1")).toThrow("Invalid key index: -1");
  });

  it("parses block counts", () => {
    expect(parseCount("0")).toBe(0);
    expect(() => parseCount("two")).toThrow("Invalid block count: two");
  });

  it("parses amounts", () => {
    expect(parseAmount("2500000000000")).toBe(2_500_000_000_000n);
    expect(() => parseAmount("0")).toThrow("Invalid amount: 0");
    expect(() => parseAmount("1.5")).toThrow("Invalid amount: 1.5");
  });
});

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

describe("runSimulation", () => {
  it("combines alice's rewards to pay bob", async () => {
    const summary = await runSimulation({
      blocks: 2,
      amount: 15n,
      network: { simulator: { poolReward: 10n, farmerReward: 0n } },
    });

    // Two farmed blocks, one combine, one transfer
    expect(summary).toEqual({ height: 4, time: START + 80, alice: 5n, bob: 15n });
  });

  it("uses the default block rewards", async () => {
    const summary = await runSimulation({ blocks: 1, amount: 1000n });

    expect(summary.height).toBe(2);
    expect(summary.alice).toBe(2_000_000_000_000n - 1000n);
    expect(summary.bob).toBe(1000n);
  });

  it("fails when alice was never funded", async () => {
    await expect(runSimulation({ blocks: 0, amount: 1n })).rejects.toThrow(
      InsufficientFundsError
    );
  });
});

// ---------------------------------------------------------------------------
// Skeleton Tests
// ---------------------------------------------------------------------------

describe("writeSkeletonTest", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "coinlab-init-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("copies the template into a new directory", async () => {
    const target = join(dir, "tests", "contracts");

    const dest = await writeSkeletonTest(target);

    expect(dest).toBe(join(target, "skeleton.test.ts"));
    const [written, template] = await Promise.all([
      readFile(dest, "utf8"),
      readFile(SKELETON_TEMPLATE_PATH, "utf8"),
    ]);
    expect(written).toBe(template);
    expect(written).toContain("setupNetwork");
  });

  it("refuses to overwrite without force", async () => {
    await writeSkeletonTest(dir);

    await expect(writeSkeletonTest(dir)).rejects.toThrow(/already exists/);
    await expect(writeSkeletonTest(dir, { force: true })).resolves.toBe(
      join(dir, "skeleton.test.ts")
    );
  });
});

// ---------------------------------------------------------------------------
// Test Command
// ---------------------------------------------------------------------------

/** Records calls instead of starting vitest */
const createFakeRunner = (files: string[], passed = true) => {
  const calls: string[] = [];
  const runner: TestRunner = {
    async discover(dir) {
      calls.push(`discover ${dir}`);
      return files;
    },
    async run(dir) {
      calls.push(`run ${dir}`);
      return passed;
    },
  };
  return { runner, calls };
};

describe("runTestCommand", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "coinlab-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs the suite by default", async () => {
    const { runner, calls } = createFakeRunner([]);

    const result = await runTestCommand(dir, {}, runner);

    expect(result).toEqual({ passed: true });
    expect(calls).toEqual([`run ${dir}`]);
  });

  it("reports a failing run", async () => {
    const { runner } = createFakeRunner([], false);

    await expect(runTestCommand(dir, {}, runner)).resolves.toEqual({ passed: false });
  });

  it("lists files without running them", async () => {
    const { runner, calls } = createFakeRunner(["tests/a.test.ts", "tests/b.test.ts"]);

    const result = await runTestCommand(dir, { discover: true }, runner);

    expect(result).toEqual({ discovered: ["tests/a.test.ts", "tests/b.test.ts"] });
    expect(calls).toEqual([`discover ${dir}`]);
  });

  it("scaffolds the skeleton without running", async () => {
    const { runner, calls } = createFakeRunner([]);

    const result = await runTestCommand(dir, { init: true }, runner);

    expect(result).toEqual({ created: join(dir, "skeleton.test.ts") });
    expect(calls).toEqual([]);
  });

  it("scaffolds and then lists with both flags", async () => {
    const { runner, calls } = createFakeRunner(["skeleton.test.ts"]);

    const result = await runTestCommand(dir, { init: true, discover: true }, runner);

    expect(result).toEqual({
      created: join(dir, "skeleton.test.ts"),
      discovered: ["skeleton.test.ts"],
    });
    expect(calls).toEqual([`discover ${dir}`]);
  });

  it("refuses to replace a skeleton unless forced", async () => {
    const { runner } = createFakeRunner([]);
    await runTestCommand(dir, { init: true }, runner);

    await expect(runTestCommand(dir, { init: true }, runner)).rejects.toThrow(/already exists/);
    await expect(runTestCommand(dir, { init: true, force: true }, runner)).resolves.toEqual({
      created: join(dir, "skeleton.test.ts"),
    });
  });
});

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

describe("coinlab program", () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  const run = async (...args: string[]): Promise<void> => {
    await createProgram().parseAsync(args, { from: "user" });
  };

  it("encodes a puzzle hash", async () => {
    await run("encode", PUZZLE_HASH, "--prefix", "txch");

    expect(console.log).toHaveBeenCalledWith(encodePuzzleHash(PUZZLE_HASH, "txch"));
  });

  it("decodes an address", async () => {
    await run("decode", encodePuzzleHash(PUZZLE_HASH));

    expect(console.log).toHaveBeenCalledWith(PUZZLE_HASH);
  });

  it("prints key details", async () => {
    const key = describeKey(2, "test-seed");

    await run("keys", "2", "--seed", "test-seed");

    expect(console.log).toHaveBeenCalledWith("Key index:", 2);
    expect(console.log).toHaveBeenCalledWith("  Public key:", key.publicKey);
    expect(console.log).toHaveBeenCalledWith("  Address:", key.address);
  });

  it("reports bad input and sets a failing exit code", async () => {
    await run("encode", "abc");

    expect(console.error).toHaveBeenCalledWith(
      "Error:",
      'Invalid puzzle hash: expected 32 bytes of hex, got "abc"'
    );
    expect(process.exitCode).toBe(1);
  });

  it("registers the test command with its flags", () => {
    const command = createProgram().commands.find((c) => c.name() === "test");

    expect(command?.options.map((o) => o.long)).toEqual(["--discover", "--init", "--force"]);
  });

  it("prints discovered test files", async () => {
    const { runner, calls } = createFakeRunner(["tests/wallet.test.ts"]);
    const program = new Command();
    registerTestCommand(program, runner);

    await program.parseAsync(["test", "--discover"], { from: "user" });

    expect(calls).toEqual(["discover tests"]);
    expect(console.log).toHaveBeenCalledWith("tests/wallet.test.ts");
    expect(process.exitCode).toBeUndefined();
  });

  it("fails the process when the suite fails", async () => {
    const { runner, calls } = createFakeRunner([], false);
    const program = new Command();
    registerTestCommand(program, runner);

    await program.parseAsync(["test", "contracts"], { from: "user" });

    expect(calls).toEqual(["run contracts"]);
    expect(process.exitCode).toBe(1);
  });

  it("reports library errors with their code", async () => {
    await run("simulate", "--blocks", "0", "--amount", "1");

    expect(console.error).toHaveBeenCalledWith(
      "Error [INSUFFICIENT_FUNDS]:",
      "Insufficient funds in wallet alice: need 1, have 0 (short by 1)"
    );
    expect(process.exitCode).toBe(1);
  });
});
