/**
 * @summary Central export point for all CLI commands.
 */

export { registerEncodeCommand, registerDecodeCommand } from "./encode.js";
export { registerKeysCommand, describeKey, parseKeyIndex } from "./keys.js";
export type { KeyDescription } from "./keys.js";
export {
  registerSimulateCommand,
  runSimulation,
  parseAmount,
  parseCount,
} from "./simulate.js";
export type { SimulationOptions, SimulationSummary } from "./simulate.js";
export {
  registerInitCommand,
  writeSkeletonTest,
  SKELETON_FILE_NAME,
} from "./init.js";
export type { InitOptions } from "./init.js";
export { registerTestCommand, runTestCommand, vitestRunner } from "./run-tests.js";
export type { TestRunner, TestCommandOptions, TestCommandResult } from "./run-tests.js";
export { reportFailure } from "./report.js";
