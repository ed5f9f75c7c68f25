/**
 * Native toolchain discovery and process execution
 */

import { spawnSync } from "child_process";
import type { ProcessResult, ProcessRunner, ToolchainConfig } from "./types.js";

const DEFAULT_CXX = "c++";
const DEFAULT_TRANSLATOR = "pyxc-translate";

/** Compiler diagnostics for heavy template code run well past 1 MiB */
export const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Run a command synchronously, capturing its output
 */
export const runProcess: ProcessRunner = (command, args): ProcessResult => {
  const result = spawnSync(command, [...args], {
    encoding: "utf-8",
    maxBuffer: MAX_OUTPUT_BYTES,
  });

  return {
    status: result.status,
    signal: result.signal,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    error: result.error,
  };
};

/**
 * Spawn failures that mean the tool itself never ran.
 *
 * ENOBUFS is not one of them: the tool ran and was stopped for printing too
 * much, so its exit still says how the compilation went.
 */
export const isLaunchFailure = (result: ProcessResult): boolean =>
  result.error !== undefined && result.error.code !== "ENOBUFS";

/**
 * How a failed process ended, for error messages
 */
export const describeExit = (result: ProcessResult): string => {
  const ending =
    result.status !== null
      ? `failed with code ${result.status}`
      : `was terminated by ${result.signal ?? "an unknown signal"}`;
  return result.error?.code === "ENOBUFS"
    ? `${ending} (output exceeded ${MAX_OUTPUT_BYTES} bytes)`
    : ending;
};

/**
 * Resolve which executables the toolchain adapter spawns
 */
export const resolveToolchainConfig = (
  env: NodeJS.ProcessEnv
): ToolchainConfig => {
  return {
    cxx: env.PYXC_CXX || env.CXX || DEFAULT_CXX,
    translator: env.PYXC_TRANSLATOR || DEFAULT_TRANSLATOR,
  };
};

/**
 * File suffix of a loadable native extension on the given platform
 */
export const nativeExtensionSuffix = (
  platform: NodeJS.Platform = process.platform
): string => {
  return platform === "win32" ? "pyd" : "so";
};
