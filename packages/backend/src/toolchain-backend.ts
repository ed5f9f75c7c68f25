/**
 * Toolchain backend - runs the translator and the C++ compiler as child processes
 */

import { existsSync, mkdtempSync, rmSync, statSync } from "fs";
import { tmpdir } from "os";
import { basename, dirname, extname, join, resolve } from "path";
import type {
  CompilerBackend,
  CompilerOptions,
  ModuleCompileMode,
  ProcessRunner,
  ToolchainConfig,
} from "./types.js";
import { BackendIOError } from "./errors.js";
import { runCxxCompiler } from "./cxx-compiler.js";
import { runTranslator } from "./translator.js";
import { resolveToolchainConfig, runProcess } from "./toolchain.js";

export type ToolchainBackendOptions = {
  readonly config?: ToolchainConfig;
  readonly run?: ProcessRunner;
};

/**
 * Fail early when the input is gone or the output has nowhere to go
 */
const checkPaths = (inputPath: string, outputPath: string): void => {
  if (!existsSync(inputPath)) {
    throw new BackendIOError(`Input file not found: ${inputPath}`);
  }

  const outputDir = dirname(resolve(outputPath));
  if (!existsSync(outputDir) || !statSync(outputDir).isDirectory()) {
    throw new BackendIOError(`Output directory does not exist: ${outputDir}`);
  }
};

/**
 * Create a scratch directory for the intermediate translation unit
 */
const createBuildDir = (): string => {
  try {
    return mkdtempSync(join(tmpdir(), "pyxc-build-"));
  } catch (error) {
    throw new BackendIOError(
      `Failed to create build directory: ${error instanceof Error ? error.message : String(error)}`
    );
  }
};

const cleanBuild = (buildDir: string): void => {
  rmSync(buildDir, { recursive: true, force: true });
};

/**
 * Create a backend that shells out to the configured toolchain
 */
export const createToolchainBackend = (
  options: ToolchainBackendOptions = {}
): CompilerBackend => {
  const config = options.config ?? resolveToolchainConfig(process.env);
  const run = options.run ?? runProcess;

  const compileCxx = (
    inputPath: string,
    outputPath: string,
    compilerOptions: CompilerOptions
  ): void => {
    checkPaths(inputPath, outputPath);
    runCxxCompiler(run, config.cxx, inputPath, outputPath, compilerOptions);
  };

  const compileModule = (
    inputPath: string,
    outputPath: string,
    mode: ModuleCompileMode,
    compilerOptions: CompilerOptions
  ): void => {
    checkPaths(inputPath, outputPath);
    const emitGlue = !mode.rawTranslateOnly;

    if (mode.cppOnly) {
      runTranslator(
        run,
        config.translator,
        inputPath,
        outputPath,
        emitGlue,
        compilerOptions
      );
      return;
    }

    // Full compile: translate into a scratch directory, then build from there
    const buildDir = createBuildDir();
    try {
      const moduleName = basename(inputPath, extname(inputPath));
      const cppPath = join(buildDir, `${moduleName}.cpp`);
      runTranslator(
        run,
        config.translator,
        inputPath,
        cppPath,
        emitGlue,
        compilerOptions
      );
      runCxxCompiler(run, config.cxx, cppPath, outputPath, compilerOptions);
    } finally {
      cleanBuild(buildDir);
    }
  };

  return { compileCxx, compileModule };
};
