/**
 * C++ compiler invocation for native extension builds
 */

import type { CompilerOptions, ProcessRunner } from "./types.js";
import { BackendIOError, CompileError, EnvironmentError } from "./errors.js";
import { describeExit, isLaunchFailure } from "./toolchain.js";

/**
 * Build the compiler command line for a shared native extension.
 *
 * Preprocessor and codegen flags precede the input; linker flags follow the
 * output so that library references resolve after the object is known.
 */
export const buildCxxArgs = (
  inputPath: string,
  outputPath: string,
  options: CompilerOptions
): string[] => {
  return [
    ...(options.cppflags ?? []),
    ...(options.cxxflags ?? []),
    "-shared",
    "-fPIC",
    inputPath,
    "-o",
    outputPath,
    ...(options.ldflags ?? []),
  ];
};

/**
 * Compile and link a C++ translation unit into a native extension
 */
export const runCxxCompiler = (
  run: ProcessRunner,
  cxx: string,
  inputPath: string,
  outputPath: string,
  options: CompilerOptions
): void => {
  const result = run(cxx, buildCxxArgs(inputPath, outputPath, options));

  if (result.error && isLaunchFailure(result)) {
    if (result.error.code === "ENOENT") {
      throw new EnvironmentError(
        `C++ compiler '${cxx}' not found; set PYXC_CXX or CXX`
      );
    }
    throw new BackendIOError(
      `Failed to execute ${cxx}: ${result.error.message}`
    );
  }

  if (result.status !== 0) {
    const details = result.stderr || result.stdout || "Unknown error";
    throw new CompileError(
      `${cxx} ${describeExit(result)}:\n${details.trimEnd()}`
    );
  }
};
