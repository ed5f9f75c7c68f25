/**
 * Source translator invocation
 */

import type { CompilerOptions, ProcessRunner } from "./types.js";
import {
  BackendIOError,
  CompileError,
  EnvironmentError,
  UnimplementedFeatureError,
} from "./errors.js";
import { describeExit, isLaunchFailure } from "./toolchain.js";

/**
 * Exit status the translator uses for constructs it cannot translate
 */
export const UNIMPLEMENTED_FEATURE_STATUS = 3;

/**
 * Build the translator command line
 */
export const buildTranslatorArgs = (
  inputPath: string,
  cppPath: string,
  emitGlue: boolean,
  options: CompilerOptions
): string[] => {
  const args = [inputPath, "-o", cppPath];
  if (!emitGlue) {
    args.push("--no-glue");
  }
  for (const pass of options.opts ?? []) {
    args.push("-p", pass);
  }
  return args;
};

/**
 * Translate a source module into a C++ translation unit at cppPath
 */
export const runTranslator = (
  run: ProcessRunner,
  translator: string,
  inputPath: string,
  cppPath: string,
  emitGlue: boolean,
  options: CompilerOptions
): void => {
  const result = run(
    translator,
    buildTranslatorArgs(inputPath, cppPath, emitGlue, options)
  );

  if (result.error && isLaunchFailure(result)) {
    if (result.error.code === "ENOENT") {
      throw new EnvironmentError(
        `Translator '${translator}' not found; set PYXC_TRANSLATOR`
      );
    }
    throw new BackendIOError(
      `Failed to execute ${translator}: ${result.error.message}`
    );
  }

  if (result.status === UNIMPLEMENTED_FEATURE_STATUS) {
    throw new UnimplementedFeatureError(
      result.stderr.trim() || `${inputPath} uses an unsupported construct`
    );
  }

  if (result.status !== 0) {
    const details = result.stderr || result.stdout || "Unknown error";
    throw new CompileError(
      `${translator} ${describeExit(result)}:\n${details.trimEnd()}`
    );
  }
};
