/**
 * Type definitions for the compiler backend contract
 */

/**
 * Flag categories handed to the backend.
 *
 * A key is present only when its list is non-empty: the backend applies its
 * own defaults to absent categories, which differs from an empty list.
 */
export type CompilerOptions = {
  readonly cppflags?: readonly string[];
  readonly cxxflags?: readonly string[];
  readonly ldflags?: readonly string[];
  readonly opts?: readonly string[];
};

/**
 * Translation switches for compileModule
 */
export type ModuleCompileMode = {
  /** Stop after emitting the C++ translation unit */
  readonly cppOnly: boolean;
  /** Omit the language-binding glue layer from the translation unit */
  readonly rawTranslateOnly: boolean;
};

/**
 * The two backend entry points.
 *
 * Both block until the backend is done and throw one of the backend
 * failure classes from errors.ts when it is not.
 */
export type CompilerBackend = {
  readonly compileCxx: (
    inputPath: string,
    outputPath: string,
    options: CompilerOptions
  ) => void;
  readonly compileModule: (
    inputPath: string,
    outputPath: string,
    mode: ModuleCompileMode,
    options: CompilerOptions
  ) => void;
};

/**
 * Executables the toolchain adapter spawns
 */
export type ToolchainConfig = {
  readonly cxx: string;
  readonly translator: string;
};

/**
 * Outcome of one synchronous child process
 */
export type ProcessResult = {
  readonly status: number | null;
  readonly signal?: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly error?: NodeJS.ErrnoException;
};

/**
 * Runs a command to completion
 */
export type ProcessRunner = (
  command: string,
  args: readonly string[]
) => ProcessResult;
