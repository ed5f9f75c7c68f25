/**
 * Type definitions for CLI
 */

import type { CompilerOptions } from "@pyxc/backend";

/**
 * Arguments after response-file expansion and flag parsing
 */
export type RawArguments = {
  /** Argument tokens after response-file expansion */
  readonly tokens: readonly string[];
  readonly inputPath: string;
  readonly outputPath?: string;
  readonly translateOnly: boolean;
  readonly rawTranslateOnly: boolean;
  readonly verbose: boolean;
  readonly debugFlag: boolean;
  readonly opts: readonly string[];
  readonly extraFflags: readonly string[];
  readonly extraMflags: readonly string[];
  readonly extraIflags: readonly string[];
  readonly extraLflags: readonly string[];
  readonly extraDflags: readonly string[];
  readonly extraOflags: readonly string[];
};

/**
 * What the command line asks for
 */
export type ParsedCommand =
  | { readonly command: "help" }
  | { readonly command: "version" }
  | { readonly command: "compile"; readonly args: RawArguments };

export type CompilationMode =
  | "translate-only"
  | "translate-only-raw"
  | "full-compile";

export type SourceExtension = ".py" | ".cpp";

/**
 * A validated request for exactly one backend call
 */
export type CompilationRequest = {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly moduleName: string;
  readonly extension: SourceExtension;
  readonly mode: CompilationMode;
  readonly options: CompilerOptions;
};

/**
 * Every way an invocation can fail
 */
export type CliFailure =
  | { readonly kind: "ArgumentError"; readonly message: string }
  | { readonly kind: "InputNotFound"; readonly inputPath: string }
  | {
      readonly kind: "UnsupportedExtension";
      readonly inputPath: string;
      readonly extension: string;
    }
  | { readonly kind: "InvalidCombination"; readonly inputPath: string }
  | { readonly kind: "CompileError"; readonly message: string }
  | { readonly kind: "EnvironmentError"; readonly message: string }
  | { readonly kind: "IOError"; readonly message: string }
  | {
      readonly kind: "UnimplementedFeature";
      readonly message: string;
      /** Rethrown by the reporter so the stack reaches the user */
      readonly cause: Error;
    };

/**
 * Result type for operations
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };
