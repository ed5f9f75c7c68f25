/**
 * CLI command dispatcher
 */

import {
  isBackendFailure,
  nativeExtensionSuffix,
  type BackendFailure,
  type CompilerBackend,
} from "@pyxc/backend";
import {
  createLogger,
  thresholdFor,
  type LogFormatter,
  type Logger,
  type LogSink,
} from "../logger.js";
import type {
  CliFailure,
  CompilationRequest,
  RawArguments,
  Result,
} from "../types.js";
import { EXIT_SUCCESS, VERSION } from "./constants.js";
import { assembleCompilerOptions } from "./flags.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";
import { reportFailure } from "./reporter.js";
import { buildCompilationRequest } from "./request.js";
import type { FileReader } from "./response-files.js";

export type CliDependencies = {
  readonly backend: CompilerBackend;
  readonly formatter?: LogFormatter;
  readonly sink?: LogSink;
  readonly print?: (text: string) => void;
  readonly readFile?: FileReader;
  readonly nativeSuffix?: string;
};

const toFailure = (error: BackendFailure): CliFailure => {
  switch (error.kind) {
    case "CompileError":
      return { kind: "CompileError", message: error.message };
    case "EnvironmentError":
      return { kind: "EnvironmentError", message: error.message };
    case "IOError":
      return { kind: "IOError", message: error.message };
    case "UnimplementedFeature":
      return {
        kind: "UnimplementedFeature",
        message: error.message,
        cause: error,
      };
  }
};

/**
 * Hand a validated request to the matching backend entry point.
 *
 * Backend failures become a failed result; anything else the backend throws
 * is not ours to interpret and propagates.
 */
export const dispatchRequest = (
  request: CompilationRequest,
  backend: CompilerBackend,
  logger: Logger
): Result<CompilationRequest, CliFailure> => {
  const { inputPath, outputPath, options } = request;

  try {
    if (request.extension === ".cpp") {
      backend.compileCxx(inputPath, outputPath, options);
    } else {
      backend.compileModule(
        inputPath,
        outputPath,
        {
          cppOnly: request.mode !== "full-compile",
          rawTranslateOnly: request.mode === "translate-only-raw",
        },
        options
      );
    }
  } catch (error) {
    if (isBackendFailure(error)) {
      return { ok: false, error: toFailure(error) };
    }
    throw error;
  }

  logger.info(
    request.mode === "full-compile"
      ? `Generated native extension: ${outputPath}`
      : `Generated C++ source file: ${outputPath}`
  );
  return { ok: true, value: request };
};

/**
 * Assemble, validate and dispatch one compilation
 */
const compile = (
  args: RawArguments,
  backend: CompilerBackend,
  logger: Logger,
  nativeSuffix: string
): Result<CompilationRequest, CliFailure> => {
  const options = assembleCompilerOptions(args);
  const request = buildCompilationRequest(args, options, nativeSuffix);
  if (!request.ok) {
    return request;
  }
  logger.debug(
    `Compiling ${request.value.inputPath} (${request.value.mode}) with ${JSON.stringify(options)}`
  );
  return dispatchRequest(request.value, backend, logger);
};

/**
 * Main CLI entry point
 */
export const runCli = (args: string[], deps: CliDependencies): number => {
  const print = deps.print ?? console.log;
  const parsed = parseArgs(args, deps.readFile);

  if (!parsed.ok) {
    const logger = createLogger({ formatter: deps.formatter, sink: deps.sink });
    return reportFailure(parsed.error, logger);
  }

  const command = parsed.value;
  switch (command.command) {
    case "help":
      showHelp(print);
      return EXIT_SUCCESS;

    case "version":
      print(`pyxc v${VERSION}`);
      return EXIT_SUCCESS;

    case "compile": {
      const logger = createLogger({
        threshold: thresholdFor(command.args.verbose),
        formatter: deps.formatter,
        sink: deps.sink,
      });
      const result = compile(
        command.args,
        deps.backend,
        logger,
        deps.nativeSuffix ?? nativeExtensionSuffix()
      );
      return result.ok ? EXIT_SUCCESS : reportFailure(result.error, logger);
    }
  }
};
