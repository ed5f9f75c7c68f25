/**
 * Compilation request validation
 */

import { accessSync, constants, statSync } from "node:fs";
import { basename, extname } from "node:path";
import type { CompilerOptions } from "@pyxc/backend";
import type {
  CliFailure,
  CompilationMode,
  CompilationRequest,
  RawArguments,
  Result,
  SourceExtension,
} from "../types.js";

const isReadableFile = (path: string): boolean => {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
};

const isSourceExtension = (extension: string): extension is SourceExtension =>
  extension === ".py" || extension === ".cpp";

const modeOf = (args: RawArguments): CompilationMode => {
  if (args.rawTranslateOnly) return "translate-only-raw";
  if (args.translateOnly) return "translate-only";
  return "full-compile";
};

/**
 * Validate the input and settle the output path.
 *
 * When no output path is given, the output lands in the working directory,
 * named after the module: `<module>.cpp` when only translating, otherwise
 * `<module>.<nativeSuffix>`.
 */
export const buildCompilationRequest = (
  args: RawArguments,
  options: CompilerOptions,
  nativeSuffix: string
): Result<CompilationRequest, CliFailure> => {
  const { inputPath } = args;

  if (!isReadableFile(inputPath)) {
    return { ok: false, error: { kind: "InputNotFound", inputPath } };
  }

  const extension = extname(inputPath);
  const moduleName = basename(inputPath, extension);

  if (!isSourceExtension(extension)) {
    return {
      ok: false,
      error: { kind: "UnsupportedExtension", inputPath, extension },
    };
  }

  const outputPath =
    args.outputPath ||
    `${moduleName}.${args.translateOnly ? "cpp" : nativeSuffix}`;

  if (extension === ".cpp" && args.translateOnly) {
    return { ok: false, error: { kind: "InvalidCombination", inputPath } };
  }

  return {
    ok: true,
    value: {
      inputPath,
      outputPath,
      moduleName,
      extension,
      mode: modeOf(args),
      options,
    },
  };
};
