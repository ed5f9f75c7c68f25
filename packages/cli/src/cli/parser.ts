/**
 * CLI argument parser
 */

import type {
  CliFailure,
  ParsedCommand,
  RawArguments,
  Result,
} from "../types.js";
import { expandResponseFiles, type FileReader } from "./response-files.js";

type BooleanField =
  | "translateOnly"
  | "rawTranslateOnly"
  | "verbose"
  | "debugFlag";

type ListField =
  | "opts"
  | "extraFflags"
  | "extraMflags"
  | "extraIflags"
  | "extraLflags"
  | "extraDflags"
  | "extraOflags";

const BOOLEAN_FLAGS: Readonly<Record<string, BooleanField>> = {
  E: "translateOnly",
  e: "rawTranslateOnly",
  v: "verbose",
  g: "debugFlag",
};

const LIST_FLAGS: Readonly<Record<string, ListField>> = {
  f: "extraFflags",
  p: "opts",
  m: "extraMflags",
  I: "extraIflags",
  L: "extraLflags",
  D: "extraDflags",
  O: "extraOflags",
};

const DEFAULT_OPTIMIZATION = ["2"] as const;

const argumentError = (message: string): Result<never, CliFailure> => ({
  ok: false,
  error: { kind: "ArgumentError", message },
});

/**
 * A separate value may not look like another option
 */
const looksLikeOption = (token: string): boolean =>
  token.startsWith("-") && token !== "-";

/**
 * Parse CLI arguments
 */
export const parseArgs = (
  argv: readonly string[],
  readFile?: FileReader
): Result<ParsedCommand, CliFailure> => {
  const expansion = expandResponseFiles(argv, readFile);
  if (!expansion.ok) {
    return argumentError(expansion.error);
  }
  const tokens = expansion.value;

  const flags: Record<BooleanField, boolean> = {
    translateOnly: false,
    rawTranslateOnly: false,
    verbose: false,
    debugFlag: false,
  };
  const lists: Record<ListField, string[]> = {
    opts: [],
    extraFflags: [],
    extraMflags: [],
    extraIflags: [],
    extraLflags: [],
    extraDflags: [],
    extraOflags: [],
  };
  const positionals: string[] = [];
  let outputPath: string | undefined;
  let optionsEnded = false;

  for (let i = 0; i < tokens.length; i++) {
    const arg = tokens[i];
    if (arg === undefined) continue;

    if (optionsEnded || !looksLikeOption(arg)) {
      positionals.push(arg);
      continue;
    }

    switch (arg) {
      case "--":
        optionsEnded = true;
        continue;
      case "--help":
        return { ok: true, value: { command: "help" } };
      case "--version":
        return { ok: true, value: { command: "version" } };
    }

    if (arg.startsWith("--")) {
      return argumentError(`unrecognized option '${arg}'`);
    }

    // Short options, possibly clustered: -Ev, -I/usr/include, -vO3
    for (let j = 1; j < arg.length; j++) {
      const flag = arg.charAt(j);

      if (flag === "h") {
        return { ok: true, value: { command: "help" } };
      }

      const booleanField = BOOLEAN_FLAGS[flag];
      if (booleanField) {
        flags[booleanField] = true;
        continue;
      }

      const listField = LIST_FLAGS[flag];
      if (flag !== "o" && !listField) {
        return argumentError(`unrecognized option '-${flag}'`);
      }

      let value = arg.slice(j + 1);
      if (!value) {
        const next = tokens[i + 1];
        if (next === undefined || looksLikeOption(next)) {
          return argumentError(`option -${flag} expects a value`);
        }
        value = next;
        i++;
      }

      if (listField) {
        lists[listField].push(value);
      } else {
        outputPath = value;
      }
      break;
    }
  }

  const [inputPath, ...extra] = positionals;
  if (inputPath === undefined) {
    return argumentError("the following arguments are required: input_file");
  }
  if (extra.length > 0) {
    return argumentError(`unrecognized arguments: ${extra.join(" ")}`);
  }

  const args: RawArguments = {
    tokens,
    inputPath,
    outputPath,
    translateOnly: flags.translateOnly || flags.rawTranslateOnly,
    rawTranslateOnly: flags.rawTranslateOnly,
    verbose: flags.verbose,
    debugFlag: flags.debugFlag,
    opts: lists.opts,
    extraFflags: lists.extraFflags,
    extraMflags: lists.extraMflags,
    extraIflags: lists.extraIflags,
    extraLflags: lists.extraLflags,
    extraDflags: lists.extraDflags,
    extraOflags:
      lists.extraOflags.length > 0
        ? lists.extraOflags
        : [...DEFAULT_OPTIMIZATION],
  };

  return { ok: true, value: { command: "compile", args } };
};
