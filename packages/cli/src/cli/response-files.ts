/**
 * Response-file expansion
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { Result } from "../types.js";
import { RESPONSE_FILE_SIGIL } from "./constants.js";

export type FileReader = (path: string) => string;

const readUtf8: FileReader = (path) => readFileSync(path, "utf-8");

/**
 * Split response-file contents into argument tokens
 */
export const tokenizeResponseFile = (content: string): string[] =>
  content.split(/\s+/).filter((token) => token.length > 0);

/**
 * Replace every `@file` token with the tokens read from that file.
 *
 * Expansion is recursive; paths are relative to the working directory.
 * A file that is already being expanded higher up the chain is an error.
 */
export const expandResponseFiles = (
  args: readonly string[],
  readFile: FileReader = readUtf8
): Result<string[], string> => {
  const expanded: string[] = [];

  const expand = (
    tokens: readonly string[],
    active: readonly string[]
  ): string | undefined => {
    for (const token of tokens) {
      if (!token.startsWith(RESPONSE_FILE_SIGIL)) {
        expanded.push(token);
        continue;
      }

      const path = token.slice(RESPONSE_FILE_SIGIL.length);
      if (!path) {
        return `missing response file name after '${RESPONSE_FILE_SIGIL}'`;
      }

      const key = resolve(path);
      if (active.includes(key)) {
        return `response file '${path}' includes itself`;
      }

      let content: string;
      try {
        content = readFile(path);
      } catch (error) {
        return `cannot read response file '${path}': ${error instanceof Error ? error.message : String(error)}`;
      }

      const nested = expand(tokenizeResponseFile(content), [...active, key]);
      if (nested !== undefined) {
        return nested;
      }
    }
    return undefined;
  };

  const error = expand(args, []);
  if (error !== undefined) {
    return { ok: false, error };
  }
  return { ok: true, value: expanded };
};
