/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

export const VERSION = packageJson.version;

/** Prefix marking a response-file reference on the command line */
export const RESPONSE_FILE_SIGIL = "@";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
