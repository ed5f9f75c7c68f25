#!/usr/bin/env node
/**
 * pyxc - command-line front end of the pyxc compiler
 */

import { createToolchainBackend } from "@pyxc/backend";
import { runCli } from "./cli.js";

// Skip node and script name
const args = process.argv.slice(2);

// An UnimplementedFeature failure escapes runCli on purpose and ends the
// process with its stack trace
const exitCode = runCli(args, { backend: createToolchainBackend() });
process.exit(exitCode);
