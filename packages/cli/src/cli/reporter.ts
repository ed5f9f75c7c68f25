/**
 * Failure reporting - one message and one exit behavior per failure kind
 */

import type { Logger } from "../logger.js";
import type { CliFailure } from "../types.js";
import { EXIT_FAILURE, EXIT_USAGE } from "./constants.js";
import { USAGE } from "./help.js";

/**
 * Log a failure and return the exit code.
 *
 * UnimplementedFeature is logged and then rethrown: the process must end
 * with the original stack so it can go into a bug report.
 */
export const reportFailure = (failure: CliFailure, logger: Logger): number => {
  switch (failure.kind) {
    case "ArgumentError":
      logger.error(`${failure.message}\n${USAGE}`);
      return EXIT_USAGE;

    case "InputNotFound":
      logger.critical(`Input file '${failure.inputPath}' not found`);
      return EXIT_FAILURE;

    case "UnsupportedExtension":
      logger.critical(
        `Unsupported file extension '${failure.extension}' for '${failure.inputPath}': expected .py or .cpp`
      );
      return EXIT_FAILURE;

    case "InvalidCombination":
      logger.critical(
        `'${failure.inputPath}' is already C++; -E and -e only apply to .py input`
      );
      return EXIT_FAILURE;

    case "CompileError":
      logger.critical(`Native compilation failed\n${failure.message}`);
      return EXIT_FAILURE;

    case "EnvironmentError":
      logger.critical(`The toolchain is incomplete\n${failure.message}`);
      return EXIT_FAILURE;

    case "IOError":
      logger.critical(`I/O failure\n${failure.message}`);
      return EXIT_FAILURE;

    case "UnimplementedFeature":
      logger.critical(
        `The translator reached a feature it does not implement yet; please report it with the trace below\n${failure.message}`
      );
      throw failure.cause;
  }
};
