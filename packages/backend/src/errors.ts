/**
 * Failures raised by backend entry points
 */

export type BackendFailureKind =
  | "CompileError"
  | "EnvironmentError"
  | "IOError"
  | "UnimplementedFeature";

/**
 * Base class for every failure a backend entry point may throw
 */
export abstract class BackendFailure extends Error {
  abstract readonly kind: BackendFailureKind;
}

/**
 * The native toolchain rejected the generated code
 */
export class CompileError extends BackendFailure {
  readonly kind = "CompileError" as const;

  constructor(message: string) {
    super(message);
    this.name = "CompileError";
  }
}

/**
 * A toolchain component is missing from the environment
 */
export class EnvironmentError extends BackendFailure {
  readonly kind = "EnvironmentError" as const;

  constructor(message: string) {
    super(message);
    this.name = "EnvironmentError";
  }
}

/**
 * Reading the input or writing the output failed
 */
export class BackendIOError extends BackendFailure {
  readonly kind = "IOError" as const;

  constructor(message: string) {
    super(message);
    this.name = "BackendIOError";
  }
}

/**
 * The source uses a construct the translator cannot handle yet
 */
export class UnimplementedFeatureError extends BackendFailure {
  readonly kind = "UnimplementedFeature" as const;

  constructor(message: string) {
    super(message);
    this.name = "UnimplementedFeatureError";
  }
}

export const isBackendFailure = (error: unknown): error is BackendFailure =>
  error instanceof BackendFailure;
