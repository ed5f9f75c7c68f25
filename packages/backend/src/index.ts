/**
 * pyxc backend - contract and toolchain adapter
 */

export { createToolchainBackend } from "./toolchain-backend.js";

export type {
  CompilerBackend,
  CompilerOptions,
  ModuleCompileMode,
} from "./types.js";

export {
  BackendFailure,
  BackendIOError,
  CompileError,
  EnvironmentError,
  UnimplementedFeatureError,
  isBackendFailure,
} from "./errors.js";

export { nativeExtensionSuffix } from "./toolchain.js";
