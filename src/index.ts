export { LinkConfigCompiler } from './compiler';
export type {
  CompileResult,
  CompilerSettings,
  CompilerSettingsInput,
  PortOverrides,
} from './compiler';
export { runCli } from './cli/runCli';
export type { CliDeps } from './cli/runCli';
export {
  CompilerError,
  formatCompilerError,
  InvalidEnvironmentError,
  InvalidPortError,
  MalformedLinkError,
  UnsupportedTransportError,
} from './lib/errors';
export type { CompilerErrorCode } from './lib/errors';
export * from './modules';
