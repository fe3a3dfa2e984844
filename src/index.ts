export {
  IgvSession,
  type IgvResponse,
  type IgvSessionOptions,
  type IgvStartOptions,
  type IgvSessionDeps,
  type LoadOptions,
  type SnapshotDirOptions,
  type SessionScope,
} from './application/IgvSession.js';
export { BatchScriptUseCase, type BatchStepResult } from './application/BatchScriptUseCase.js';

export {
  IgvClientError,
  InvalidArgumentError,
  InvalidOptionError,
  ConnectionError,
  NotConnectedError,
  PortInUseError,
  ProcessLaunchError,
  type ErrorClassification,
} from './domain/errors/DomainErrors.js';
export { BatchCommand } from './domain/value-objects/BatchCommand.js';
export { toArgumentText, type CommandArgument } from './domain/value-objects/CommandArgument.js';
export { SORT_OPTIONS, isSortOption, parseSortOption, type SortOption } from './domain/value-objects/SortOption.js';
export { expandPath, hasUrlScheme, resolveGenome, resolveLocation } from './domain/value-objects/DataLocation.js';
export type { TransportPort } from './domain/ports/TransportPort.js';
export type { LaunchOptions, ProcessLauncherPort } from './domain/ports/ProcessLauncherPort.js';
export type { ProcessRecord } from './domain/entities/ProcessRecord.js';
export type { ConnectionState } from './domain/entities/ConnectionState.js';

export { SocketTransport } from './infrastructure/socket/SocketTransport.js';
export {
  IgvProcessLauncher,
  readyMarker,
  type ChildHandle,
  type IgvProcessLauncherDeps,
  type SpawnFunction,
  type SignalFunction,
} from './infrastructure/process/IgvProcessLauncher.js';
export { probePort, type PortProbe, type PortStatus } from './infrastructure/process/PortProbe.js';

export { loadConfig, type IgvctlConfig, type PartialConfig } from './config/ConfigLoader.js';
export { DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config/defaults.js';
export { Logger, setDefaultLogLevel, LOG_LEVELS, type LogLevel, type LogSink } from './shared/Logger.js';
