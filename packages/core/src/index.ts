/**
 * @radvctl/core - control-plane client for the RA daemon
 */

// Client
export {
  ControlClient,
  MAX_TIMEOUT_MS,
  type CallOptions,
  type ControlClientOptions,
  type FetchLike,
} from './client/control-client.js';

// Errors
export {
  ControlError,
  EncodeError,
  RequestError,
  TransportError,
  ServerError,
  DecodeError,
  DaemonError,
  isControlError,
  describeCause,
  formatError,
  type AnyControlError,
  type ControlErrorKind,
} from './errors.js';

// Schema
export {
  DEFAULT_INTERFACE_STATES,
  type Config,
  type InterfaceConfig,
  type PrefixConfig,
  type Status,
  type InterfaceStatus,
  type InterfaceState,
  type KnownInterfaceState,
  type ErrorPayload,
} from './schema/types.js';
export {
  ConfigSchema,
  InterfaceConfigSchema,
  ErrorPayloadSchema,
  createStatusSchema,
  encodeConfig,
  decodeConfig,
  decodeStatus,
  decodeErrorPayload,
} from './schema/codec.js';

// Config files
export { ConfigLoader, ConfigLoadError } from './config/loader.js';
export { checkConfig, type ConfigIssue } from './config/check.js';

// Logging
export {
  createLogger,
  formatLogLine,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogMeta,
} from './utils/logger.js';
export { getLocalTimestamp } from './utils/timestamp.js';
