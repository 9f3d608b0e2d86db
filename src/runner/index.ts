/**
 * Runner infrastructure shared across CLI commands: structured logging,
 * artifact layout, error envelopes, redaction and back-off policy.
 */

// Artifacts
export {
  createArtifactWriter,
  generateRunId,
  listArtifacts,
  artifactFileFor,
  ARTIFACT_FILES,
  type ArtifactWriter,
  type RunSummary,
} from './artifacts.js';

// Logger
export {
  createLogger,
  LEVEL_PRIORITY,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  PipelineError,
  ConfigurationError,
  FallbackFailureError,
  PipelineAbortedError,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  EXIT_INTERRUPTED,
  type RunnerErrorEnvelope,
  type ErrorCode,
} from './errors.js';

// Redaction
export {
  redact,
  redactString,
  redactRecord,
  REDACT_DENYLIST_KEYS,
} from './redact.js';

// Retry
export {
  backoffDelay,
  sleep,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type Sleeper,
} from './retry.js';
