/**
 * Pipeline Error Handling
 * Error taxonomy for fetch, parse and persistence failures
 */

export enum PipelineErrorType {
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  MALFORMED_ENTRY = 'MALFORMED_ENTRY',
  PERSISTENCE_FAILURE = 'PERSISTENCE_FAILURE',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export type SourceFailureReason = 'network' | 'timeout' | 'status';

export abstract class PipelineError extends Error {
  abstract readonly type: PipelineErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A subscription source could not be retrieved; the source is skipped
 */
export class SourceUnavailableError extends PipelineError {
  readonly type = PipelineErrorType.SOURCE_UNAVAILABLE;

  constructor(
    readonly url: string,
    readonly reason: SourceFailureReason,
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A single entry of a payload could not be turned into a descriptor
 */
export class MalformedEntryError extends PipelineError {
  readonly type = PipelineErrorType.MALFORMED_ENTRY;
  readonly entry: string;

  constructor(message: string, entry: string, options?: { cause?: unknown }) {
    super(message, options);
    this.entry = excerpt(entry);
  }
}

/**
 * The output document could not be written; fatal for the run
 */
export class PersistenceError extends PipelineError {
  readonly type = PipelineErrorType.PERSISTENCE_FAILURE;

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A configuration value is out of range or unparseable
 */
export class ConfigError extends PipelineError {
  readonly type = PipelineErrorType.CONFIG_INVALID;

  constructor(readonly key: string, message: string) {
    super(message);
  }
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return typeof error === 'string' ? error : String(error);
}

/**
 * Classify a fetch failure into a source failure reason
 */
export function classifySourceFailure(error: unknown): SourceFailureReason {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return 'timeout';
  }
  const message = describeError(error);
  if (message.includes('timeout') || message.includes('ETIMEDOUT')) {
    return 'timeout';
  }
  return 'network';
}

const MAX_EXCERPT_LENGTH = 80;

function excerpt(entry: string): string {
  return entry.length > MAX_EXCERPT_LENGTH ? `${entry.slice(0, MAX_EXCERPT_LENGTH)}...` : entry;
}
