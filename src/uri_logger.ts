import type { Writable } from 'stream';
import { inspect } from 'util';

import { toExtendedJSON } from './bson';
import { parseUnsignedInteger } from './utils';

/** @public */
export const SeverityLevel = Object.freeze({
  EMERGENCY: 'emergency',
  ALERT: 'alert',
  CRITICAL: 'critical',
  ERROR: 'error',
  WARNING: 'warn',
  NOTICE: 'notice',
  INFORMATIONAL: 'info',
  DEBUG: 'debug',
  TRACE: 'trace',
  OFF: 'off'
} as const);

/** @public */
export type SeverityLevel = (typeof SeverityLevel)[keyof typeof SeverityLevel];

/** @internal */
export const SEVERITY_LEVEL_MAP: ReadonlyMap<SeverityLevel, number> = new Map<
  SeverityLevel,
  number
>([
  [SeverityLevel.OFF, -Infinity],
  [SeverityLevel.EMERGENCY, 0],
  [SeverityLevel.ALERT, 1],
  [SeverityLevel.CRITICAL, 2],
  [SeverityLevel.ERROR, 3],
  [SeverityLevel.WARNING, 4],
  [SeverityLevel.NOTICE, 5],
  [SeverityLevel.INFORMATIONAL, 6],
  [SeverityLevel.DEBUG, 7],
  [SeverityLevel.TRACE, 8]
]);

/** @public */
export const UriLoggableComponent = Object.freeze({
  CONNECTION_STRING: 'connectionString'
} as const);

/** @public */
export type UriLoggableComponent = (typeof UriLoggableComponent)[keyof typeof UriLoggableComponent];

/** @internal */
export const DEFAULT_MAX_DOCUMENT_LENGTH = 1000;

/** @public */
export interface UriLoggerEnvOptions {
  /** Severity level for the connection string component */
  CONNSTR_LOG_CONNECTION_STRING?: string;
  /** Default severity level to be used if any of the above are unset */
  CONNSTR_LOG_ALL?: string;
  /** Max length of embedded EJSON docs. Setting to 0 disables truncation. Defaults to 1000. */
  CONNSTR_LOG_MAX_DOCUMENT_LENGTH?: string;
  /** Destination for log messages. Must be 'stderr', 'stdout'. Defaults to 'stderr'. */
  CONNSTR_LOG_PATH?: string;
}

/** @public */
export interface UriLoggerClientOptions {
  /** Destination for log messages */
  logPath?: 'stdout' | 'stderr' | UriLogWritable;
  /** Severity for every component, overriding the environment */
  logLevel?: SeverityLevel;
  /** Overrides CONNSTR_LOG_MAX_DOCUMENT_LENGTH */
  maxDocumentLength?: number;
}

/** @public */
export interface UriLoggerOptions {
  componentSeverities: Partial<Record<UriLoggableComponent, SeverityLevel>> & {
    /** Severity level for components that have none of their own */
    default: SeverityLevel;
  };
  /** Max length of embedded EJSON docs. Setting to 0 disables truncation. */
  maxDocumentLength: number;
  /** Destination for log messages. */
  logDestination: UriLogWritable;
}

/** @public */
export interface Log extends Record<string, unknown> {
  t: Date;
  c: UriLoggableComponent;
  s: SeverityLevel;
  message?: string;
}

/** @public */
export interface UriLogWritable {
  write(log: Log): void;
}

/** @public */
export interface LogConvertible {
  toLog(): Record<string, unknown>;
}

/** @public */
export type Loggable = LogConvertible | Record<string, unknown>;

/**
 * Parses a string as one of SeverityLevel
 *
 * @param s - the value to be parsed
 * @returns one of SeverityLevel if value can be parsed as such, otherwise null
 */
export function parseSeverityFromString(s?: string): SeverityLevel | null {
  const lowerSeverity = s?.toLowerCase();
  for (const severity of Object.values(SeverityLevel)) {
    if (severity === lowerSeverity) return severity;
  }
  return null;
}

/** @internal */
export function createStdioLogger(stream: Pick<Writable, 'write'>): UriLogWritable {
  return {
    write: (log: Log): void => {
      stream.write(`${inspect(log, { compact: true, breakLength: Infinity })}\n`, 'utf-8');
    }
  };
}

/**
 * Resolves CONNSTR_LOG_PATH and the `logPath` parser option, preferring the option. Anything other
 * than 'stdout' falls back to stderr.
 */
function resolveLogPath(
  { CONNSTR_LOG_PATH }: UriLoggerEnvOptions,
  { logPath }: UriLoggerClientOptions
): UriLogWritable {
  if (typeof logPath === 'object') {
    return logPath;
  }
  const destination = logPath ?? CONNSTR_LOG_PATH;
  if (destination != null && /^stdout$/i.test(destination)) {
    return createStdioLogger(process.stdout);
  }
  return createStdioLogger(process.stderr);
}

function compareSeverity(s0: SeverityLevel, s1: SeverityLevel): 1 | 0 | -1 {
  const s0Num = SEVERITY_LEVEL_MAP.get(s0) ?? -Infinity;
  const s1Num = SEVERITY_LEVEL_MAP.get(s1) ?? -Infinity;

  return s0Num < s1Num ? -1 : s0Num > s1Num ? 1 : 0;
}

/**
 * Renders a document as relaxed EJSON, cut to `maxDocumentLength` characters with a trailing
 * `...` when it is longer. A `maxDocumentLength` of 0 disables truncation.
 */
export function stringifyWithMaxLen(value: unknown, maxDocumentLength: number): string {
  const ejson = toExtendedJSON(value);
  return maxDocumentLength !== 0 && ejson.length > maxDocumentLength
    ? `${ejson.slice(0, maxDocumentLength)}...`
    : ejson;
}

function isLogConvertible(obj: Loggable): obj is LogConvertible {
  return 'toLog' in obj && typeof obj.toLog === 'function';
}

function defaultLogTransform(
  logObject: Record<string, unknown>,
  maxDocumentLength: number
): Record<string, unknown> {
  const log: Record<string, unknown> = Object.create(null);
  for (const [key, value] of Object.entries(logObject)) {
    if (value == null) continue;
    log[key] =
      typeof value === 'object' && !(value instanceof Date)
        ? stringifyWithMaxLen(value, maxDocumentLength)
        : value;
  }
  return log;
}

/** @public */
export class UriLogger {
  componentSeverities: UriLoggerOptions['componentSeverities'];
  maxDocumentLength: number;
  logDestination: UriLogWritable;

  constructor(options: UriLoggerOptions) {
    this.componentSeverities = options.componentSeverities;
    this.maxDocumentLength = options.maxDocumentLength;
    this.logDestination = options.logDestination;
  }

  emergency = this.log.bind(this, 'emergency');
  error = this.log.bind(this, 'error');
  warn = this.log.bind(this, 'warn');
  info = this.log.bind(this, 'info');
  debug = this.log.bind(this, 'debug');
  trace = this.log.bind(this, 'trace');

  willLog(severity: SeverityLevel, component: UriLoggableComponent): boolean {
    if (severity === SeverityLevel.OFF) return false;
    const componentSeverity =
      this.componentSeverities[component] ?? this.componentSeverities.default;
    return compareSeverity(severity, componentSeverity) <= 0;
  }

  private log(
    severity: SeverityLevel,
    component: UriLoggableComponent,
    message: Loggable | string
  ): void {
    if (!this.willLog(severity, component)) return;

    let logMessage: Log = { t: new Date(), c: component, s: severity };
    if (typeof message === 'string') {
      logMessage.message = message;
    } else {
      const fields = isLogConvertible(message) ? message.toLog() : message;
      logMessage = { ...logMessage, ...defaultLogTransform(fields, this.maxDocumentLength) };
    }
    this.logDestination.write(logMessage);
  }

  /**
   * Merges options set through environment variables and the parser, preferring the parser
   * options when both are set, and substituting defaults for values not set.
   *
   * @remarks
   * When parsing component severity levels, invalid values are treated as unset. A component
   * left unset logs at the default severity.
   *
   * @param envOptions - options set for the logger from the environment
   * @param clientOptions - options set for the logger in the parser options
   * @returns a UriLoggerOptions object to be used when instantiating a new UriLogger
   */
  static resolveOptions(
    envOptions: UriLoggerEnvOptions,
    clientOptions: UriLoggerClientOptions
  ): UriLoggerOptions {
    const defaultSeverity =
      clientOptions.logLevel ??
      parseSeverityFromString(envOptions.CONNSTR_LOG_ALL) ??
      SeverityLevel.OFF;

    const componentSeverities: UriLoggerOptions['componentSeverities'] = {
      default: defaultSeverity
    };
    const connectionStringSeverity =
      clientOptions.logLevel ?? parseSeverityFromString(envOptions.CONNSTR_LOG_CONNECTION_STRING);
    if (connectionStringSeverity != null) {
      componentSeverities.connectionString = connectionStringSeverity;
    }

    return {
      componentSeverities,
      maxDocumentLength:
        clientOptions.maxDocumentLength ??
        parseUnsignedInteger(envOptions.CONNSTR_LOG_MAX_DOCUMENT_LENGTH) ??
        DEFAULT_MAX_DOCUMENT_LENGTH,
      logDestination: resolveLogPath(envOptions, clientOptions)
    };
  }
}
