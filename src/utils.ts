import { InvalidHostError, InvalidPortError } from './error';

/** @public */
export const DEFAULT_PORT = 27017;

/** Longest host name (or socket path) a host entry may carry */
export const MAX_HOSTNAME_LENGTH = 255;

const MAX_PORT = 0xffff;
const INT64_MAX = 0x7fffffffffffffffn;
const INT64_MIN = -0x8000000000000000n;

/**
 * Finds the first character of `input` at or after `start` that is one of `stops` and is not
 * escaped. A backslash escapes the character after it; the backslash is never removed from the
 * text the caller slices out.
 *
 * @returns the index of the delimiter, or -1 when the input ends (or ends inside an escape)
 * before one is found
 */
export function scanToUnescaped(input: string, stops: string, start = 0): number {
  for (let index = start; index < input.length; index++) {
    const char = input[index];
    if (stops.includes(char)) {
      return index;
    }
    if (char === '\\') {
      index++;
      if (index >= input.length) break;
    }
  }
  return -1;
}

/**
 * Reads the base 10 integer at the start of `value`: leading whitespace, an optional sign, then
 * as many digits as follow. Text with no digits reads as 0.
 *
 * The number saturates at the signed 64 bit range and is then stored in 32 bits, keeping only the
 * low bits: `3000000000` reads as `-1294967296`.
 */
export function parseLeadingInt32(value: string): number {
  const match = /^\s*([+-]?\d+)/.exec(value);
  if (match == null) return 0;
  let parsed = BigInt(match[1]);
  if (parsed > INT64_MAX) parsed = INT64_MAX;
  if (parsed < INT64_MIN) parsed = INT64_MIN;
  return Number(BigInt.asIntN(32, parsed));
}

/** @internal */
export function parseUnsignedInteger(value: unknown): number | null {
  const parsedInt = typeof value === 'string' ? Number.parseInt(value, 10) : NaN;
  return parsedInt >= 0 ? parsedInt : null;
}

/** @public */
export const AddressKind = Object.freeze({
  NETWORK_HOST: 'networkHost',
  UNIX_DOMAIN_SOCKET: 'unixDomainSocket'
} as const);

/** @public */
export type AddressKind = (typeof AddressKind)[keyof typeof AddressKind];

/**
 * One endpoint of a connection string's host list: a network `host:port` pair or the path of a
 * local domain socket.
 * @public
 */
export class HostAddress {
  readonly host: string;
  readonly port: number;
  readonly addressKind: AddressKind;
  /** `host:port`, as shown to users */
  readonly display: string;

  constructor(host: string, port: number = DEFAULT_PORT) {
    if (host.length > MAX_HOSTNAME_LENGTH) {
      throw new InvalidHostError(
        `Host name cannot be longer than ${MAX_HOSTNAME_LENGTH} characters, got ${host.length}`
      );
    }
    if (!Number.isInteger(port) || port < 0 || port > MAX_PORT) {
      throw new InvalidPortError(`Port must be an integer between 0 and ${MAX_PORT}, got ${port}`);
    }

    this.host = host;
    this.port = port;
    // heuristically determine if we're working with a domain socket
    this.addressKind = host.includes('.sock')
      ? AddressKind.UNIX_DOMAIN_SOCKET
      : AddressKind.NETWORK_HOST;
    this.display = `${host}:${port}`;
    Object.freeze(this);
  }

  get isSocket(): boolean {
    return this.addressKind === AddressKind.UNIX_DOMAIN_SOCKET;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return this.inspect();
  }

  inspect(): string {
    return `new HostAddress('${this.display}')`;
  }

  toString(): string {
    return this.display;
  }

  equals(other: HostAddress): boolean {
    return (
      this.host === other.host &&
      this.port === other.port &&
      this.addressKind === other.addressKind
    );
  }

  /**
   * Parses one host token of a connection string. The token is split on its first unescaped
   * `:`; the text after it must start with a digit, and trailing characters after the leading
   * digits are ignored.
   */
  static fromString(token: string): HostAddress {
    const colon = scanToUnescaped(token, ':');
    if (colon === -1) {
      return new HostAddress(token);
    }

    const portText = token.slice(colon + 1);
    const digits = /^\d+/.exec(portText);
    if (digits == null) {
      throw new InvalidPortError(`Port for host "${token.slice(0, colon)}" must start with a digit`);
    }
    return new HostAddress(token.slice(0, colon), Number.parseInt(digits[0], 10));
  }
}

/**
 * When this package uses emitWarning the code will be equal to this.
 * @public
 */
export const CONNECTION_STRING_WARNING_CODE = 'CONNECTION STRING' as const;

/** @internal */
export function emitWarning(message: string): void {
  return process.emitWarning(message, { code: CONNECTION_STRING_WARNING_CODE });
}

const emittedWarnings = new Set<string>();
/**
 * Will emit a warning once for the duration of the application.
 * Uses the message to identify if it has already been emitted
 * so using string interpolation can cause multiple emits
 * @internal
 */
export function emitWarningOnce(message: string): void {
  if (!emittedWarnings.has(message)) {
    emittedWarnings.add(message);
    return emitWarning(message);
  }
}
