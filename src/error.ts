/** @public */
export const UriParseErrorKind = Object.freeze({
  INVALID_SCHEME: 'InvalidScheme',
  INVALID_USERINFO: 'InvalidUserinfo',
  INVALID_HOST: 'InvalidHost',
  INVALID_OPTION: 'InvalidOption'
} as const);

/** @public */
export type UriParseErrorKind = (typeof UriParseErrorKind)[keyof typeof UriParseErrorKind];

/**
 * @public
 * @category Error
 *
 * Base class for every error thrown by this package.
 */
export class UriError extends Error {
  constructor(message: string) {
    super(message);
  }

  override get name(): string {
    return 'UriError';
  }
}

/**
 * An error used when a connection string cannot be parsed. Parsing is all-or-nothing, so an
 * instance of this error never travels with a partially built result.
 * @public
 * @category Error
 */
export class UriParseError extends UriError {
  /** The stage of the connection string grammar that rejected the input */
  readonly kind: UriParseErrorKind;

  constructor(kind: UriParseErrorKind, message: string) {
    super(message);
    this.kind = kind;
  }

  override get name(): string {
    return 'UriParseError';
  }
}

/**
 * An error thrown when the connection string does not start with `mongodb://`
 * @public
 * @category Error
 */
export class InvalidSchemeError extends UriParseError {
  constructor(message: string) {
    super(UriParseErrorKind.INVALID_SCHEME, message);
  }

  override get name(): string {
    return 'InvalidSchemeError';
  }
}

/**
 * @public
 * @category Error
 */
export class InvalidUserinfoError extends UriParseError {
  constructor(message: string) {
    super(UriParseErrorKind.INVALID_USERINFO, message);
  }

  override get name(): string {
    return 'InvalidUserinfoError';
  }
}

/**
 * An error thrown when the host list is empty or one of its entries is malformed
 * @public
 * @category Error
 */
export class InvalidHostError extends UriParseError {
  constructor(message: string) {
    super(UriParseErrorKind.INVALID_HOST, message);
  }

  override get name(): string {
    return 'InvalidHostError';
  }
}

/**
 * An error thrown when the text after a host's `:` is not a usable port.
 * Reported under the same kind as {@link InvalidHostError}.
 * @public
 * @category Error
 */
export class InvalidPortError extends InvalidHostError {
  override get name(): string {
    return 'InvalidPortError';
  }
}

/**
 * @public
 * @category Error
 */
export class InvalidOptionError extends UriParseError {
  constructor(message: string) {
    super(UriParseErrorKind.INVALID_OPTION, message);
  }

  override get name(): string {
    return 'InvalidOptionError';
  }
}
