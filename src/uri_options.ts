import { Int32 } from './bson';
import { emitWarningOnce, parseLeadingInt32 } from './utils';

/**
 * The value an option is stored under once coerced by its key.
 * @public
 */
export type UriOptionValue = Int32 | boolean | string;

/** @public */
export interface UriOption {
  /** The key as written in the connection string; case is preserved */
  readonly key: string;
  readonly value: UriOptionValue;
}

/**
 * How a recognized option key is coerced:
 * - `int32`: leading integer text, see {@link parseLeadingInt32}
 * - `int32OrString`: `int32` when the value starts with `-` or a digit, the raw string otherwise
 * - `boolean`: `true` only for the exact text `true`
 * - `tagGroup`: parsed as read preference tags instead of being stored as an option
 */
export type OptionType = 'int32' | 'int32OrString' | 'boolean' | 'tagGroup';

interface OptionDescriptor {
  type: OptionType;
}

/**
 * Recognized option keys, lowercased. Unrecognized keys are kept as strings.
 * @internal
 */
export const OPTIONS = {
  connecttimeoutms: { type: 'int32' },
  sockettimeoutms: { type: 'int32' },
  maxpoolsize: { type: 'int32' },
  minpoolsize: { type: 'int32' },
  maxidletimems: { type: 'int32' },
  waitqueuemultiple: { type: 'int32' },
  waitqueuetimeoutms: { type: 'int32' },
  wtimeoutms: { type: 'int32' },
  w: { type: 'int32OrString' },
  journal: { type: 'boolean' },
  slaveok: { type: 'boolean' },
  ssl: { type: 'boolean' },
  readpreferencetags: { type: 'tagGroup' }
} as const satisfies Record<string, OptionDescriptor>;

/** @internal */
export type RecognizedOptionName = keyof typeof OPTIONS;

function isRecognizedOption(name: string): name is RecognizedOptionName {
  return Object.prototype.hasOwnProperty.call(OPTIONS, name);
}

/** Looks up how an option key is coerced, ignoring the key's case. */
export function getOptionType(key: string): OptionType | 'string' {
  const name = key.toLowerCase();
  return isRecognizedOption(name) ? OPTIONS[name].type : 'string';
}

function getInt32(value: string): Int32 {
  return Object.freeze(new Int32(parseLeadingInt32(value)));
}

function getBoolean(name: string, value: string): boolean {
  if (value === 'true') return true;
  if (value !== 'false') {
    emitWarningOnce(
      `unrecognized value for ${name} : ${value} - only the literal true enables it, treating it as false`
    );
  }
  return false;
}

/**
 * Coerces the raw text of an option into the value it is stored as.
 *
 * Not valid for `readPreferenceTags`, which the parser routes to the tag group grammar instead.
 */
export function coerceOptionValue(key: string, value: string): UriOptionValue {
  switch (getOptionType(key)) {
    case 'int32':
      return getInt32(value);
    case 'int32OrString':
      return /^[-\d]/.test(value) ? getInt32(value) : value;
    case 'boolean':
      return getBoolean(key, value);
    default:
      return value;
  }
}

/** Compares two option values, treating Int32 instances by the number they hold. */
export function optionValuesEqual(a: UriOptionValue, b: UriOptionValue): boolean {
  if (a instanceof Int32 && b instanceof Int32) {
    return a.value === b.value;
  }
  return a === b;
}
