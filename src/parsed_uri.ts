import type { TagGroup } from './read_preference_tags';
import type { LogConvertible } from './uri_logger';
import { optionValuesEqual, type UriOption, type UriOptionValue } from './uri_options';
import type { HostAddress } from './utils';

/** @internal */
export const SCHEME = 'mongodb://';

const REDACTED_PASSWORD = '****';

/**
 * The pieces of a connection string collected while parsing, before they are frozen into a
 * {@link ParsedUri}.
 * @internal
 */
export interface ParsedUriFields {
  originalString: string;
  hosts: HostAddress[];
  username?: string;
  password?: string;
  database?: string;
  options: UriOption[];
  readPreferenceTagGroups: TagGroup[];
}

/**
 * An immutable, fully parsed connection string.
 *
 * Instances are only created by a successful parse; copying one means parsing its
 * {@link ParsedUri.originalString} again.
 * @public
 */
export class ParsedUri implements LogConvertible {
  /** The exact string this value was parsed from */
  readonly originalString: string;
  /** Hosts in the order they appear; never empty, duplicates kept */
  readonly hosts: readonly HostAddress[];
  readonly username?: string;
  readonly password?: string;
  readonly database?: string;
  /** Options in the order they appear; a repeated key adds another entry */
  readonly options: readonly UriOption[];
  /** One group per `readPreferenceTags` option, in the order they appear */
  readonly readPreferenceTagGroups: readonly TagGroup[];

  /** @internal */
  constructor(fields: ParsedUriFields) {
    this.originalString = fields.originalString;
    this.hosts = Object.freeze([...fields.hosts]);
    this.username = fields.username;
    this.password = fields.password;
    this.database = fields.database;
    this.options = Object.freeze(fields.options.map(option => Object.freeze({ ...option })));
    this.readPreferenceTagGroups = Object.freeze([...fields.readPreferenceTagGroups]);
    Object.freeze(this);
  }

  /**
   * The original string with the password replaced by `****`. Credentials are always the text
   * directly after the scheme, so the password is located by length rather than searched for.
   */
  get redactedString(): string {
    if (this.username == null || this.password == null) {
      return this.originalString;
    }
    const passwordStart = SCHEME.length + this.username.length + 1;
    return (
      this.originalString.slice(0, passwordStart) +
      REDACTED_PASSWORD +
      this.originalString.slice(passwordStart + this.password.length)
    );
  }

  /** Every value stored under `name`, compared case-insensitively, in encounter order. */
  getOption(name: string): UriOptionValue[] {
    const lowerName = name.toLowerCase();
    return this.options
      .filter(option => option.key.toLowerCase() === lowerName)
      .map(option => option.value);
  }

  equals(other: ParsedUri): boolean {
    return (
      this.originalString === other.originalString &&
      this.username === other.username &&
      this.password === other.password &&
      this.database === other.database &&
      this.hosts.length === other.hosts.length &&
      this.hosts.every((host, i) => host.equals(other.hosts[i])) &&
      this.options.length === other.options.length &&
      this.options.every(
        (option, i) =>
          option.key === other.options[i].key &&
          optionValuesEqual(option.value, other.options[i].value)
      ) &&
      this.readPreferenceTagGroups.length === other.readPreferenceTagGroups.length &&
      this.readPreferenceTagGroups.every((group, i) =>
        tagGroupsEqual(group, other.readPreferenceTagGroups[i])
      )
    );
  }

  toString(): string {
    return this.originalString;
  }

  [Symbol.for('nodejs.util.inspect.custom')](): string {
    return this.inspect();
  }

  inspect(): string {
    return `new ParsedUri('${this.redactedString}')`;
  }

  toLog(): Record<string, unknown> {
    return {
      message: 'Connection string parsed',
      uri: this.redactedString,
      hosts: this.hosts.map(host => host.display),
      database: this.database,
      options: this.options,
      readPreferenceTagGroups: this.readPreferenceTagGroups
    };
  }
}

function tagGroupsEqual(a: TagGroup, b: TagGroup): boolean {
  return (
    a.length === b.length &&
    a.every((tag, i) => tag.key === b[i].key && tag.value === b[i].value)
  );
}
