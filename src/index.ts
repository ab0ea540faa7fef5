/** @public */
export { Int32 } from './bson';
export {
  ConnectionStringParser,
  type ConnectionStringParserOptions,
  copyConnectionString,
  parseConnectionString
} from './connection_string';
export {
  InvalidHostError,
  InvalidOptionError,
  InvalidPortError,
  InvalidSchemeError,
  InvalidUserinfoError,
  UriError,
  UriParseError,
  UriParseErrorKind
} from './error';
export { ParsedUri } from './parsed_uri';
export {
  parseTagGroup,
  type ReadPreferenceTag,
  type TagGroup,
  tagGroupToTagSet,
  type TagSet
} from './read_preference_tags';
export {
  type Log,
  type LogConvertible,
  type Loggable,
  SeverityLevel,
  UriLoggableComponent,
  UriLogger,
  type UriLoggerClientOptions,
  type UriLoggerEnvOptions,
  type UriLoggerOptions,
  type UriLogWritable
} from './uri_logger';
export { type OptionType, type UriOption, type UriOptionValue } from './uri_options';
export {
  AddressKind,
  CONNECTION_STRING_WARNING_CODE,
  DEFAULT_PORT,
  HostAddress,
  MAX_HOSTNAME_LENGTH
} from './utils';
