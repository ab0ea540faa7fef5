export * from '../src/bson';
export * from '../src/connection_string';
export * from '../src/error';
export * from '../src/parsed_uri';
export * from '../src/read_preference_tags';
export * from '../src/uri_logger';
export * from '../src/uri_options';
export * from '../src/utils';
