import { expect } from 'chai';

import {
  AddressKind,
  ConnectionStringParser,
  Int32,
  type ParsedUri,
  SeverityLevel,
  UriParseError,
  type UriParseErrorKind
} from '../internal';

type HostObject = {
  type: 'hostname' | 'unix';
  host: string;
  port: number;
};

type OptionObject = {
  key: string;
  value: number | boolean | string;
};

type TagObject = {
  key: string;
  value: string;
};

export interface UriFixtureTest {
  description: string;
  uri: string;
  valid: boolean;
  error?: UriParseErrorKind;
  hosts?: HostObject[];
  auth?: { username: string; password: string } | null;
  database?: string | null;
  options?: OptionObject[];
  readPreferenceTagGroups?: TagObject[][];
}

const knownTestKeys = [
  'description',
  'uri',
  'valid',
  'error',
  'hosts',
  'auth',
  'database',
  'options',
  'readPreferenceTagGroups'
];

const parser = new ConnectionStringParser({ logLevel: SeverityLevel.OFF });

function toHostObject(uri: ParsedUri): HostObject[] {
  return uri.hosts.map(({ host, port, addressKind }): HostObject => ({
    type: addressKind === AddressKind.UNIX_DOMAIN_SOCKET ? 'unix' : 'hostname',
    host,
    port
  }));
}

function toOptionObjects(uri: ParsedUri): OptionObject[] {
  return uri.options.map(({ key, value }) => ({
    key,
    value: value instanceof Int32 ? value.value : value
  }));
}

export function executeUriFixtureTest(test: UriFixtureTest): void {
  expect(knownTestKeys).to.include.members(Object.keys(test));

  if (!test.valid) {
    expect(test, 'invalid fixtures must name an error kind').to.have.property('error');
    expect(() => parser.parse(test.uri))
      .to.throw(UriParseError)
      .with.property('kind', test.error);
    return;
  }

  const uri = parser.parse(test.uri);
  const errorMessage = `"${test.uri}"`;

  expect(uri.originalString, errorMessage).to.equal(test.uri);

  if (test.hosts != null) {
    expect(toHostObject(uri), errorMessage).to.deep.equal(test.hosts);
  }

  if (test.auth === null) {
    expect(uri.username, errorMessage).to.be.undefined;
    expect(uri.password, errorMessage).to.be.undefined;
  } else if (test.auth != null) {
    expect(uri.username, errorMessage).to.equal(test.auth.username);
    expect(uri.password, errorMessage).to.equal(test.auth.password);
  }

  if (test.database === null) {
    expect(uri.database, errorMessage).to.be.undefined;
  } else if (test.database != null) {
    expect(uri.database, errorMessage).to.equal(test.database);
  }

  if (test.options != null) {
    expect(toOptionObjects(uri), errorMessage).to.deep.equal(test.options);
  }

  if (test.readPreferenceTagGroups != null) {
    expect(
      uri.readPreferenceTagGroups.map(group => group.map(({ key, value }) => ({ key, value }))),
      errorMessage
    ).to.deep.equal(test.readPreferenceTagGroups);
  }

  expect(parser.copy(uri).equals(uri), `copy of ${errorMessage}`).to.be.true;
}
