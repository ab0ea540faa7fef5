import { expect } from 'chai';

import {
  InvalidHostError,
  InvalidOptionError,
  InvalidPortError,
  InvalidSchemeError,
  InvalidUserinfoError,
  UriError,
  UriParseError,
  UriParseErrorKind
} from '../internal';

describe('Errors', function () {
  const errors = [
    { ErrorClass: InvalidSchemeError, kind: UriParseErrorKind.INVALID_SCHEME },
    { ErrorClass: InvalidUserinfoError, kind: UriParseErrorKind.INVALID_USERINFO },
    { ErrorClass: InvalidHostError, kind: UriParseErrorKind.INVALID_HOST },
    { ErrorClass: InvalidPortError, kind: UriParseErrorKind.INVALID_HOST },
    { ErrorClass: InvalidOptionError, kind: UriParseErrorKind.INVALID_OPTION }
  ];

  for (const { ErrorClass, kind } of errors) {
    describe(ErrorClass.name, function () {
      const error = new ErrorClass('message');

      it('is a UriParseError', function () {
        expect(error).to.be.instanceOf(UriParseError);
        expect(error).to.be.instanceOf(UriError);
        expect(error).to.be.instanceOf(Error);
      });

      it(`has kind ${kind}`, function () {
        expect(error.kind).to.equal(kind);
      });

      it('is named after its class', function () {
        expect(error.name).to.equal(ErrorClass.name);
      });

      it('keeps the message', function () {
        expect(error.message).to.equal('message');
      });
    });
  }

  it('treats port errors as host errors', function () {
    expect(new InvalidPortError('bad port')).to.be.instanceOf(InvalidHostError);
  });

  it('names the base classes', function () {
    expect(new UriError('x').name).to.equal('UriError');
    expect(new UriParseError(UriParseErrorKind.INVALID_HOST, 'x').name).to.equal('UriParseError');
  });

  it('includes the name in the stack', function () {
    const error = new InvalidOptionError('Option "x" must have the form key=value');
    expect(error.stack).to.match(/^InvalidOptionError: Option "x"/);
  });
});
