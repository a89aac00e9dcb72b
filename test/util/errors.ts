import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  buildJsonErrorResponse, ConflictError, getCodeForError, getEndUserErrorMessage,
  getHttpStatusCode, HttpError, NotFoundError, RequestValidationError,
} from '../../app/util/errors';

describe('util/errors', function () {
  describe('getHttpStatusCode', function () {
    it('returns the code of an HttpError', function () {
      expect(getHttpStatusCode(new ConflictError())).to.equal(409);
    });

    it('returns 500 for other errors', function () {
      expect(getHttpStatusCode(new TypeError('boom'))).to.equal(500);
    });

    it('returns 500 for an HttpError with a code that is not an error status', function () {
      expect(getHttpStatusCode(new HttpError(302, 'moved'))).to.equal(500);
    });
  });

  describe('getEndUserErrorMessage', function () {
    it('returns the message of an HttpError', function () {
      expect(getEndUserErrorMessage(new NotFoundError('Item x does not exist'))).to.equal('Item x does not exist');
    });

    it('hides the message of other errors', function () {
      expect(getEndUserErrorMessage(new Error('connection refused to db:5432'))).to.equal('Internal server error');
    });
  });

  describe('getCodeForError', function () {
    it('uses the error class name', function () {
      expect(getCodeForError(new RequestValidationError())).to.equal('RequestValidationError');
    });

    it('uses ServerError for errors that are not HttpErrors', function () {
      expect(getCodeForError(new RangeError())).to.equal('ServerError');
    });
  });

  it('builds STAC error responses', function () {
    expect(buildJsonErrorResponse('NotFoundError', 'gone')).to.eql({ code: 'NotFoundError', description: 'Error: gone' });
  });
});
