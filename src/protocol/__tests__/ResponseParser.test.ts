import { extractResponseBody, parseHttpResponse } from '../ResponseParser';

describe('ResponseParser', () => {
  describe('parseHttpResponse', () => {
    it('should split status line, headers and body', () => {
      const raw = 'HTTP/1.1 200 OK\r\n' +
        'Content-Type: application/json\r\n' +
        'Api-Version: 1.43\r\n' +
        '\r\n' +
        '[]';

      const result = parseHttpResponse(raw);

      expect(result).toEqual({
        success: true,
        data: {
          statusCode: 200,
          statusText: 'OK',
          headers: {
            'content-type': 'application/json',
            'api-version': '1.43'
          },
          body: '[]'
        }
      });
    });

    it('should accept a status line without reason phrase', () => {
      const result = parseHttpResponse('HTTP/1.0 204\r\n\r\n');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.statusCode).toBe(204);
        expect(result.data.statusText).toBe('');
        expect(result.data.body).toBe('');
      }
    });

    it('should keep header values containing colons intact', () => {
      const result = parseHttpResponse('HTTP/1.1 200 OK\r\nDate: Mon, 01 Jan 2024 10:00:00 GMT\r\n\r\nx');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.headers.date).toBe('Mon, 01 Jan 2024 10:00:00 GMT');
      }
    });
  });

  describe('Failure Kinds', () => {
    it('should report an empty input as no response', () => {
      expect(extractResponseBody('')).toEqual({
        success: false,
        error: {
          type: 'no_response',
          message: 'Got no response from docker host: response was empty',
          reason: 'empty'
        }
      });
    });

    it('should report an absent input as no response', () => {
      const result = extractResponseBody(undefined);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe('no_response');
      }
    });

    it('should report a missing separator as malformed', () => {
      expect(extractResponseBody('HTTP/1.1 200 OK\r\nContent-Length: 2\r\n[]')).toEqual({
        success: false,
        error: {
          type: 'malformed_response',
          message: 'Response body was not valid: no blank line between headers and body',
          reason: 'missing_separator'
        }
      });
    });

    it('should report a bad status line as malformed', () => {
      const result = extractResponseBody('SSH-2.0-OpenSSH\r\n\r\nbody');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe('malformed_response');
        expect(result.error.reason).toBe('invalid_status_line');
      }
    });

    it('should report a header line without colon as malformed', () => {
      const result = extractResponseBody('HTTP/1.1 200 OK\r\nnot-a-header\r\n\r\nbody');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe('malformed_response');
        expect(result.error.reason).toBe('invalid_header');
      }
    });
  });

  describe('extractResponseBody', () => {
    it('should return the body after the first separator only', () => {
      const raw = 'HTTP/1.1 200 OK\r\nContent-Length: 15\r\n\r\nfirst\r\n\r\nsecond';

      expect(extractResponseBody(raw)).toEqual({ success: true, data: 'first\r\n\r\nsecond' });
    });

    it('should not touch the body encoding', () => {
      const raw = 'HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n2\r\n[]\r\n0\r\n\r\n';

      expect(extractResponseBody(raw)).toEqual({ success: true, data: '2\r\n[]\r\n0\r\n\r\n' });
    });
  });
});
