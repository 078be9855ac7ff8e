import { ApiResult, ParsedHttpResponse } from '../types';
import { fail, ok } from '../utils/errors';

export const HEADER_SEPARATOR = '\r\n\r\n';

const STATUS_LINE_PATTERN = /^HTTP\/\d(?:\.\d)? (\d{3})(?: (.*))?$/;

/**
 * Split a raw HTTP response into status, headers and body.
 *
 * The body is everything after the first blank line, returned untouched:
 * no decompression, de-chunking or charset handling happens here.
 */
export function parseHttpResponse(raw: string | undefined): ApiResult<ParsedHttpResponse> {
  if (raw === undefined || raw.length === 0) {
    return fail('no_response', 'response was empty', 'empty');
  }

  const separatorIndex = raw.indexOf(HEADER_SEPARATOR);
  if (separatorIndex === -1) {
    return fail('malformed_response', 'no blank line between headers and body', 'missing_separator');
  }

  const head = raw.slice(0, separatorIndex);
  const body = raw.slice(separatorIndex + HEADER_SEPARATOR.length);
  const [statusLine, ...headerLines] = head.split('\r\n');

  const status = STATUS_LINE_PATTERN.exec(statusLine);
  if (!status) {
    return fail('malformed_response', `invalid status line ${JSON.stringify(statusLine)}`, 'invalid_status_line');
  }

  const headers: Record<string, string> = {};
  for (const line of headerLines) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      return fail('malformed_response', `invalid header line ${JSON.stringify(line)}`, 'invalid_header');
    }
    headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
  }

  return ok({
    statusCode: Number(status[1]),
    statusText: status[2] ?? '',
    headers,
    body
  });
}

/**
 * Extract only the body of a raw HTTP response
 */
export function extractResponseBody(raw: string | undefined): ApiResult<string> {
  const parsed = parseHttpResponse(raw);
  if (!parsed.success) {
    return parsed;
  }
  return ok(parsed.data.body);
}
