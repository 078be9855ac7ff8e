import { ApiResult, EndpointDescriptor, FormatOptions, FormattedRequest, HTTP_METHODS, HttpMethod } from '../types';
import { fail, ok } from '../utils/errors';

const CRLF = '\r\n';
const SUPPORTED_METHODS: ReadonlySet<string> = new Set(HTTP_METHODS);
const API_VERSION_PATTERN = /^v\d+\.\d+$/;
// Whitespace or control characters would split the request line
const UNSAFE_PATH_CHARS = /[\s\x00-\x1f\x7f]/;

export function isHttpMethod(method: string): method is HttpMethod {
  return SUPPORTED_METHODS.has(method);
}

/**
 * Build a complete HTTP/1.1 request for the daemon's API.
 *
 * The request asks the daemon to close the connection once it has answered,
 * so the transport can read the response until end of stream.
 */
export function formatApiRequest(
  descriptor: EndpointDescriptor,
  options: FormatOptions = {}
): ApiResult<FormattedRequest> {
  const { path, method } = descriptor;
  const body = descriptor.body ?? '';

  if (!isHttpMethod(method)) {
    return fail('request_preparation', `unsupported method "${String(method)}"`);
  }

  if (!path || !path.startsWith('/')) {
    return fail('request_preparation', `endpoint path must start with "/", got "${path}"`);
  }

  if (UNSAFE_PATH_CHARS.test(path)) {
    return fail('request_preparation', `endpoint path contains whitespace or control characters: ${JSON.stringify(path)}`);
  }

  let target = path;
  if (options.apiVersion !== undefined) {
    if (!API_VERSION_PATTERN.test(options.apiVersion)) {
      return fail('request_preparation', `invalid API version "${options.apiVersion}"`);
    }
    target = `/${options.apiVersion}${path}`;
  }

  const headers = [
    'Host: localhost',
    'Connection: close'
  ];

  if (body.length > 0) {
    headers.push('Content-Type: application/json');
    headers.push(`Content-Length: ${Buffer.byteLength(body, 'utf8')}`);
  } else if (method === 'POST' || method === 'PUT') {
    headers.push('Content-Length: 0');
  }

  const requestLine = `${method} ${target} HTTP/1.1`;

  return ok(requestLine + CRLF + headers.map(header => header + CRLF).join('') + CRLF + body);
}
