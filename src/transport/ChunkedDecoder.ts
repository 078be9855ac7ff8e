const HEADER_SEPARATOR = '\r\n\r\n';
const CRLF = '\r\n';
const CHUNK_SIZE_PATTERN = /^[0-9a-fA-F]+$/;

/**
 * Whether the header block declares chunked transfer coding
 */
export function isChunked(head: string): boolean {
  return head.split(CRLF).some(line => {
    const colon = line.indexOf(':');
    if (colon <= 0 || line.slice(0, colon).trim().toLowerCase() !== 'transfer-encoding') {
      return false;
    }
    return line
      .slice(colon + 1)
      .split(',')
      .some(coding => coding.trim().toLowerCase() === 'chunked');
  });
}

/**
 * Decode a chunked body. Sizes are byte counts, so this works on the raw
 * bytes and multi-byte characters may straddle chunk boundaries.
 * Trailers after the last chunk are dropped.
 */
export function decodeChunkedBody(encoded: Buffer): Buffer {
  const parts: Buffer[] = [];
  let offset = 0;

  for (;;) {
    const lineEnd = encoded.indexOf(CRLF, offset);
    if (lineEnd < 0) {
      throw new Error(`missing chunk size line at byte ${offset}`);
    }

    const sizeField = encoded.subarray(offset, lineEnd).toString('latin1').split(';')[0].trim();
    if (!CHUNK_SIZE_PATTERN.test(sizeField)) {
      throw new Error(`invalid chunk size "${sizeField}"`);
    }

    const size = parseInt(sizeField, 16);
    if (size === 0) {
      return Buffer.concat(parts);
    }

    const start = lineEnd + CRLF.length;
    const end = start + size;
    if (end + CRLF.length > encoded.length || encoded.toString('latin1', end, end + CRLF.length) !== CRLF) {
      throw new Error(`chunk of ${size} bytes is truncated`);
    }

    parts.push(encoded.subarray(start, end));
    offset = end + CRLF.length;
  }
}

/**
 * Replace a chunked body with its decoded bytes, keeping the status line and
 * headers as received. Other responses are returned unchanged.
 */
export function removeChunkedFraming(raw: Buffer): Buffer {
  const separatorIndex = raw.indexOf(HEADER_SEPARATOR);
  if (separatorIndex < 0) {
    return raw;
  }

  const bodyStart = separatorIndex + HEADER_SEPARATOR.length;
  if (!isChunked(raw.toString('latin1', 0, separatorIndex))) {
    return raw;
  }

  return Buffer.concat([raw.subarray(0, bodyStart), decodeChunkedBody(raw.subarray(bodyStart))]);
}
