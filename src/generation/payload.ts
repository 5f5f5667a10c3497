/**
 * Decoding of the `result` field returned by remote generation apps.
 *
 * Apps answer either with bytes wrapped as base64 text, with opaque text,
 * or (over a binary response) with the bytes themselves.
 */

const DATA_URL_PREFIX = /^data:[^;,]*;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict base64 decode: null unless `text` is well-formed base64
 * (padding included). A `data:*;base64,` prefix and whitespace are ignored.
 */
export function decodeBase64Strict(text: string): Buffer | null {
  const body = text.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');

  if (body.length === 0 || body.length % 4 !== 0 || !BASE64_BODY.test(body)) {
    return null;
  }

  return Buffer.from(body, 'base64');
}

/**
 * Turn a result value into artifact bytes.
 * Text that is not valid base64 is kept as its UTF-8 bytes.
 */
export function decodeResultPayload(result: unknown): Buffer {
  if (typeof result === 'string') {
    return decodeBase64Strict(result) ?? Buffer.from(result, 'utf8');
  }

  if (Buffer.isBuffer(result)) {
    return result;
  }

  if (result instanceof Uint8Array) {
    return Buffer.from(result.buffer, result.byteOffset, result.byteLength);
  }

  if (result instanceof ArrayBuffer) {
    return Buffer.from(result);
  }

  return Buffer.from(JSON.stringify(result), 'utf8');
}

/**
 * True when a result carries no data at all
 */
export function isEmptyResult(result: unknown): boolean {
  if (result === undefined || result === null || result === false) return true;
  if (typeof result === 'string') return result.length === 0;
  if (result instanceof Uint8Array) return result.byteLength === 0;
  if (result instanceof ArrayBuffer) return result.byteLength === 0;
  if (typeof result === 'number') return result === 0;
  if (Array.isArray(result)) return result.length === 0;
  if (typeof result === 'object') return Object.keys(result).length === 0;
  return false;
}
