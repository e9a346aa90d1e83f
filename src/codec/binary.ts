import { MalformedValueError } from '../error/index.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * @throws {MalformedValueError} If the text is not padded standard base64
 */
export function decodeBase64(text: string): Uint8Array {
  if (!BASE64_PATTERN.test(text)) {
    throw new MalformedValueError(`Invalid base64 text: ${text.length > 40 ? `${text.slice(0, 40)}...` : text}`);
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}
