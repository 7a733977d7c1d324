/**
 * Payload encoding helpers
 *
 * Bytes are passed through untouched, strings are UTF-8 encoded and every
 * other value is serialized as JSON.
 */

export type PayloadInput = Uint8Array | string | number | boolean | null | object;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function toPayload(input: PayloadInput): Uint8Array {
  if (input instanceof Uint8Array) {
    return input;
  }
  if (typeof input === 'string') {
    return encoder.encode(input);
  }
  return encodeJson(input);
}

export function encodeJson(value: unknown): Uint8Array {
  const json = JSON.stringify(value);
  if (json === undefined) {
    throw new TypeError('Payload is not JSON-serializable');
  }
  return encoder.encode(json);
}

export function decodeText(payload: Uint8Array): string {
  return decoder.decode(payload);
}

/**
 * Parse a JSON payload. Throws SyntaxError on malformed input.
 */
export function decodeJson(payload: Uint8Array): unknown {
  return JSON.parse(decoder.decode(payload));
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
