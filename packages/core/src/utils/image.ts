import { GatewayError } from '../errors';

export type ImageMimeType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

export interface DecodedImage {
  /** Base64 without prefix or whitespace. */
  data: string;
  mimeType: ImageMimeType;
  sizeBytes: number;
}

const DATA_URL_PREFIX = /^data:[^,]*,/;
const BASE64_BODY = /^[A-Za-z0-9+/]+={0,2}$/;

function startsWith(bytes: Buffer, signature: number[], offset = 0): boolean {
  return signature.every((byte, index) => bytes[offset + index] === byte);
}

export function sniffImageType(bytes: Buffer): ImageMimeType | null {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'image/jpeg';
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'image/png';
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) return 'image/gif';
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) {
    return 'image/webp';
  }
  return null;
}

/**
 * Validates an encoded image payload. Compression is the client's job; this
 * only checks the encoding, the size ceiling and the format signature.
 */
export function decodeImagePayload(payload: string, maxBytes: number): DecodedImage {
  const data = payload.trim().replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');

  if (data.length === 0) {
    throw new GatewayError('InvalidImage', 'Image payload is empty');
  }
  if (data.length % 4 !== 0 || !BASE64_BODY.test(data)) {
    throw new GatewayError('InvalidImage', 'Image payload is not valid base64');
  }

  const bytes = Buffer.from(data, 'base64');
  if (bytes.length > maxBytes) {
    throw new GatewayError('InvalidImage', `Image is ${bytes.length} bytes, the limit is ${maxBytes}`, {
      details: { size_bytes: bytes.length, max_bytes: maxBytes }
    });
  }

  const mimeType = sniffImageType(bytes);
  if (!mimeType) {
    throw new GatewayError('InvalidImage', 'Image format is not JPEG, PNG, GIF or WebP');
  }

  return { data, mimeType, sizeBytes: bytes.length };
}
