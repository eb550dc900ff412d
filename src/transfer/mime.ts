export const DEFAULT_MIME = 'application/octet-stream';

interface Signature {
  mime: string;
  /** Every (offset, bytes) pair must match */
  parts: { offset: number; bytes: number[] }[];
}

const SIGNATURES: Signature[] = [
  { mime: 'image/png', parts: [{ offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] }] },
  { mime: 'image/jpeg', parts: [{ offset: 0, bytes: [0xff, 0xd8, 0xff] }] },
  { mime: 'image/gif', parts: [{ offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] }] },
  { mime: 'image/bmp', parts: [{ offset: 0, bytes: [0x42, 0x4d] }] },
  // RIFF....WEBP
  {
    mime: 'image/webp',
    parts: [
      { offset: 0, bytes: [0x52, 0x49, 0x46, 0x46] },
      { offset: 8, bytes: [0x57, 0x45, 0x42, 0x50] },
    ],
  },
];

function matches(data: Uint8Array, signature: Signature): boolean {
  return signature.parts.every(
    ({ offset, bytes }) =>
      data.length >= offset + bytes.length && bytes.every((byte, i) => data[offset + i] === byte)
  );
}

/**
 * Guess an image MIME type from magic bytes
 */
export function sniffMime(data: Uint8Array): string {
  return SIGNATURES.find((signature) => matches(data, signature))?.mime ?? DEFAULT_MIME;
}

export function isImageMime(mime: string): boolean {
  return mime.startsWith('image/');
}
