import { InvalidImageEncodingError } from '../errors';

export interface DecodedImage {
  extension: string;
  data: Buffer;
}

const DATA_URI = /^data:image\/([a-z0-9.+-]+);base64,(.*)$/is;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const EXTENSIONS: Record<string, string> = {
  jpeg: 'jpg',
  jpg: 'jpg',
  png: 'png',
  gif: 'gif',
  webp: 'webp',
  'svg+xml': 'svg',
};

/**
 * Decodes `data:image/<type>;base64,<payload>`. `field` names the request
 * field in the error raised for anything that does not decode.
 */
export function decodeImageDataUri(value: string, field: string): DecodedImage {
  const match = DATA_URI.exec(value.trim());
  if (!match) {
    throw new InvalidImageEncodingError(field, 'Expected a data:image/<type>;base64 URI');
  }

  const extension = EXTENSIONS[match[1].toLowerCase()];
  if (!extension) {
    throw new InvalidImageEncodingError(field, `Unsupported image type "${match[1]}"`);
  }

  const payload = match[2].replace(/\s+/g, '');
  if (payload.length === 0 || payload.length % 4 !== 0 || !BASE64.test(payload)) {
    throw new InvalidImageEncodingError(field, 'Image payload is not valid base64');
  }

  return { extension, data: Buffer.from(payload, 'base64') };
}
