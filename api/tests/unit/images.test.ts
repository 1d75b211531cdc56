import { describe, expect, it } from 'vitest';
import { InvalidImageEncodingError } from '../../src/errors';
import { decodeImageDataUri } from '../../src/media/images';
import { PNG_DATA_URI } from '../support/app';

describe('decodeImageDataUri', () => {
  it('decodes a base64 PNG', () => {
    const image = decodeImageDataUri(PNG_DATA_URI, 'image');
    expect(image.extension).toBe('png');
    expect(image.data.subarray(1, 4).toString('ascii')).toBe('PNG');
  });

  it('maps jpeg to the jpg extension', () => {
    expect(decodeImageDataUri('data:image/jpeg;base64,AAAA', 'image').extension).toBe('jpg');
  });

  it('rejects values that are not data URIs', () => {
    expect(() => decodeImageDataUri('https://example.com/cat.png', 'image')).toThrow(
      'Invalid image encoding: Expected a data:image/<type>;base64 URI'
    );
  });

  it('rejects unsupported image types', () => {
    expect(() => decodeImageDataUri('data:image/bmp;base64,AAAA', 'image')).toThrow(
      'Invalid image encoding: Unsupported image type "bmp"'
    );
  });

  it('rejects a payload that is not base64', () => {
    expect(() => decodeImageDataUri('data:image/png;base64,not*base64', 'image')).toThrow(
      'Invalid image encoding: Image payload is not valid base64'
    );
  });

  it('rejects an empty payload', () => {
    expect(() => decodeImageDataUri('data:image/png;base64,', 'image')).toThrow(InvalidImageEncodingError);
  });

  it('names the request field in the error', () => {
    try {
      decodeImageDataUri('nope', 'avatar');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidImageEncodingError);
      if (error instanceof InvalidImageEncodingError) {
        expect(error.code).toBe('INVALID_IMAGE_ENCODING');
        expect(error.fields).toEqual({ avatar: ['Expected a data:image/<type>;base64 URI'] });
      }
    }
  });
});
