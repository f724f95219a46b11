import { describe, expect, it } from 'vitest';

import { BatchProcessQuerySchema } from '../endpoints/images/batchProcess.js';
import { ListImagesQuerySchema } from '../endpoints/images/list.js';
import { ProcessImageParamsSchema, ProcessImageQuerySchema } from '../endpoints/images/process.js';

describe('ProcessImageQuerySchema', () => {
  it('defaults to compress=true and medium quality', () => {
    expect(ProcessImageQuerySchema.parse({})).toEqual({ compress: true, quality: 'medium' });
  });

  it('reads "false" from the query string as false', () => {
    expect(ProcessImageQuerySchema.parse({ compress: 'false', quality: 'high' })).toEqual({
      compress: false,
      quality: 'high',
    });
  });

  it('rejects an unknown quality tier', () => {
    const result = ProcessImageQuerySchema.safeParse({ quality: 'ultra' });
    expect(result.success).toBe(false);
  });

  it('rejects a non-boolean compress flag', () => {
    const result = ProcessImageQuerySchema.safeParse({ compress: 'maybe' });
    expect(result.success).toBe(false);
  });
});

describe('ProcessImageParamsSchema', () => {
  it('accepts nested keys', () => {
    expect(ProcessImageParamsSchema.parse({ key: 'animals/fox.jpg' })).toEqual({ key: 'animals/fox.jpg' });
  });

  it.each(['', '/animals/fox.jpg', 'animals/../fox.jpg', 'animals//fox.jpg', 'animals\\fox.jpg'])(
    'rejects malformed key %j',
    (key) => {
      expect(ProcessImageParamsSchema.safeParse({ key }).success).toBe(false);
    }
  );
});

describe('ListImagesQuerySchema', () => {
  it('normalizes the extension filter', () => {
    expect(ListImagesQuerySchema.parse({ maxFiles: '5', fileType: 'JPG' })).toEqual({
      maxFiles: 5,
      fileType: '.jpg',
    });
  });

  it('caps maxFiles at 1000', () => {
    expect(ListImagesQuerySchema.safeParse({ maxFiles: '1001' }).success).toBe(false);
  });
});

describe('BatchProcessQuerySchema', () => {
  it('applies batch defaults', () => {
    expect(BatchProcessQuerySchema.parse({})).toEqual({ maxFiles: 10, compress: true, quality: 'medium' });
  });

  it('caps maxFiles at 100', () => {
    expect(BatchProcessQuerySchema.safeParse({ maxFiles: 101 }).success).toBe(false);
  });
});
