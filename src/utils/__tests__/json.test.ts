/**
 * Tests for safe JSON parsing utility
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { safeJsonParse } from '../json.js';

const MetadataSchema = z.record(z.string(), z.string());
const NumberList = z.array(z.number());

describe('safeJsonParse', () => {
  describe('valid JSON', () => {
    it('parses a JSON object matching the schema', () => {
      const result = safeJsonParse('{"rating":"5","source":"web"}', MetadataSchema, {});
      expect(result).toEqual({ rating: '5', source: 'web' });
    });

    it('parses a JSON array', () => {
      const result = safeJsonParse('[1,2,3]', NumberList, []);
      expect(result).toEqual([1, 2, 3]);
    });

    it('applies schema defaults', () => {
      const schema = z.object({ count: z.number().default(0) });
      const result = safeJsonParse('{}', schema, { count: -1 });
      expect(result).toEqual({ count: 0 });
    });
  });

  describe('null/undefined input', () => {
    it('returns fallback for null input', () => {
      expect(safeJsonParse(null, MetadataSchema, { empty: 'yes' })).toEqual({ empty: 'yes' });
    });

    it('returns fallback for undefined input', () => {
      expect(safeJsonParse(undefined, NumberList, [7])).toEqual([7]);
    });

    it('does not call onError for null input', () => {
      const onError = vi.fn();
      safeJsonParse(null, MetadataSchema, {}, onError);
      expect(onError).not.toHaveBeenCalled();
    });
  });

  describe('invalid JSON', () => {
    it('returns fallback for malformed JSON', () => {
      expect(safeJsonParse('{invalid json}', MetadataSchema, { fallback: 'true' })).toEqual({
        fallback: 'true',
      });
    });

    it('returns fallback for truncated JSON', () => {
      expect(safeJsonParse('{"name": "test', MetadataSchema, {})).toEqual({});
    });

    it('returns fallback for empty string', () => {
      expect(safeJsonParse('', NumberList, [])).toEqual([]);
    });
  });

  describe('schema mismatch', () => {
    it('returns fallback when the shape is wrong', () => {
      expect(safeJsonParse('{"rating":5}', MetadataSchema, {})).toEqual({});
    });

    it('reports the mismatch through onError', () => {
      const onError = vi.fn();
      safeJsonParse('["a"]', NumberList, [], onError);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(expect.any(Error), '["a"]');
    });
  });

  describe('onError callback', () => {
    it('calls onError with error and raw value on parse failure', () => {
      const onError = vi.fn();
      const invalidJson = '{bad: json}';

      safeJsonParse(invalidJson, MetadataSchema, {}, onError);

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(expect.any(Error), invalidJson);
    });

    it('does not call onError on successful parse', () => {
      const onError = vi.fn();
      safeJsonParse('{"valid":"true"}', MetadataSchema, {}, onError);
      expect(onError).not.toHaveBeenCalled();
    });

    it('propagates errors thrown by onError', () => {
      const onError = vi.fn(() => {
        throw new Error('callback error');
      });

      expect(() => {
        safeJsonParse('{invalid}', MetadataSchema, {}, onError);
      }).toThrow('callback error');
    });
  });
});
