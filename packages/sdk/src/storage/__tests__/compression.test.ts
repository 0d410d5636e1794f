/**
 * Compression service unit tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  CompressionService,
  compressToBase64,
  decompressFromBase64,
  getCompressionService,
} from '../compression.js';

describe('CompressionService', () => {
  let service: CompressionService;

  beforeEach(() => {
    service = new CompressionService();
  });

  describe('encode/decode', () => {
    it('should encode and decode an operation body', () => {
      const data = {
        operation: {
          operationId: 'op-1',
          recordId: 'note-1',
          kind: 'UPDATE',
          payload: { title: 'B', tags: ['a', 'b'] },
          baseVersion: 3,
        },
      };

      expect(service.decode(service.encode(data))).toEqual(data);
    });

    it('should keep null and drop nothing else', () => {
      expect(service.decode(service.encode({ a: null, b: 0 }))).toEqual({ a: null, b: 0 });
    });

    it('should reduce repetitive payloads', () => {
      const largeData = {
        changes: Array.from({ length: 100 }, (_, i) => ({
          recordId: `note-${i}`,
          payload: { description: 'A repeated description that compresses well.' },
        })),
      };

      expect(service.encode(largeData).length).toBeLessThan(JSON.stringify(largeData).length);
    });

    it('should fall back to JSON when MessagePack is disabled', () => {
      const plain = new CompressionService({ useMessagePack: false, useCompression: false });
      const encoded = plain.encode({ hello: 'world' });

      expect(new TextDecoder().decode(encoded)).toBe('{"hello":"world"}');
      expect(plain.decode(encoded)).toEqual({ hello: 'world' });
    });

    it('should reject bytes that are not deflated', () => {
      expect(() => service.decode(new Uint8Array([1, 2, 3]))).toThrow();
    });
  });

  describe('encodeToBase64/decodeFromBase64', () => {
    it('should produce valid base64 that decodes back', () => {
      const data = { test: 'value', num: 123 };
      const base64 = service.encodeToBase64(data);

      expect(base64).toMatch(/^[A-Za-z0-9+/]*={0,2}$/);
      expect(service.decodeFromBase64(base64)).toEqual(data);
    });

    it('should use the standard alphabet with padding', () => {
      const plain = new CompressionService({ useMessagePack: false, useCompression: false });
      const packed = new CompressionService({ useCompression: false });

      expect(plain.encodeToBase64({ a: 1 })).toBe('eyJhIjoxfQ==');
      expect(plain.decodeFromBase64('eyJhIjoxfQ==')).toEqual({ a: 1 });
      // 0xcc 0xff: a uint8 in MessagePack, both bytes above 0x7f
      expect(packed.encodeToBase64(255)).toBe('zP8=');
      expect(packed.decodeFromBase64('zP8=')).toBe(255);
    });
  });

  describe('default service', () => {
    it('should return the same instance', () => {
      expect(getCompressionService()).toBe(getCompressionService());
    });

    it('should round-trip through the quick helpers', () => {
      expect(decompressFromBase64(compressToBase64({ ok: true }))).toEqual({ ok: true });
    });
  });
});
