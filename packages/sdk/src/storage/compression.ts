/**
 * Compression service - wire body serialization and compression
 * @module compression
 */

import { encode, decode } from '@msgpack/msgpack';
import { deflate, inflate, type DeflateFunctionOptions } from 'pako';

/**
 * Content type of MessagePack + DEFLATE bodies, sent as base64 text
 */
export const COMPRESSED_CONTENT_TYPE = 'application/msgpack+deflate';

/**
 * Compression options
 */
export interface CompressionOptions {
  /**
   * Enable MessagePack binary encoding
   * @default true
   */
  useMessagePack?: boolean;

  /**
   * Enable DEFLATE compression
   * @default true
   */
  useCompression?: boolean;

  /**
   * Compression level (0-9)
   * @default 6
   */
  compressionLevel?: DeflateFunctionOptions['level'];
}

/**
 * Default compression options
 */
const DEFAULT_OPTIONS: Required<CompressionOptions> = {
  useMessagePack: true,
  useCompression: true,
  compressionLevel: 6,
};

/**
 * Compression service class
 *
 * Decoded values are `unknown`; callers validate them before use.
 */
export class CompressionService {
  private options: Required<CompressionOptions>;

  constructor(options: CompressionOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Encode and compress data
   */
  encode(data: unknown): Uint8Array {
    let result: Uint8Array = this.options.useMessagePack
      ? encode(data)
      : new TextEncoder().encode(JSON.stringify(data));

    if (this.options.useCompression) {
      result = deflate(result, { level: this.options.compressionLevel });
    }

    return result;
  }

  /**
   * Decompress and decode data
   */
  decode(data: Uint8Array): unknown {
    const bytes = this.options.useCompression ? inflate(data) : data;

    if (this.options.useMessagePack) {
      return decode(bytes);
    }
    return JSON.parse(new TextDecoder().decode(bytes));
  }

  /**
   * Encode to base64 string for transmission
   */
  encodeToBase64(data: unknown): string {
    return this.uint8ArrayToBase64(this.encode(data));
  }

  /**
   * Decode from base64 string
   */
  decodeFromBase64(data: string): unknown {
    return this.decode(this.base64ToUint8Array(data));
  }

  /**
   * Convert Uint8Array to base64 string
   */
  private uint8ArrayToBase64(bytes: Uint8Array): string {
    let binary = '';
    for (let i = 0; i < bytes.length; i++) {
      binary += String.fromCharCode(bytes[i]);
    }
    return btoa(binary);
  }

  /**
   * Convert base64 string to Uint8Array
   */
  private base64ToUint8Array(base64: string): Uint8Array {
    const binary = atob(base64);
    const bytes = new Uint8Array(binary.length);
    for (let i = 0; i < binary.length; i++) {
      bytes[i] = binary.charCodeAt(i);
    }
    return bytes;
  }
}

/**
 * Default compression service instance
 */
let defaultService: CompressionService | null = null;

/**
 * Get or create the default compression service
 */
export function getCompressionService(): CompressionService {
  if (!defaultService) {
    defaultService = new CompressionService();
  }
  return defaultService;
}

/**
 * Quick encode to base64
 */
export function compressToBase64(data: unknown): string {
  return getCompressionService().encodeToBase64(data);
}

/**
 * Quick decode from base64
 */
export function decompressFromBase64(data: string): unknown {
  return getCompressionService().decodeFromBase64(data);
}
