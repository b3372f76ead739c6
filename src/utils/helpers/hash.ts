import { createHash } from 'crypto';

export class HashUtils {
  /**
   * SHA-1 of the given bytes as a lowercase hex string.
   */
  static sha1Hex(data: Uint8Array): string {
    return createHash('sha1').update(data).digest('hex');
  }

  static isSha1(value: string): boolean {
    return /^[0-9a-f]{40}$/.test(value);
  }

  static hexToBytes(hex: string): Uint8Array {
    return Uint8Array.from(Buffer.from(hex, 'hex'));
  }

  static bytesToHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
  }
}
