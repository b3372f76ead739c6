/**
 * Content is treated as binary when a NUL byte appears in its first 8000 bytes.
 */
export class BinaryDetector {
  public static readonly SNIFF_LENGTH = 8000;

  private constructor() {}

  public static isBinary(content: Uint8Array): boolean {
    const limit = Math.min(content.length, BinaryDetector.SNIFF_LENGTH);
    return content.subarray(0, limit).includes(0);
  }
}
