/**
 * A line of file content with its terminator, if any.
 */
export type ContentLine = {
  bytes: Uint8Array;
  /**
   * Byte-exact comparison key (latin1 keeps one char per byte)
   */
  key: string;
  hasNewline: boolean;
};

export class LineSplitter {
  private constructor() {}

  /**
   * Split after every "\n". A final line without "\n" is kept as is.
   */
  public static split(content: Uint8Array): ContentLine[] {
    const buffer = Buffer.from(content.buffer, content.byteOffset, content.byteLength);
    const lines: ContentLine[] = [];
    let start = 0;

    while (start < buffer.length) {
      const newline = buffer.indexOf(0x0a, start);
      const end = newline === -1 ? buffer.length : newline + 1;
      const bytes = buffer.subarray(start, end);
      lines.push({ bytes, key: bytes.toString('latin1'), hasNewline: newline !== -1 });
      start = end;
    }

    return lines;
  }
}
