/**
 * Line bytes to display text: invalid UTF-8 becomes U+FFFD and the line
 * ending ("\n" or "\r\n") is dropped.
 */
export class LineSanitizer {
  private static readonly decoder = new TextDecoder('utf-8');

  private constructor() {}

  public static sanitize(content: Uint8Array): string {
    let text = LineSanitizer.decoder.decode(content);
    if (text.endsWith('\n')) {
      text = text.slice(0, -1);
      if (text.endsWith('\r')) {
        text = text.slice(0, -1);
      }
    }
    return text;
  }
}
