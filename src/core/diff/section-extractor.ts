/**
 * Reads the section label a hunk header carries after its closing "@@",
 * e.g. "@@ -10,4 +10,6 @@ function parse(input)" → "function parse(input)".
 */
export class SectionExtractor {
  private static readonly HUNK_DELIMITER = '@@';
  private static readonly decoder = new TextDecoder('utf-8', { fatal: true });

  private constructor() {}

  public static extract(header: Uint8Array): string | undefined {
    let text: string;
    try {
      text = SectionExtractor.decoder.decode(header);
    } catch {
      return undefined;
    }

    text = text.replace(/[\r\n]+$/, '');
    const delimiter = text.lastIndexOf(SectionExtractor.HUNK_DELIMITER);
    if (delimiter === -1) {
      return undefined;
    }

    const section = text.slice(delimiter + SectionExtractor.HUNK_DELIMITER.length).trim();
    return section.length > 0 ? section : undefined;
  }
}
