import { HunkwiseException } from '@/core/exceptions';
import { DiffSide, type FileRange, type Position, type Suggestion, type TextEdit } from './types';

type JsonObject = { [key: string]: unknown };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Turns the JSON form of a suggestion into a typed value:
 *
 *   { "title"?: string,
 *     "edits": [{ "location": { "path", "side": "head" | "base",
 *                               "range": { "start": { "line", "column"? }, "end": {...} } },
 *                 "replacement": string }] }
 *
 * Only the shape is checked here. Bounds and paths are checked when the
 * suggestion is planned against a workspace.
 */
export class SuggestionParser {
  public static parse(raw: unknown): Suggestion {
    if (!isObject(raw)) {
      throw new HunkwiseException('suggestion must be a JSON object');
    }

    const { title, edits } = raw;
    if (title !== undefined && typeof title !== 'string') {
      throw new HunkwiseException('suggestion title must be a string');
    }
    if (!Array.isArray(edits)) {
      throw new HunkwiseException('suggestion edits must be an array');
    }

    return {
      ...(title !== undefined && { title }),
      edits: edits.map((edit, index) => SuggestionParser.parseEdit(edit, `edits[${index}]`)),
    };
  }

  private static parseEdit(raw: unknown, where: string): TextEdit {
    if (!isObject(raw)) {
      throw new HunkwiseException(`${where} must be an object`);
    }
    if (typeof raw['replacement'] !== 'string') {
      throw new HunkwiseException(`${where}.replacement must be a string`);
    }
    return {
      location: SuggestionParser.parseLocation(raw['location'], `${where}.location`),
      replacement: raw['replacement'],
    };
  }

  private static parseLocation(raw: unknown, where: string): FileRange {
    if (!isObject(raw)) {
      throw new HunkwiseException(`${where} must be an object`);
    }
    const { path, side, range } = raw;
    if (typeof path !== 'string' || path.length === 0) {
      throw new HunkwiseException(`${where}.path must be a non-empty string`);
    }
    if (!isObject(range)) {
      throw new HunkwiseException(`${where}.range must be an object`);
    }
    return {
      path,
      side: SuggestionParser.parseSide(side, `${where}.side`),
      range: {
        start: SuggestionParser.parsePosition(range['start'], `${where}.range.start`),
        end: SuggestionParser.parsePosition(range['end'], `${where}.range.end`),
      },
    };
  }

  private static parseSide(raw: unknown, where: string): DiffSide {
    switch (raw) {
      case DiffSide.HEAD:
        return DiffSide.HEAD;
      case DiffSide.BASE:
        return DiffSide.BASE;
      default:
        throw new HunkwiseException(`${where} must be "head" or "base"`);
    }
  }

  private static parsePosition(raw: unknown, where: string): Position {
    if (!isObject(raw)) {
      throw new HunkwiseException(`${where} must be an object`);
    }
    const { line, column } = raw;
    if (typeof line !== 'number' || !Number.isInteger(line)) {
      throw new HunkwiseException(`${where}.line must be an integer`);
    }
    if (column === undefined || column === null) {
      return { line };
    }
    if (typeof column !== 'number' || !Number.isInteger(column)) {
      throw new HunkwiseException(`${where}.column must be an integer`);
    }
    return { line, column };
  }
}
