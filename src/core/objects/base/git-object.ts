import { ObjectType } from './object-type';
import { ObjectException } from '@/core/exceptions';
import { HashUtils } from '@/utils';

export interface ParsedHeader {
  type: string;
  contentStartsAt: number;
  contentLength: number;
}

/**
 * Base for every stored object (blob, tree, commit).
 *
 * Stored form is a header followed by the content:
 * ┌──────────────────────────────────────────┐
 * │ "<type>" SPACE "<size>" NULL <content>   │
 * └──────────────────────────────────────────┘
 * and the object id is the SHA-1 of that whole byte sequence.
 */
export abstract class GitObject {
  abstract type(): ObjectType;

  /**
   * Raw content without the header
   */
  abstract content(): Uint8Array;

  /**
   * Replace this object's state from its stored form
   */
  abstract deserialize(data: Uint8Array): void;

  size(): number {
    return this.content().length;
  }

  sha(): string {
    return HashUtils.sha1Hex(this.serialize());
  }

  serialize(): Uint8Array {
    const content = this.content();
    const headerBytes = new TextEncoder().encode(`${this.type()} ${content.length}\0`);

    const result = new Uint8Array(headerBytes.length + content.length);
    result.set(headerBytes, 0);
    result.set(content, headerBytes.length);
    return result;
  }

  /**
   * Validate the "<type> <size>\0" header against this object's type and the
   * actual content length.
   */
  protected parseHeader(data: Uint8Array): ParsedHeader {
    const nullIndex = data.indexOf(0);
    const objectType = this.type();
    if (nullIndex === -1) {
      throw new ObjectException(`Invalid ${objectType} object: no null terminator found`);
    }

    const header = new TextDecoder('utf-8').decode(data.subarray(0, nullIndex));
    const [type, size] = header.split(' ');

    if (!type || !size) {
      throw new ObjectException(`Invalid ${objectType} object: malformed header`);
    }

    if (type !== objectType) {
      throw new ObjectException(`Invalid ${objectType} object: found type ${type}`);
    }

    const contentLength = data.length - nullIndex - 1;
    if (contentLength !== parseInt(size, 10)) {
      throw new ObjectException(`Content size mismatch expected: ${size}, got ${contentLength}`);
    }

    return { type, contentStartsAt: nullIndex + 1, contentLength };
  }
}
