import { GitObject, ObjectType } from '../base';

/**
 * File content with no name or mode attached. Identical content always maps
 * to the same blob id, which is what lets the tree comparison detect exact
 * renames and copies without reading the bytes.
 */
export class BlobObject extends GitObject {
  private _content: Uint8Array;

  constructor(content?: Uint8Array) {
    super();
    this._content = content ? content.slice() : new Uint8Array();
  }

  override type(): ObjectType {
    return ObjectType.BLOB;
  }

  override content(): Uint8Array {
    return this._content;
  }

  override deserialize(data: Uint8Array): void {
    const { contentStartsAt, contentLength } = this.parseHeader(data);
    this._content = data.slice(contentStartsAt, contentStartsAt + contentLength);
  }
}
