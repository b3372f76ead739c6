import zlib from 'zlib';
import { promisify } from 'util';

const deflate = promisify(zlib.deflate);
const inflate = promisify(zlib.inflate);

/**
 * zlib framing for loose objects.
 */
export class CompressionUtils {
  static readonly LEVEL = zlib.constants.Z_BEST_COMPRESSION;

  static async compress(data: Uint8Array): Promise<Buffer> {
    return await deflate(data, { level: CompressionUtils.LEVEL });
  }

  static async decompress(data: Uint8Array): Promise<Buffer> {
    return await inflate(data);
  }
}
