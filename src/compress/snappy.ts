import { ConnectError, Code } from '@connectrpc/connect';
import type { Compression } from '@connectrpc/connect/protocol';
import { compress, uncompress } from 'snappy';

/**
 * Uncompressed length from the varint that opens every snappy block, or
 * undefined when the header is truncated or longer than five bytes.
 */
function declaredLength(bytes: Uint8Array): number | undefined {
  let length = 0;
  for (let i = 0; i < 5; i++) {
    const b = bytes[i];
    if (b === undefined) return undefined;
    length += (b & 0x7f) * 2 ** (7 * i);
    if ((b & 0x80) === 0) return length;
  }
  return undefined;
}

function tooLarge(readMaxBytes: number): ConnectError {
  return new ConnectError(
    `message is larger than configured readMaxBytes ${readMaxBytes} after decompression`,
    Code.ResourceExhausted
  );
}

/** Block-format snappy as a Connect message compression (`grpc-encoding: snappy`). */
export const snappyCompression: Compression = {
  name: 'snappy',

  async compress(bytes: Uint8Array): Promise<Uint8Array> {
    return compress(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  },

  async decompress(bytes: Uint8Array, readMaxBytes: number): Promise<Uint8Array> {
    const declared = declaredLength(bytes);
    if (declared === undefined) {
      throw new ConnectError('invalid snappy data: bad length header', Code.InvalidArgument);
    }
    // Header first: nothing is inflated past the limit.
    if (declared > readMaxBytes) throw tooLarge(readMaxBytes);

    let out: string | Buffer;
    try {
      out = await uncompress(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength), {
        asBuffer: true,
      });
    } catch (err) {
      throw new ConnectError('invalid snappy data', Code.InvalidArgument, undefined, undefined, err);
    }
    const data = typeof out === 'string' ? Buffer.from(out) : out;
    if (data.byteLength > readMaxBytes) throw tooLarge(readMaxBytes);
    return data;
  },
};
