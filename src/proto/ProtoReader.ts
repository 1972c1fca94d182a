/**
 * Bounds-checked protobuf wire reader. Every malformed input surfaces as a
 * DecodeError; nothing past `end` is ever read.
 */

import { DecodeError } from '../core/errors.ts';
import { zigzagDecode32 } from '../util/varint.ts';
import { WireType } from './ProtoSink.ts';

const UTF8 = new TextDecoder('utf-8', { fatal: true });

export class ProtoReader {
  private pos: number;
  private readonly view: DataView;

  constructor(
    private readonly buf: Uint8Array,
    start = 0,
    private readonly end = buf.length,
    view?: DataView
  ) {
    this.pos = start;
    this.view = view ?? new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  get done(): boolean {
    return this.pos >= this.end;
  }

  /** Read a field tag as [fieldNumber, wireType]. */
  tag(): [number, number] {
    const key = this.uint32();
    const field = key >>> 3;
    if (field === 0) throw new DecodeError(`invalid field number 0 at offset ${this.pos}`);
    return [field, key & 7];
  }

  /** Throw unless the field arrived with the expected wire type. */
  expect(field: number, actual: number, expected: WireType): void {
    if (actual !== expected) {
      throw new DecodeError(`field ${field}: wire type ${actual}, expected ${expected}`);
    }
  }

  uint32(): number {
    let result = 0;
    let shift = 0;
    for (let i = 0; i < 10; i++) {
      const b = this.byte();
      if (shift < 32) result |= (b & 0x7f) << shift;
      shift += 7;
      if ((b & 0x80) === 0) return result >>> 0;
    }
    throw new DecodeError('varint longer than 10 bytes');
  }

  int32(): number {
    return this.uint32() | 0;
  }

  sint32(): number {
    return zigzagDecode32(this.uint32());
  }

  uint64(): bigint {
    let result = 0n;
    let shift = 0n;
    for (let i = 0; i < 10; i++) {
      const b = this.byte();
      result |= BigInt(b & 0x7f) << shift;
      shift += 7n;
      if ((b & 0x80) === 0) return BigInt.asUintN(64, result);
    }
    throw new DecodeError('varint longer than 10 bytes');
  }

  int64(): bigint {
    return BigInt.asIntN(64, this.uint64());
  }

  bool(): boolean {
    return this.uint64() !== 0n;
  }

  fixed64(): bigint {
    const at = this.advance(8);
    return this.view.getBigUint64(at, true);
  }

  sfixed64(): bigint {
    const at = this.advance(8);
    return this.view.getBigInt64(at, true);
  }

  double(): number {
    const at = this.advance(8);
    return this.view.getFloat64(at, true);
  }

  bytes(): Uint8Array {
    const n = this.uint32();
    const at = this.advance(n);
    return new Uint8Array(this.buf.subarray(at, at + n));
  }

  string(): string {
    const n = this.uint32();
    const at = this.advance(n);
    try {
      return UTF8.decode(this.buf.subarray(at, at + n));
    } catch (err) {
      throw new DecodeError('string field is not valid UTF-8', { cause: err });
    }
  }

  /** Reader over the next length-delimited field. */
  sub(): ProtoReader {
    const n = this.uint32();
    const at = this.advance(n);
    return new ProtoReader(this.buf, at, at + n, this.view);
  }

  skip(wireType: number): void {
    switch (wireType) {
      case WireType.VARINT:
        this.uint64();
        return;
      case WireType.FIXED64:
        this.advance(8);
        return;
      case WireType.LEN:
        this.advance(this.uint32());
        return;
      case WireType.FIXED32:
        this.advance(4);
        return;
      default:
        throw new DecodeError(`unsupported wire type ${wireType}`);
    }
  }

  // Repeated scalars arrive packed (LEN) or one value per tag.

  fixed64s(field: number, wireType: number, out: bigint[]): void {
    if (wireType === WireType.LEN) {
      const r = this.sub();
      while (!r.done) out.push(r.fixed64());
      return;
    }
    this.expect(field, wireType, WireType.FIXED64);
    out.push(this.fixed64());
  }

  doubles(field: number, wireType: number, out: number[]): void {
    if (wireType === WireType.LEN) {
      const r = this.sub();
      while (!r.done) out.push(r.double());
      return;
    }
    this.expect(field, wireType, WireType.FIXED64);
    out.push(this.double());
  }

  uint64s(field: number, wireType: number, out: bigint[]): void {
    if (wireType === WireType.LEN) {
      const r = this.sub();
      while (!r.done) out.push(r.uint64());
      return;
    }
    this.expect(field, wireType, WireType.VARINT);
    out.push(this.uint64());
  }

  private byte(): number {
    const b = this.pos < this.end ? this.buf[this.pos] : undefined;
    if (b === undefined) throw new DecodeError(`unexpected end of input at offset ${this.pos}`);
    this.pos++;
    return b;
  }

  /** Reserve n bytes and return their start offset. */
  private advance(n: number): number {
    if (this.pos + n > this.end) {
      throw new DecodeError(`unexpected end of input: need ${n} bytes at offset ${this.pos}`);
    }
    const at = this.pos;
    this.pos += n;
    return at;
  }
}
