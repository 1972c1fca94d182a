/**
 * Two-pass protobuf encoding.
 *
 * Every message is described once, as a visitor that emits its fields into a
 * ProtoSink. The visitor runs twice:
 *
 * Pass 1, ProtoSizer: counts bytes and records the body size of every
 *   nested message in a size cache keyed by the record object. Strings are
 *   measured with Buffer.byteLength and rejected if they are not valid UTF-16.
 *
 * Pass 2, ProtoWriter: allocates exactly one Uint8Array of the computed
 *   size and writes every field in place, taking length prefixes from the
 *   cache. No intermediate buffers.
 *
 * Scalar fields equal to their proto3 default are skipped unless `always` is
 * set (oneof members and `optional` fields have explicit presence). Integers
 * outside their field's range throw EncodeError before anything is written.
 */

import { EncodeError } from '../core/errors.ts';
import { isWellFormedUtf16 } from '../util/utf8.ts';
import {
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  UINT32_MAX,
  UINT64_MAX,
  intVarintSize,
  varintSize,
  writeIntVarint,
  writeVarint,
  zigzagEncode32,
} from '../util/varint.ts';

export const WireType = {
  VARINT: 0,
  FIXED64: 1,
  LEN: 2,
  FIXED32: 5,
} as const;

export type WireType = (typeof WireType)[keyof typeof WireType];

export type Visitor<T> = (value: T, sink: ProtoSink) => void;

type SizeCache = Map<object, number>;

const ENC = new TextEncoder();

function checkInt32(field: number, value: number): void {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new EncodeError(`field ${field}: ${value} is not a valid int32`);
  }
}

function checkInt64(field: number, value: bigint): void {
  if (value < INT64_MIN || value > INT64_MAX) {
    throw new EncodeError(`field ${field}: ${value} is not a valid int64`);
  }
}

function checkUint64(field: number, value: bigint): void {
  if (value < 0n || value > UINT64_MAX) {
    throw new EncodeError(`field ${field}: ${value} is not a valid uint64`);
  }
}

export abstract class ProtoSink {
  string(field: number, value: string, always = false): void {
    if (value === '' && !always) return;
    this.stringField(field, value);
  }

  bytes(field: number, value: Uint8Array, always = false): void {
    if (value.length === 0 && !always) return;
    this.bytesField(field, value);
  }

  bool(field: number, value: boolean, always = false): void {
    if (!value && !always) return;
    this.varintField(field, value ? 1 : 0);
  }

  uint32(field: number, value: number, always = false): void {
    if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
      throw new EncodeError(`field ${field}: ${value} is not a valid uint32`);
    }
    if (value === 0 && !always) return;
    this.varintField(field, value);
  }

  /** int32 and enum values; negatives take ten bytes on the wire. */
  int32(field: number, value: number, always = false): void {
    checkInt32(field, value);
    if (value === 0 && !always) return;
    if (value < 0) this.varint64Field(field, BigInt(value));
    else this.varintField(field, value);
  }

  sint32(field: number, value: number, always = false): void {
    checkInt32(field, value);
    if (value === 0 && !always) return;
    this.varintField(field, zigzagEncode32(value));
  }

  int64(field: number, value: bigint, always = false): void {
    checkInt64(field, value);
    if (value === 0n && !always) return;
    this.varint64Field(field, value);
  }

  fixed64(field: number, value: bigint, always = false): void {
    checkUint64(field, value);
    if (value === 0n && !always) return;
    this.fixed64Field(field, value, false);
  }

  sfixed64(field: number, value: bigint, always = false): void {
    checkInt64(field, value);
    if (value === 0n && !always) return;
    this.fixed64Field(field, value, true);
  }

  double(field: number, value: number, always = false): void {
    if (Object.is(value, 0) && !always) return;
    this.doubleField(field, value);
  }

  packedFixed64(field: number, values: bigint[]): void {
    for (const v of values) checkUint64(field, v);
    if (values.length > 0) this.packedFixed64Field(field, values);
  }

  packedDouble(field: number, values: number[]): void {
    if (values.length > 0) this.packedDoubleField(field, values);
  }

  packedUint64(field: number, values: bigint[]): void {
    for (const v of values) checkUint64(field, v);
    if (values.length > 0) this.packedVarintField(field, values);
  }

  /** Length-delimited sub-message; always written, even when empty. */
  abstract message<T extends object>(field: number, value: T, visit: Visitor<T>): void;

  protected abstract varintField(field: number, value: number): void;
  protected abstract varint64Field(field: number, value: bigint): void;
  protected abstract fixed64Field(field: number, value: bigint, signed: boolean): void;
  protected abstract doubleField(field: number, value: number): void;
  protected abstract stringField(field: number, value: string): void;
  protected abstract bytesField(field: number, value: Uint8Array): void;
  protected abstract packedFixed64Field(field: number, values: bigint[]): void;
  protected abstract packedDoubleField(field: number, values: number[]): void;
  protected abstract packedVarintField(field: number, values: bigint[]): void;
}

function tagSize(field: number): number {
  return intVarintSize(field << 3);
}

// ─── Size calculation (pass 1) ──────────────────────────────────────────────

export class ProtoSizer extends ProtoSink {
  size = 0;

  constructor(private readonly sizes: SizeCache) {
    super();
  }

  message<T extends object>(field: number, value: T, visit: Visitor<T>): void {
    const start = this.size;
    visit(value, this);
    const body = this.size - start;
    this.sizes.set(value, body);
    this.size += tagSize(field) + intVarintSize(body);
  }

  protected varintField(field: number, value: number): void {
    this.size += tagSize(field) + intVarintSize(value);
  }

  protected varint64Field(field: number, value: bigint): void {
    this.size += tagSize(field) + varintSize(value);
  }

  protected fixed64Field(field: number): void {
    this.size += tagSize(field) + 8;
  }

  protected doubleField(field: number): void {
    this.size += tagSize(field) + 8;
  }

  protected stringField(field: number, value: string): void {
    if (!isWellFormedUtf16(value)) {
      throw new EncodeError(`field ${field}: string contains an unpaired surrogate`);
    }
    const n = Buffer.byteLength(value);
    this.size += tagSize(field) + intVarintSize(n) + n;
  }

  protected bytesField(field: number, value: Uint8Array): void {
    this.size += tagSize(field) + intVarintSize(value.length) + value.length;
  }

  protected packedFixed64Field(field: number, values: bigint[]): void {
    const n = values.length * 8;
    this.size += tagSize(field) + intVarintSize(n) + n;
  }

  protected packedDoubleField(field: number, values: number[]): void {
    const n = values.length * 8;
    this.size += tagSize(field) + intVarintSize(n) + n;
  }

  protected packedVarintField(field: number, values: bigint[]): void {
    let n = 0;
    for (const v of values) n += varintSize(v);
    this.size += tagSize(field) + intVarintSize(n) + n;
  }
}

// ─── Write pass (pass 2) ────────────────────────────────────────────────────

export class ProtoWriter extends ProtoSink {
  private readonly buf: Uint8Array;
  private readonly view: DataView;
  private pos = 0;

  constructor(
    size: number,
    private readonly sizes: SizeCache
  ) {
    super();
    this.buf = new Uint8Array(size);
    this.view = new DataView(this.buf.buffer);
  }

  message<T extends object>(field: number, value: T, visit: Visitor<T>): void {
    const body = this.sizes.get(value);
    if (body === undefined) {
      throw new EncodeError(`field ${field}: message was not measured before writing`);
    }
    this.tag(field, WireType.LEN);
    this.raw(body);
    visit(value, this);
  }

  finish(): Uint8Array {
    if (this.pos !== this.buf.length) {
      throw new EncodeError(`encoded ${this.pos} bytes, expected ${this.buf.length}`);
    }
    return this.buf;
  }

  protected varintField(field: number, value: number): void {
    this.tag(field, WireType.VARINT);
    this.raw(value);
  }

  protected varint64Field(field: number, value: bigint): void {
    this.tag(field, WireType.VARINT);
    this.pos += writeVarint(this.buf, this.pos, value);
  }

  protected fixed64Field(field: number, value: bigint, signed: boolean): void {
    this.tag(field, WireType.FIXED64);
    if (signed) {
      this.view.setBigInt64(this.pos, value, true);
    } else {
      this.view.setBigUint64(this.pos, value, true);
    }
    this.pos += 8;
  }

  protected doubleField(field: number, value: number): void {
    this.tag(field, WireType.FIXED64);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
  }

  protected stringField(field: number, value: string): void {
    this.tag(field, WireType.LEN);
    const n = Buffer.byteLength(value);
    this.raw(n);
    ENC.encodeInto(value, this.buf.subarray(this.pos));
    this.pos += n;
  }

  protected bytesField(field: number, value: Uint8Array): void {
    this.tag(field, WireType.LEN);
    this.raw(value.length);
    this.buf.set(value, this.pos);
    this.pos += value.length;
  }

  protected packedFixed64Field(field: number, values: bigint[]): void {
    this.tag(field, WireType.LEN);
    this.raw(values.length * 8);
    for (const v of values) {
      this.view.setBigUint64(this.pos, v, true);
      this.pos += 8;
    }
  }

  protected packedDoubleField(field: number, values: number[]): void {
    this.tag(field, WireType.LEN);
    this.raw(values.length * 8);
    for (const v of values) {
      this.view.setFloat64(this.pos, v, true);
      this.pos += 8;
    }
  }

  protected packedVarintField(field: number, values: bigint[]): void {
    this.tag(field, WireType.LEN);
    let n = 0;
    for (const v of values) n += varintSize(v);
    this.raw(n);
    for (const v of values) this.pos += writeVarint(this.buf, this.pos, v);
  }

  private tag(field: number, wireType: WireType): void {
    this.raw((field << 3) | wireType);
  }

  private raw(value: number): void {
    this.pos += writeIntVarint(this.buf, this.pos, value);
  }
}

/** Encode a top-level message (no length prefix). */
export function encodeMessage<T extends object>(value: T, visit: Visitor<T>): Uint8Array {
  const sizes: SizeCache = new Map();
  const sizer = new ProtoSizer(sizes);
  visit(value, sizer);
  const writer = new ProtoWriter(sizer.size, sizes);
  visit(value, writer);
  return writer.finish();
}
