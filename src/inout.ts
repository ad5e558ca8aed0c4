/**
 * Input/output buffer views.

Every transform in this package reads from `input` and writes to `output`.
Both are views of equal length and may be:

- the same memory (in-place): `InOutBuf.fromMut(data)`
- disjoint memory (buffer-to-buffer): `InOutBuf.from(src, dst)`
- overlapping, with output starting before input. Works since each element
  is read before it is written and is never read again afterwards.

Overlap with input starting before output is rejected: the tail of input would be
overwritten before it is read.

A view has a unit size: 1 for bytes, `blockSize` for blocks. Lengths are counted in units.

    const buf = InOutBuf.fromMut(new Uint8Array(160), 16); // 10 blocks
    const { chunks, tail } = buf.intoChunks(4); // 2 groups of 4 blocks, tail of 2

 * @module
 */
import { LengthMismatchError } from './errors.ts';
import { abytes, anumber, aunits, complexOverlapBytes } from './utils.ts';

function sameView(a: Uint8Array, b: Uint8Array): boolean {
  return a === b || (a.buffer === b.buffer && a.byteOffset === b.byteOffset);
}

// Single pass: out[i] is written only after in[i] was read, and in[i] is never read again.
function xorInto(input: Uint8Array, data: Uint8Array, output: Uint8Array): void {
  for (let i = 0; i < output.length; i++) output[i] = input[i] ^ data[i];
}

/** Pair of equal-length views of a single element, usually a block. */
export class InOut {
  readonly input: Uint8Array;
  readonly output: Uint8Array;
  /** Checks lengths only. Use `InOut.from` for user-provided buffers. */
  constructor(input: Uint8Array, output: Uint8Array) {
    if (input.length !== output.length) throw new LengthMismatchError(input.length, output.length);
    this.input = input;
    this.output = output;
  }
  /** Single buffer which is both read and written. */
  static inPlace(buf: Uint8Array): InOut {
    abytes(buf, undefined, 'block');
    return new InOut(buf, buf);
  }
  /** Buffer-to-buffer pair. Throws `LengthMismatchError` when lengths differ. */
  static from(input: Uint8Array, output: Uint8Array): InOut {
    abytes(input, undefined, 'input');
    abytes(output, undefined, 'output');
    if (input.length !== output.length) throw new LengthMismatchError(input.length, output.length);
    complexOverlapBytes(input, output);
    return new InOut(input, output);
  }
  get length(): number {
    return this.input.length;
  }
  isInPlace(): boolean {
    return sameView(this.input, this.output);
  }
  copyIn2Out(): void {
    if (!this.isInPlace()) this.output.set(this.input);
  }
  /** `output = input ^ data`. */
  xorIn2Out(data: Uint8Array): void {
    if (data.length !== this.length)
      throw new Error(`xor: data (${data.length}) must be ${this.length} bytes`);
    xorInto(this.input, data, this.output);
  }
}

/** Result of `chunkPartition`. */
export type ChunkPartition = { chunks: number; tail: number };

/**
 * Splits `n` elements into full groups of `lanes` plus a tail which is always shorter than `lanes`.
 * @example chunkPartition(10, 4) // { chunks: 2, tail: 2 }
 */
export function chunkPartition(n: number, lanes: number): ChunkPartition {
  anumber(n);
  anumber(lanes);
  if (lanes < 1) throw new Error('lanes must be at least 1, got ' + lanes);
  return { chunks: Math.floor(n / lanes), tail: n % lanes };
}

/** Sequence of (input, output) element pairs backed by two equal-length byte views. */
export class InOutBuf implements Iterable<InOut> {
  /** Bytes per element. */
  readonly unit: number;
  private readonly inp: Uint8Array;
  private readonly out: Uint8Array;
  /** Checks lengths only. Use `InOutBuf.from` for user-provided buffers. */
  constructor(input: Uint8Array, output: Uint8Array, unit: number = 1) {
    if (input.length !== output.length) throw new LengthMismatchError(input.length, output.length);
    this.inp = input;
    this.out = output;
    this.unit = unit;
  }
  /** In-place view: always succeeds for whole units. */
  static fromMut(buf: Uint8Array, unit: number = 1): InOutBuf {
    checkUnit(unit);
    aunits(buf, unit, 'buffer');
    return new InOutBuf(buf, buf, unit);
  }
  /**
   * Buffer-to-buffer view. Throws `LengthMismatchError` when lengths differ;
   * nothing is read or written before the check.
   */
  static from(input: Uint8Array, output: Uint8Array, unit: number = 1): InOutBuf {
    checkUnit(unit);
    abytes(input, undefined, 'input');
    abytes(output, undefined, 'output');
    if (input.length !== output.length) throw new LengthMismatchError(input.length, output.length);
    aunits(input, unit, 'input');
    complexOverlapBytes(input, output);
    return new InOutBuf(input, output, unit);
  }
  /** Number of elements. */
  get length(): number {
    return this.inp.length / this.unit;
  }
  get byteLength(): number {
    return this.inp.length;
  }
  getIn(): Uint8Array {
    return this.inp;
  }
  getOut(): Uint8Array {
    return this.out;
  }
  isInPlace(): boolean {
    return sameView(this.inp, this.out);
  }
  /** Pair for element `i`. */
  get(i: number): InOut {
    anumber(i);
    if (i >= this.length) throw new Error(`index ${i} out of bounds for length ${this.length}`);
    const start = i * this.unit;
    const end = start + this.unit;
    return new InOut(this.inp.subarray(start, end), this.out.subarray(start, end));
  }
  /** Sub-view of elements `[start, end)`. */
  slice(start: number, end: number = this.length): InOutBuf {
    anumber(start);
    anumber(end);
    if (start > end || end > this.length)
      throw new Error(`invalid slice [${start}, ${end}) of length ${this.length}`);
    const s = start * this.unit;
    const e = end * this.unit;
    return new InOutBuf(this.inp.subarray(s, e), this.out.subarray(s, e), this.unit);
  }
  splitAt(mid: number): [InOutBuf, InOutBuf] {
    return [this.slice(0, mid), this.slice(mid)];
  }
  /**
   * Full groups of `lanes` elements in original order, then tail of `length % lanes` elements.
   * Tail is empty when length is a multiple of `lanes`.
   */
  intoChunks(lanes: number): { chunks: InOutBuf[]; tail: InOutBuf } {
    const { chunks: count } = chunkPartition(this.length, lanes);
    const chunks: InOutBuf[] = [];
    for (let i = 0; i < count; i++) chunks.push(this.slice(i * lanes, (i + 1) * lanes));
    return { chunks, tail: this.slice(count * lanes) };
  }
  /**
   * Regroups view into `blockSize`-sized elements plus byte tail (shorter than one block).
   * @example InOutBuf.fromMut(new Uint8Array(40)).intoBlocks(16) // 2 blocks, 8-byte tail
   */
  intoBlocks(blockSize: number): { blocks: InOutBuf; tail: InOutBuf } {
    checkUnit(blockSize);
    if (blockSize % this.unit !== 0)
      throw new Error(`block size ${blockSize} is not a multiple of unit ${this.unit}`);
    const split = Math.floor(this.byteLength / blockSize) * blockSize;
    const { inp, out } = this;
    return {
      blocks: new InOutBuf(inp.subarray(0, split), out.subarray(0, split), blockSize),
      tail: new InOutBuf(inp.subarray(split), out.subarray(split), 1),
    };
  }
  /** `output = input ^ keystream` over the whole view, element by element, byte by byte. */
  xorIn2Out(keystream: Uint8Array): void {
    abytes(keystream, this.byteLength, 'keystream');
    xorInto(this.inp, keystream, this.out);
  }
  copyIn2Out(): void {
    if (!this.isInPlace()) this.out.set(this.inp);
  }
  *[Symbol.iterator](): Iterator<InOut> {
    for (let i = 0; i < this.length; i++) yield this.get(i);
  }
}

function checkUnit(unit: number): void {
  anumber(unit);
  if (unit < 1) throw new Error('unit must be at least 1 byte, got ' + unit);
}
