/**
 * Byte-level stream cipher on top of a block-level stream core.
 *
 * Keeps unused bytes of the last keystream block, so data can be processed
 * in pieces of any size: `apply(2 bytes) ‖ apply(3 bytes) === apply(5 bytes)`.
 * @module
 */
import { InsufficientCapacityError, OverflowError } from './errors.ts';
import { InOutBuf } from './inout.ts';
import type { Counter, StreamCipherCore, StreamCipherSeekCore } from './stream.ts';
import { anumber, ceilDiv, clean } from './utils.ts';

type SeekWrapper = StreamCipherCoreWrapper<StreamCipherSeekCore<Counter>>;

/** Applies keystream of a block-level core to data of any length, with seek for seekable cores. */
export class StreamCipherCoreWrapper<T extends StreamCipherCore> {
  readonly core: T;
  private readonly buf: Uint8Array;
  // Read position in buf; blockSize means no leftovers
  private pos: number;
  constructor(core: T) {
    this.core = core;
    this.buf = new Uint8Array(core.blockSize);
    this.pos = core.blockSize;
  }
  get blockSize(): number {
    return this.core.blockSize;
  }
  private leftover(): number {
    return this.blockSize - this.pos;
  }
  /** Keystream bytes left before counter wraps around; `undefined` if unbounded. */
  remaining(): number | undefined {
    const rem = this.core.remainingBlocks();
    if (rem === undefined) return undefined;
    const bytes = rem * this.blockSize + this.leftover();
    return Number.isSafeInteger(bytes) ? bytes : undefined;
  }
  private checkRemaining(len: number): InsufficientCapacityError | undefined {
    const rem = this.core.remainingBlocks();
    const left = this.leftover();
    if (rem === undefined || len <= left) return undefined;
    const needed = ceilDiv(len - left, this.blockSize);
    return needed > rem ? new InsufficientCapacityError(needed, rem) : undefined;
  }
  // Buffered bytes can be served without the core
  private checkUsable(len: number): void {
    if (this.core.consumed && len > this.leftover())
      throw new Error('stream core was consumed by partial keystream application, seek first');
  }
  /**
   * `output = input ^ keystream`. Returns `InsufficientCapacityError` without
   * touching anything if keystream is not enough.
   */
  tryApplyKeystream(buf: InOutBuf | Uint8Array): InsufficientCapacityError | undefined {
    let data = buf instanceof InOutBuf ? buf : InOutBuf.fromMut(buf);
    if (data.unit !== 1) throw new Error('byte view expected, got unit=' + data.unit);
    const err = this.checkRemaining(data.byteLength);
    if (err) return err;
    this.checkUsable(data.byteLength);
    const { blockSize, core } = this;
    // Leftovers
    if (this.pos < blockSize) {
      const take = Math.min(data.byteLength, blockSize - this.pos);
      data.slice(0, take).xorIn2Out(this.buf.subarray(this.pos, this.pos + take));
      this.pos += take;
      data = data.slice(take);
    }
    // Full blocks directly to output
    const { blocks, tail } = data.intoBlocks(blockSize);
    if (blocks.length > 0) core.applyKeystreamBlocks(blocks);
    // Save leftovers
    const left = tail.byteLength;
    if (left > 0) {
      core.writeKeystreamBlocks(this.buf);
      tail.xorIn2Out(this.buf.subarray(0, left));
      this.pos = left;
    }
    return undefined;
  }
  /** In-place `tryApplyKeystream`, throws on insufficient keystream. */
  applyKeystream(data: Uint8Array): void {
    const err = this.tryApplyKeystream(data);
    if (err) throw err;
  }
  /** Throws `LengthMismatchError` if lengths differ, `InsufficientCapacityError` if keystream ends. */
  applyKeystreamB2B(input: Uint8Array, output: Uint8Array): void {
    const err = this.tryApplyKeystream(InOutBuf.from(input, output));
    if (err) throw err;
  }
  /** Overwrites `out` with keystream. */
  writeKeystream(out: Uint8Array): void {
    const err = this.checkRemaining(out.length);
    if (err) throw err;
    this.checkUsable(out.length);
    out.fill(0);
    this.applyKeystream(out);
  }
  keystream(len: number): Uint8Array {
    anumber(len);
    const out = new Uint8Array(len);
    this.writeKeystream(out);
    return out;
  }
  /** Current byte position in keystream. Only for seekable cores. */
  currentPos(this: SeekWrapper): number {
    const block = this.core.counter.toNumber(this.core.getBlockPos());
    if (block === undefined) throw new OverflowError();
    const pos = block * this.blockSize - this.leftover();
    if (!Number.isSafeInteger(pos)) throw new OverflowError();
    return pos;
  }
  /** Moves to byte position. Returns `OverflowError` when it can't be represented by counter. */
  trySeek(this: SeekWrapper, pos: number): OverflowError | undefined {
    anumber(pos);
    const { blockSize, core } = this;
    const offset = pos % blockSize;
    const block = core.counter.fromNumber(Math.floor(pos / blockSize));
    if (block === undefined) return new OverflowError(`position ${pos} overflows counter`);
    if (offset > 0 && core.counter.remaining(block) === 0)
      return new OverflowError(`position ${pos} is past the end of keystream`);
    core.seekBlock(block);
    if (offset > 0) {
      core.writeKeystreamBlocks(this.buf);
      this.pos = offset;
    } else {
      this.pos = blockSize;
    }
    return undefined;
  }
  seek(this: SeekWrapper, pos: number): void {
    const err = this.trySeek(pos);
    if (err) throw err;
  }
  /** Zeroizes buffered keystream. */
  clean(): void {
    clean(this.buf);
    this.pos = this.blockSize;
  }
}
