/**
 * Block-level synchronous stream ciphers.

A stream core turns (key, counter) into keystream blocks, one counter step per block.
Like block ciphers, it uses two phases:

- backend ({@link StreamBackend}) generates keystream blocks, optionally `parBlocks` at once
- closure ({@link StreamClosure}) decides where the keystream goes: written out
  as is, or xor-ed with caller data, with a hook per produced chunk

Counters:

- 32-bit counters are plain numbers, 64/128-bit counters are bigints
- `remainingBlocks()` is `max - counter`; `undefined` for unbounded constructions
  (e.g. sponge-based ones) or when it doesn't fit into a safe integer
- block-level methods (`writeKeystreamBlocks`, `applyKeystreamBlocks`) do NOT check
  remaining blocks: going past the end silently wraps the counter.
  `tryApplyKeystreamPartial` does, before touching any byte.

    core.applyKeystreamBlocks(InOutBuf.fromMut(data, core.blockSize), (out) => mac.update(out));
    core.applyKeystreamPartial(tail); // core can't be used until seekBlock()

 * @module
 */
import { InsufficientCapacityError } from './errors.ts';
import { InOutBuf } from './inout.ts';
import { anumber, ceilDiv, clean } from './utils.ts';

function checkSizes(blockSize: number, parBlocks: number): void {
  anumber(blockSize);
  anumber(parBlocks);
  if (blockSize < 1) throw new Error('blockSize must be at least 1, got ' + blockSize);
  if (parBlocks < 1) throw new Error('parBlocks must be at least 1, got ' + parBlocks);
}

/**
 * Generates keystream. Each generated block advances counter of the owning core by one.
 * `genParKsBlocks` overrides must produce the same bytes as `parBlocks` calls of `genKsBlock`.
 */
export abstract class StreamBackend {
  readonly blockSize: number;
  readonly parBlocks: number;
  constructor(blockSize: number, parBlocks: number = 1) {
    checkSizes(blockSize, parBlocks);
    this.blockSize = blockSize;
    this.parBlocks = parBlocks;
  }
  /** Writes next keystream block into `block`. */
  abstract genKsBlock(block: Uint8Array): void;
  /** Writes next `parBlocks` keystream blocks. */
  genParKsBlocks(blocks: Uint8Array): void {
    const { blockSize, parBlocks } = this;
    if (blocks.length !== blockSize * parBlocks)
      throw new Error(`lane group of ${blocks.length} bytes, expected ${blockSize * parBlocks}`);
    for (let i = 0; i < parBlocks; i++)
      this.genKsBlock(blocks.subarray(i * blockSize, (i + 1) * blockSize));
  }
  /** Writes less than `parBlocks` keystream blocks. */
  genTailBlocks(blocks: Uint8Array): void {
    const { blockSize, parBlocks } = this;
    const n = blocks.length / blockSize;
    if (!Number.isInteger(n) || n >= parBlocks)
      throw new Error(`tail of ${blocks.length} bytes, lane width is ${parBlocks}`);
    for (let i = 0; i < n; i++) this.genKsBlock(blocks.subarray(i * blockSize, (i + 1) * blockSize));
  }
}

/** Where keystream goes. Receives backend of the core and drives it. */
export interface StreamClosure {
  readonly blockSize: number;
  call(backend: StreamBackend): void;
}

/** Called once per produced chunk, with keystream of the same length. */
export type KeystreamBody = (chunk: InOutBuf, keystream: Uint8Array) => void;

/** Closure over a run of blocks: lane groups first, then tail. */
export class KeystreamCtx implements StreamClosure {
  readonly blockSize: number;
  readonly blocks: InOutBuf;
  private readonly body: KeystreamBody;
  constructor(blocks: InOutBuf, body: KeystreamBody) {
    this.blocks = blocks;
    this.blockSize = blocks.unit;
    this.body = body;
  }
  call(backend: StreamBackend): void {
    const { blockSize, parBlocks } = backend;
    if (blockSize !== this.blockSize)
      throw new Error(`backend block size ${blockSize} != closure ${this.blockSize}`);
    const { blocks, body } = this;
    if (parBlocks > 1) {
      const ks = new Uint8Array(blockSize * parBlocks);
      const { chunks, tail } = blocks.intoChunks(parBlocks);
      for (const chunk of chunks) {
        backend.genParKsBlocks(ks);
        body(chunk, ks);
      }
      if (tail.length > 0) {
        const tks = ks.subarray(0, tail.byteLength);
        backend.genTailBlocks(tks);
        body(tail, tks);
      }
      clean(ks);
    } else {
      const ks = new Uint8Array(blockSize);
      for (let i = 0; i < blocks.length; i++) {
        backend.genKsBlock(ks);
        body(blocks.slice(i, i + 1), ks);
      }
      clean(ks);
    }
  }
}

/**
 * Keystream generator with a block counter.
 * Implementers provide `remainingBlocks` and `processWithBackend`.
 */
export abstract class StreamCipherCore {
  readonly blockSize: number;
  private spent = false;
  constructor(blockSize: number) {
    checkSizes(blockSize, 1);
    this.blockSize = blockSize;
  }
  /**
   * Blocks left before counter wraps around.
   * `undefined` when there is no bound, or it doesn't fit into a safe integer.
   */
  abstract remainingBlocks(): number | undefined;
  /** Calls `f` with backend of the cipher. */
  abstract processWithBackend(f: StreamClosure): void;

  /** True after partial application, until the core is re-armed. */
  get consumed(): boolean {
    return this.spent;
  }
  /** Clears consumed flag set by partial application. */
  protected rearm(): void {
    this.spent = false;
  }

  /**
   * Generates keystream for `blocks` chunk by chunk and passes each chunk with
   * its keystream to `body`.
   * WARNING: doesn't check remaining blocks!
   */
  processWithKeystreamBlocks(blocks: InOutBuf, body: KeystreamBody): void {
    if (this.consumed)
      throw new Error('stream core was consumed by partial keystream application, seek first');
    if (blocks.unit !== this.blockSize)
      throw new Error(`expected blocks of length ${this.blockSize}, got unit=${blocks.unit}`);
    this.processWithBackend(new KeystreamCtx(blocks, body));
  }
  /**
   * Writes `buf.length / blockSize` keystream blocks into `buf`.
   * WARNING: doesn't check remaining blocks!
   */
  writeKeystreamBlocks(buf: Uint8Array): void {
    const blocks = InOutBuf.fromMut(buf, this.blockSize);
    this.processWithKeystreamBlocks(blocks, (chunk, ks) => chunk.getOut().set(ks));
  }
  /**
   * `output = input ^ keystream`, block after block, byte after byte.
   * `postFn` is called once per produced chunk with already combined output.
   * WARNING: doesn't check remaining blocks!
   */
  applyKeystreamBlocks(blocks: InOutBuf, postFn?: (output: Uint8Array) => void): void {
    this.processWithKeystreamBlocks(blocks, (chunk, ks) => {
      chunk.xorIn2Out(ks);
      if (postFn) postFn(chunk.getOut());
    });
  }
  /** Buffer-to-buffer `applyKeystreamBlocks`; throws `LengthMismatchError` if lengths differ. */
  applyKeystreamBlocksB2B(
    input: Uint8Array,
    output: Uint8Array,
    postFn?: (output: Uint8Array) => void
  ): void {
    this.applyKeystreamBlocks(InOutBuf.from(input, output, this.blockSize), postFn);
  }
  /**
   * Applies keystream to data of any length.
   * Returns `InsufficientCapacityError` (and changes nothing) when remaining blocks are not enough.
   * The core is consumed on success: the last keystream block may be used only partially.
   */
  tryApplyKeystreamPartial(buf: InOutBuf | Uint8Array): InsufficientCapacityError | undefined {
    const data = buf instanceof InOutBuf ? buf : InOutBuf.fromMut(buf);
    if (data.unit !== 1) throw new Error('byte view expected, got unit=' + data.unit);
    if (this.consumed)
      throw new Error('stream core was consumed by partial keystream application, seek first');
    const { blockSize } = this;
    const rem = this.remainingBlocks();
    const needed = ceilDiv(data.byteLength, blockSize);
    if (rem !== undefined && needed > rem) return new InsufficientCapacityError(needed, rem);
    const { blocks, tail } = data.intoBlocks(blockSize);
    if (blocks.length > 0) this.applyKeystreamBlocks(blocks);
    const n = tail.byteLength;
    if (n > 0) {
      const block = new Uint8Array(blockSize);
      block.set(tail.getIn());
      this.applyKeystreamBlocks(InOutBuf.fromMut(block, blockSize));
      tail.getOut().set(block.subarray(0, n));
      clean(block);
    }
    this.spent = true;
    return undefined;
  }
  /** Same as `tryApplyKeystreamPartial`, but throws when remaining blocks are not enough. */
  applyKeystreamPartial(buf: InOutBuf | Uint8Array): void {
    const err = this.tryApplyKeystreamPartial(buf);
    if (err) throw err;
  }
}

export type Counter = number | bigint;

/** Counter of fixed width: bounds and conversions from/to safe integers. */
export interface CounterType<C extends Counter> {
  readonly bits: number;
  readonly max: C;
  /** `undefined` if `n` exceeds `max`. */
  fromNumber(n: number): C | undefined;
  /** `undefined` if `c` is not a safe integer. */
  toNumber(c: C): number | undefined;
  /** `max - c`, `undefined` if it is not a safe integer. */
  remaining(c: C): number | undefined;
  /** Asserts `c` is an integer in `[0, max]`. */
  check(c: C): void;
}

/** 32-bit counter, stored as number. */
export const counter32: CounterType<number> = /* @__PURE__ */ Object.freeze({
  bits: 32,
  max: 2 ** 32 - 1,
  fromNumber(n: number): number | undefined {
    anumber(n);
    return n <= 2 ** 32 - 1 ? n : undefined;
  },
  toNumber: (c: number): number => c,
  remaining: (c: number): number => 2 ** 32 - 1 - c,
  check(c: number): void {
    if (!Number.isSafeInteger(c) || c < 0 || c > 2 ** 32 - 1)
      throw new Error('32-bit counter expected, got ' + c);
  },
});

function bigCounter(bits: number): CounterType<bigint> {
  const max = (BigInt(1) << BigInt(bits)) - BigInt(1);
  const safe = BigInt(Number.MAX_SAFE_INTEGER);
  const toNumber = (c: bigint): number | undefined => (c <= safe ? Number(c) : undefined);
  return Object.freeze({
    bits,
    max,
    fromNumber(n: number): bigint {
      anumber(n);
      return BigInt(n); // safe integers always fit into 64 bits
    },
    toNumber,
    remaining: (c: bigint) => toNumber(max - c),
    check(c: bigint): void {
      if (typeof c !== 'bigint' || c < BigInt(0) || c > max)
        throw new Error(`${bits}-bit counter expected, got ${c}`);
    },
  });
}

/** 64-bit counter, stored as bigint. */
export const counter64: CounterType<bigint> = /* @__PURE__ */ bigCounter(64);
/** 128-bit counter, stored as bigint. */
export const counter128: CounterType<bigint> = /* @__PURE__ */ bigCounter(128);

/**
 * Stream core with seekable block position.
 * Seeking is unconditional: never encrypt different data under the same (key, position).
 */
export abstract class StreamCipherSeekCore<C extends Counter = number> extends StreamCipherCore {
  readonly counter: CounterType<C>;
  constructor(blockSize: number, counter: CounterType<C>) {
    super(blockSize);
    this.counter = counter;
  }
  /** Index of the next keystream block. */
  abstract getBlockPos(): C;
  abstract setBlockPos(pos: C): void;
  /** Sets block position, making a consumed core usable again. */
  seekBlock(pos: C): void {
    this.counter.check(pos);
    this.setBlockPos(pos);
    this.rearm();
  }
  remainingBlocks(): number | undefined {
    return this.counter.remaining(this.getBlockPos());
  }
}
