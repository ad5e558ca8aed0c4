import { BlockBackend, BlockCipher, type BlockClosure, createBlockCipher } from '../src/block.ts';
import type { InOut, InOutBuf } from '../src/inout.ts';
import {
  type StreamClosure,
  StreamBackend,
  StreamCipherCore,
  StreamCipherSeekCore,
  counter32,
  counter64,
} from '../src/stream.ts';

// Returns copy of bytes with byteOffset % 16 === byteOffset
export function unalign(arr: Uint8Array, len: number): Uint8Array {
  const n = new Uint8Array(arr.length + len);
  n.set(arr, len);
  return n.subarray(len);
}

export const range = (len: number, start = 0): Uint8Array =>
  Uint8Array.from({ length: len }, (_, i) => (start + i) & 0xff);

/**
 * Toy block cipher: rotate bytes left by one, then add key byte.
 *   enc(x)[j] = x[(j + 1) % bs] + key[j]
 */
function toyEncrypt(key: Uint8Array, input: Uint8Array, output: Uint8Array) {
  const bs = key.length;
  const t = Uint8Array.from(input);
  for (let j = 0; j < bs; j++) output[j] = (t[(j + 1) % bs] + key[j]) & 0xff;
}
function toyDecrypt(key: Uint8Array, input: Uint8Array, output: Uint8Array) {
  const bs = key.length;
  const t = Uint8Array.from(input);
  for (let j = 0; j < bs; j++) output[(j + 1) % bs] = (t[j] - key[j]) & 0xff;
}
// Same as toy functions, but over whole lane group in one loop
function toyEncryptPar(key: Uint8Array, input: Uint8Array, output: Uint8Array) {
  const bs = key.length;
  const t = Uint8Array.from(input);
  for (let i = 0; i < t.length; i++) {
    const base = i - (i % bs);
    output[i] = (t[base + (((i % bs) + 1) % bs)] + key[i % bs]) & 0xff;
  }
}
function toyDecryptPar(key: Uint8Array, input: Uint8Array, output: Uint8Array) {
  const bs = key.length;
  const t = Uint8Array.from(input);
  for (let i = 0; i < t.length; i++) {
    const base = i - (i % bs);
    output[base + (((i % bs) + 1) % bs)] = (t[i] - key[i % bs]) & 0xff;
  }
}

/** Toy block cipher, block size is key length. */
export function toyBlockCipher(key: Uint8Array, parBlocks = 1, wide = true): BlockCipher {
  const blockSize = key.length;
  return createBlockCipher({
    blockSize,
    parBlocks,
    encrypt: (i, o) => toyEncrypt(key, i, o),
    decrypt: (i, o) => toyDecrypt(key, i, o),
    encryptPar: wide && parBlocks > 1 ? (i, o) => toyEncryptPar(key, i, o) : undefined,
    decryptPar: wide && parBlocks > 1 ? (i, o) => toyDecryptPar(key, i, o) : undefined,
  });
}

export type BackendCall = { kind: 'block' | 'par' | 'tail'; blocks: number };

/** Backend which records how closures drive it. */
export class SpyBackend extends BlockBackend {
  readonly calls: BackendCall[] = [];
  private readonly key: Uint8Array;
  constructor(key: Uint8Array, parBlocks: number) {
    super(key.length, parBlocks);
    this.key = key;
  }
  procBlock(block: InOut): void {
    this.calls.push({ kind: 'block', blocks: 1 });
    toyEncrypt(this.key, block.input, block.output);
  }
  procParBlocks(blocks: InOutBuf): void {
    this.calls.push({ kind: 'par', blocks: blocks.length });
    toyEncryptPar(this.key, blocks.getIn(), blocks.getOut());
  }
  procTailBlocks(blocks: InOutBuf): void {
    this.calls.push({ kind: 'tail', blocks: blocks.length });
    super.procTailBlocks(blocks);
  }
}

export class SpyCipher extends BlockCipher {
  readonly backend: SpyBackend;
  constructor(key: Uint8Array, parBlocks: number) {
    super(key.length);
    this.backend = new SpyBackend(key, parBlocks);
  }
  encryptWithBackend(f: BlockClosure): void {
    f.call(this.backend);
  }
  decryptWithBackend(f: BlockClosure): void {
    f.call(this.backend);
  }
}

/**
 * Toy keystream: byte at absolute keystream position p is (key + p) & 0xff.
 * Block c is (key + c * blockSize + j) & 0xff for j in [0, blockSize).
 */
class CounterBackend extends StreamBackend {
  private readonly core: CounterCore;
  constructor(core: CounterCore) {
    super(core.blockSize, core.parBlocks);
    this.core = core;
  }
  genKsBlock(block: Uint8Array): void {
    const { key, blockSize } = this.core;
    const c = this.core.getBlockPos();
    for (let j = 0; j < blockSize; j++) block[j] = (key + c * blockSize + j) & 0xff;
    this.core.setBlockPos((c + 1) % 2 ** 32);
    this.core.generated++;
  }
  genParKsBlocks(blocks: Uint8Array): void {
    const { key, blockSize } = this.core;
    const c = this.core.getBlockPos();
    for (let k = 0; k < blocks.length; k++) blocks[k] = (key + c * blockSize + k) & 0xff;
    this.core.setBlockPos((c + this.parBlocks) % 2 ** 32);
    this.core.generated += this.parBlocks;
    this.core.parCalls++;
  }
}

export class CounterCore extends StreamCipherSeekCore<number> {
  readonly key: number;
  readonly parBlocks: number;
  private pos = 0;
  generated = 0;
  parCalls = 0;
  constructor(key: number, blockSize = 16, parBlocks = 1) {
    super(blockSize, counter32);
    this.key = key;
    this.parBlocks = parBlocks;
  }
  getBlockPos(): number {
    return this.pos;
  }
  setBlockPos(pos: number): void {
    this.pos = pos;
  }
  processWithBackend(f: StreamClosure): void {
    f.call(new CounterBackend(this));
  }
}

/** Expected toy keystream for positions [start, start + len). */
export const counterKeystream = (key: number, start: number, len: number): Uint8Array =>
  range(len, key + start);

/** Same toy keystream with 64-bit counter. */
export class BigCounterCore extends StreamCipherSeekCore<bigint> {
  private pos = BigInt(0);
  constructor() {
    super(8, counter64);
  }
  getBlockPos(): bigint {
    return this.pos;
  }
  setBlockPos(pos: bigint): void {
    this.pos = pos;
  }
  processWithBackend(f: StreamClosure): void {
    const core = this;
    f.call(
      new (class extends StreamBackend {
        genKsBlock(block: Uint8Array): void {
          const c = Number(core.pos & BigInt(0xff));
          for (let j = 0; j < block.length; j++) block[j] = (c * 8 + j) & 0xff;
          core.pos++;
        }
      })(this.blockSize)
    );
  }
}

/** Keystream without counter bound, like sponge-based constructions. */
export class UnboundedCore extends StreamCipherCore {
  private state = 0;
  constructor() {
    super(4);
  }
  remainingBlocks(): number | undefined {
    return undefined;
  }
  processWithBackend(f: StreamClosure): void {
    const core = this;
    f.call(
      new (class extends StreamBackend {
        genKsBlock(block: Uint8Array): void {
          for (let j = 0; j < block.length; j++) block[j] = (core.state * 4 + j) & 0xff;
          core.state++;
        }
      })(this.blockSize)
    );
  }
}
