/**
 * Block cipher surfaces built on a two-phase closure/backend protocol.
 *
 * - A **closure** describes *what* to process: one block, or a run of blocks.
 * - A **backend** describes *how* to process one block and, optionally,
 *   a group of `parBlocks` blocks at once.
 *
 * A primitive only implements `encryptWithBackend` / `decryptWithBackend`:
 * it receives a closure and calls it with its backend.
 * The closure splits its memory into lane groups plus tail and drives the backend.
 * So one single-block implementation serves single block, block-to-block,
 * slice and slice-to-slice calls, batched or not.
 *
 * Two access modes:
 * - {@link BlockCipher}: shared access, state is immutable after key setup.
 * - {@link BlockCipherMut}: exclusive access, e.g. a mode with chaining state
 *   or an engine holding an external handle.
 *
 * Every `BlockCipher` is a `BlockCipherMut` too; the reverse doesn't hold.
 *
 * @example
 * const cipher = createBlockCipher({ blockSize: 16, encrypt, decrypt });
 * cipher.encryptBlocks(data); // in-place, data.length % 16 === 0
 * cipher.decryptBlocksB2B(data, out); // throws LengthMismatchError if lengths differ
 * @module
 */
import { InOut, InOutBuf } from './inout.ts';
import { abytes, anumber, checkOpts } from './utils.ts';

function checkSizes(blockSize: number, parBlocks: number): void {
  anumber(blockSize);
  anumber(parBlocks);
  if (blockSize < 1) throw new Error('blockSize must be at least 1, got ' + blockSize);
  if (parBlocks < 1) throw new Error('parBlocks must be at least 1, got ' + parBlocks);
}

/**
 * Processes blocks. Subclasses implement `procBlock`; backends with a faster
 * wide path override `procParBlocks`, which must stay observably identical to
 * calling `procBlock` for every lane in order.
 */
export abstract class BlockBackend {
  readonly blockSize: number;
  /** Lane width: blocks processed together by `procParBlocks`. */
  readonly parBlocks: number;
  constructor(blockSize: number, parBlocks: number = 1) {
    checkSizes(blockSize, parBlocks);
    this.blockSize = blockSize;
    this.parBlocks = parBlocks;
  }
  /** Reads `block.input` completely, then writes `block.output`. They may be the same memory. */
  abstract procBlock(block: InOut): void;
  /** Processes exactly `parBlocks` blocks. */
  procParBlocks(blocks: InOutBuf): void {
    if (blocks.length !== this.parBlocks)
      throw new Error(`lane group of ${blocks.length} blocks, expected ${this.parBlocks}`);
    for (let i = 0; i < this.parBlocks; i++) this.procBlock(blocks.get(i));
  }
  /** Processes less than `parBlocks` blocks left after lane groups. */
  procTailBlocks(blocks: InOutBuf): void {
    if (blocks.length >= this.parBlocks)
      throw new Error(`tail of ${blocks.length} blocks, lane width is ${this.parBlocks}`);
    for (const block of blocks) this.procBlock(block);
  }
}

/** What to process. Receives backend of the primitive and drives it. */
export interface BlockClosure {
  readonly blockSize: number;
  call(backend: BlockBackend): void;
}

function checkBackend(f: BlockClosure, backend: BlockBackend): void {
  if (f.blockSize !== backend.blockSize)
    throw new Error(`backend block size ${backend.blockSize} != closure ${f.blockSize}`);
}

/** Closure over a single block. */
export class BlockCtx implements BlockClosure {
  readonly blockSize: number;
  readonly block: InOut;
  constructor(block: InOut) {
    this.block = block;
    this.blockSize = block.length;
  }
  call(backend: BlockBackend): void {
    checkBackend(this, backend);
    backend.procBlock(this.block);
  }
}

/** Closure over a run of blocks: lane groups first, then tail. */
export class BlocksCtx implements BlockClosure {
  readonly blockSize: number;
  readonly blocks: InOutBuf;
  constructor(blocks: InOutBuf) {
    this.blocks = blocks;
    this.blockSize = blocks.unit;
  }
  call(backend: BlockBackend): void {
    checkBackend(this, backend);
    // Lane width 1 has no wide path: everything goes through procBlock
    if (backend.parBlocks > 1) {
      const { chunks, tail } = this.blocks.intoChunks(backend.parBlocks);
      for (const chunk of chunks) backend.procParBlocks(chunk);
      backend.procTailBlocks(tail);
    } else {
      for (const block of this.blocks) backend.procBlock(block);
    }
  }
}

// Argument helpers shared by both access modes
function oneBlock(blockSize: number, block: Uint8Array): BlockCtx {
  return new BlockCtx(InOut.inPlace(abytes(block, blockSize, 'block')));
}
function blockPair(blockSize: number, input: Uint8Array, output: Uint8Array): BlockCtx {
  abytes(input, blockSize, 'input block');
  abytes(output, blockSize, 'output block');
  return new BlockCtx(InOut.from(input, output));
}
function blockInOut(blockSize: number, block: InOut): BlockCtx {
  if (block.length !== blockSize)
    throw new Error(`expected block of length ${blockSize}, got length=${block.length}`);
  return new BlockCtx(block);
}
function manyBlocks(blockSize: number, blocks: Uint8Array): BlocksCtx {
  return new BlocksCtx(InOutBuf.fromMut(blocks, blockSize));
}
function blocksPair(blockSize: number, input: Uint8Array, output: Uint8Array): BlocksCtx {
  return new BlocksCtx(InOutBuf.from(input, output, blockSize));
}
function blocksInOut(blockSize: number, blocks: InOutBuf): BlocksCtx {
  if (blocks.unit !== blockSize)
    throw new Error(`expected blocks of length ${blockSize}, got unit=${blocks.unit}`);
  return new BlocksCtx(blocks);
}

/**
 * Block cipher requiring exclusive access for every call.
 * Implementers provide `encryptWithBackendMut` and `decryptWithBackendMut`.
 */
export abstract class BlockCipherMut {
  readonly blockSize: number;
  constructor(blockSize: number) {
    checkSizes(blockSize, 1);
    this.blockSize = blockSize;
  }
  abstract encryptWithBackendMut(f: BlockClosure): void;
  abstract decryptWithBackendMut(f: BlockClosure): void;

  encryptBlockInOutMut(block: InOut): void {
    this.encryptWithBackendMut(blockInOut(this.blockSize, block));
  }
  encryptBlocksInOutMut(blocks: InOutBuf): void {
    this.encryptWithBackendMut(blocksInOut(this.blockSize, blocks));
  }
  /** Encrypts single block in-place. */
  encryptBlockMut(block: Uint8Array): void {
    this.encryptWithBackendMut(oneBlock(this.blockSize, block));
  }
  encryptBlockB2BMut(input: Uint8Array, output: Uint8Array): void {
    this.encryptWithBackendMut(blockPair(this.blockSize, input, output));
  }
  /** Encrypts blocks in-place. */
  encryptBlocksMut(blocks: Uint8Array): void {
    this.encryptWithBackendMut(manyBlocks(this.blockSize, blocks));
  }
  /** Throws `LengthMismatchError` if lengths differ, leaving `output` untouched. */
  encryptBlocksB2BMut(input: Uint8Array, output: Uint8Array): void {
    this.encryptWithBackendMut(blocksPair(this.blockSize, input, output));
  }

  decryptBlockInOutMut(block: InOut): void {
    this.decryptWithBackendMut(blockInOut(this.blockSize, block));
  }
  decryptBlocksInOutMut(blocks: InOutBuf): void {
    this.decryptWithBackendMut(blocksInOut(this.blockSize, blocks));
  }
  decryptBlockMut(block: Uint8Array): void {
    this.decryptWithBackendMut(oneBlock(this.blockSize, block));
  }
  decryptBlockB2BMut(input: Uint8Array, output: Uint8Array): void {
    this.decryptWithBackendMut(blockPair(this.blockSize, input, output));
  }
  decryptBlocksMut(blocks: Uint8Array): void {
    this.decryptWithBackendMut(manyBlocks(this.blockSize, blocks));
  }
  decryptBlocksB2BMut(input: Uint8Array, output: Uint8Array): void {
    this.decryptWithBackendMut(blocksPair(this.blockSize, input, output));
  }
}

/**
 * Block cipher with immutable state: safe to share between callers.
 * Implementers provide `encryptWithBackend` and `decryptWithBackend`;
 * exclusive-access methods are derived from them.
 */
export abstract class BlockCipher extends BlockCipherMut {
  abstract encryptWithBackend(f: BlockClosure): void;
  abstract decryptWithBackend(f: BlockClosure): void;

  encryptWithBackendMut(f: BlockClosure): void {
    this.encryptWithBackend(f);
  }
  decryptWithBackendMut(f: BlockClosure): void {
    this.decryptWithBackend(f);
  }

  encryptBlockInOut(block: InOut): void {
    this.encryptWithBackend(blockInOut(this.blockSize, block));
  }
  encryptBlocksInOut(blocks: InOutBuf): void {
    this.encryptWithBackend(blocksInOut(this.blockSize, blocks));
  }
  encryptBlock(block: Uint8Array): void {
    this.encryptWithBackend(oneBlock(this.blockSize, block));
  }
  encryptBlockB2B(input: Uint8Array, output: Uint8Array): void {
    this.encryptWithBackend(blockPair(this.blockSize, input, output));
  }
  encryptBlocks(blocks: Uint8Array): void {
    this.encryptWithBackend(manyBlocks(this.blockSize, blocks));
  }
  encryptBlocksB2B(input: Uint8Array, output: Uint8Array): void {
    this.encryptWithBackend(blocksPair(this.blockSize, input, output));
  }

  decryptBlockInOut(block: InOut): void {
    this.decryptWithBackend(blockInOut(this.blockSize, block));
  }
  decryptBlocksInOut(blocks: InOutBuf): void {
    this.decryptWithBackend(blocksInOut(this.blockSize, blocks));
  }
  decryptBlock(block: Uint8Array): void {
    this.decryptWithBackend(oneBlock(this.blockSize, block));
  }
  decryptBlockB2B(input: Uint8Array, output: Uint8Array): void {
    this.decryptWithBackend(blockPair(this.blockSize, input, output));
  }
  decryptBlocks(blocks: Uint8Array): void {
    this.decryptWithBackend(manyBlocks(this.blockSize, blocks));
  }
  decryptBlocksB2B(input: Uint8Array, output: Uint8Array): void {
    this.decryptWithBackend(blocksPair(this.blockSize, input, output));
  }
}

/**
 * Transforms `input` into `output`. Both have the same length and may be the same memory:
 * read everything needed from `input` before writing `output`.
 */
export type BlockFn = (input: Uint8Array, output: Uint8Array) => void;

/** Options of {@link createBlockCipher}.
 * * `encrypt` / `decrypt` process one block
 * * `parBlocks` lane width, 1 by default
 * * `encryptPar` / `decryptPar` process `parBlocks` blocks at once; per-block loop if missing
 */
export type BlockCipherOpts = {
  blockSize: number;
  encrypt: BlockFn;
  decrypt: BlockFn;
  parBlocks?: number;
  encryptPar?: BlockFn;
  decryptPar?: BlockFn;
};

class FnBackend extends BlockBackend {
  private readonly fn: BlockFn;
  private readonly parFn?: BlockFn;
  constructor(blockSize: number, parBlocks: number, fn: BlockFn, parFn?: BlockFn) {
    super(blockSize, parBlocks);
    this.fn = fn;
    this.parFn = parFn;
  }
  procBlock(block: InOut): void {
    this.fn(block.input, block.output);
  }
  procParBlocks(blocks: InOutBuf): void {
    if (this.parFn === undefined) return super.procParBlocks(blocks);
    if (blocks.length !== this.parBlocks)
      throw new Error(`lane group of ${blocks.length} blocks, expected ${this.parBlocks}`);
    this.parFn(blocks.getIn(), blocks.getOut());
  }
}

class SimpleBlockCipher extends BlockCipher {
  private readonly enc: FnBackend;
  private readonly dec: FnBackend;
  constructor(opts: Required<Pick<BlockCipherOpts, 'parBlocks'>> & BlockCipherOpts) {
    super(opts.blockSize);
    const { blockSize, parBlocks } = opts;
    this.enc = new FnBackend(blockSize, parBlocks, opts.encrypt, opts.encryptPar);
    this.dec = new FnBackend(blockSize, parBlocks, opts.decrypt, opts.decryptPar);
  }
  encryptWithBackend(f: BlockClosure): void {
    f.call(this.enc);
  }
  decryptWithBackend(f: BlockClosure): void {
    f.call(this.dec);
  }
}

/** Creates shared-access block cipher from block functions. */
export function createBlockCipher(opts: BlockCipherOpts): BlockCipher {
  const merged = checkOpts({ parBlocks: 1 }, opts);
  const { blockSize, parBlocks, encrypt, decrypt, encryptPar, decryptPar } = merged;
  checkSizes(blockSize, parBlocks);
  if (typeof encrypt !== 'function' || typeof decrypt !== 'function')
    throw new Error('encrypt and decrypt must be functions');
  for (const fn of [encryptPar, decryptPar])
    if (fn !== undefined && typeof fn !== 'function') throw new Error('par function expected');
  return new SimpleBlockCipher(merged);
}
