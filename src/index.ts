/**
 * Buffer, chunking and keystream plumbing for block and stream ciphers.
 * Concrete ciphers plug in by implementing a backend; callers get
 * in-place, buffer-to-buffer, batched and byte-level streaming surfaces.
 * @example
```js
import { createBlockCipher, InOutBuf, StreamCipherCoreWrapper } from 'inout-ciphers';

const cipher = createBlockCipher({ blockSize: 16, encrypt, decrypt });
cipher.encryptBlocks(data);

const stream = new StreamCipherCoreWrapper(core); // core: StreamCipherSeekCore
stream.applyKeystream(part1);
stream.applyKeystream(part2);
stream.seek(0);
```
 * @module
 */
export {
  BlockBackend,
  BlockCipher,
  BlockCipherMut,
  BlockCtx,
  BlocksCtx,
  createBlockCipher,
  type BlockCipherOpts,
  type BlockClosure,
  type BlockFn,
} from './block.ts';
export { CipherError, InsufficientCapacityError, LengthMismatchError, OverflowError } from './errors.ts';
export { InOut, InOutBuf, chunkPartition, type ChunkPartition } from './inout.ts';
export {
  KeystreamCtx,
  StreamBackend,
  StreamCipherCore,
  StreamCipherSeekCore,
  counter128,
  counter32,
  counter64,
  type Counter,
  type CounterType,
  type KeystreamBody,
  type StreamClosure,
} from './stream.ts';
export { StreamCipherCoreWrapper } from './wrapper.ts';
