import fc from 'fast-check';
import { describe, should } from 'micro-should';
import { deepStrictEqual as eql, throws } from 'node:assert';
import * as u from '../src/utils.ts';
import {
  ceilDiv,
  checkOpts,
  complexOverlapBytes,
  concatBytes,
  hexToBytes,
  overlapBytes,
} from '../src/utils.ts';
import { unalign } from './utils.ts';

describe('utils', () => {
  const staticHexVectors = [
    { bytes: Uint8Array.from([]), hex: '' },
    { bytes: Uint8Array.from([0xbe]), hex: 'be' },
    { bytes: Uint8Array.from([0xca, 0xfe]), hex: 'cafe' },
    { bytes: new Uint8Array(512).fill(0x69), hex: '69'.repeat(512) },
  ];
  should('hexToBytes', () => {
    for (const v of staticHexVectors) eql(hexToBytes(v.hex), v.bytes);
    for (const v of staticHexVectors) eql(hexToBytes(v.hex.toUpperCase()), v.bytes);
    for (const v of ['0', 'zz', '0g', ' 00']) throws(() => hexToBytes(v));
  });
  should('hexToBytes random', () =>
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 64 }), (bytes) => {
        const hex = Buffer.from(bytes).toString('hex');
        eql(hexToBytes(hex), bytes);
        eql(hexToBytes(hex.toUpperCase()), bytes);
      })
    )
  );
  should('concatBytes', () => {
    const aa = Uint8Array.from([1]);
    const bb = Uint8Array.from([2]);
    const cc = Uint8Array.from([0xff]);
    eql(concatBytes(), new Uint8Array());
    eql(concatBytes(aa, bb), Uint8Array.from([1, 2]));
    eql(concatBytes(aa, bb, cc), Uint8Array.from([1, 2, 0xff]));
  });
  should('concatBytes random', () =>
    fc.assert(
      fc.property(fc.uint8Array(), fc.uint8Array(), fc.uint8Array(), (a, b, c) => {
        const expected = Uint8Array.from([...a, ...b, ...c]);
        eql(concatBytes(a.slice(), b.slice(), c.slice()), expected);
      })
    )
  );
  should('ceilDiv', () => {
    eql(ceilDiv(0, 16), 0);
    eql(ceilDiv(1, 16), 1);
    eql(ceilDiv(16, 16), 1);
    eql(ceilDiv(17, 16), 2);
    eql(ceilDiv(33, 16), 3);
  });
  should('checkOpts', () => {
    eql(checkOpts({ parBlocks: 1 }, { blockSize: 16 }), { parBlocks: 1, blockSize: 16 });
    eql(checkOpts({ parBlocks: 1 }, { parBlocks: 4 }), { parBlocks: 4 });
  });
  should('overlapBytes', () => {
    const buffer = new ArrayBuffer(20);
    const a = new Uint8Array(buffer, 0, 10); // Bytes 0-9
    const b = new Uint8Array(buffer, 5, 10); // Bytes 5-14
    const c = new Uint8Array(buffer, 10, 10); // Bytes 10-19
    const d = new Uint8Array(new ArrayBuffer(20), 0, 10); // Different buffer
    eql(overlapBytes(a, b), true);
    eql(overlapBytes(a, c), false);
    eql(overlapBytes(b, c), true);
    eql(overlapBytes(a, d), false);
    eql(overlapBytes(a, a), true);
    // One byte window over whole buffer
    const res: boolean[] = [];
    const main = new Uint8Array(8 + 4);
    const first = main.subarray(2).subarray(0, 8);
    for (let i = 0; i < main.length; i++) res.push(overlapBytes(first, main.subarray(i, i + 1)));
    eql(res, [false, false, true, true, true, true, true, true, true, true, false, false]);
  });
  should('complexOverlapBytes', () => {
    const mem = new Uint8Array(32);
    complexOverlapBytes(mem, mem);
    complexOverlapBytes(mem.subarray(8, 24), mem.subarray(0, 16));
    complexOverlapBytes(mem.subarray(0, 16), mem.subarray(16));
    complexOverlapBytes(mem.subarray(0, 16), new Uint8Array(16));
    throws(() => complexOverlapBytes(mem.subarray(0, 16), mem.subarray(8, 24)));
    throws(() => complexOverlapBytes(mem.subarray(0, 16), mem.subarray(15, 31)));
  });
});

describe('assert', () => {
  should('anumber', () => {
    eql(u.anumber(10), undefined);
    eql(u.anumber(0), undefined);
    throws(() => u.anumber(1.2));
    throws(() => u.anumber(-1));
    throws(() => u.anumber(NaN));
    throws(() => u.anumber(2 ** 53));
  });
  should('abytes', () => {
    const bytes = new Uint8Array(10);
    eql(u.abytes(bytes) === bytes, true);
    eql(u.abytes(new Uint8Array(0)), new Uint8Array(0));
    u.abytes(Buffer.alloc(10));
    u.abytes(new Uint8Array(12), 12, 'key');
    throws(() => u.abytes(new Uint8Array(10), 11, 'key'), {
      message: '"key" expected Uint8Array of length 11, got length=10',
    });
  });
  should('aunits', () => {
    u.aunits(new Uint8Array(32), 16);
    u.aunits(new Uint8Array(0), 16);
    throws(() => u.aunits(new Uint8Array(17), 16, 'blocks'), {
      message: '"blocks" expected multiple of 16 bytes, got length=17',
    });
  });
  should('clean', () => {
    const a = Uint8Array.from([1, 2]);
    const b = Uint32Array.from([3]);
    u.clean(a, b);
    eql(a, new Uint8Array(2));
    eql(b, new Uint32Array(1));
  });
});

describe('utils etc', () => {
  should('unalign', () => {
    const arr = new Uint8Array([1, 2, 3]);
    for (let i = 0; i < 16; i++) {
      const tmp = unalign(arr, i);
      eql(tmp, arr);
      eql(tmp.byteOffset, i);
      // check that it doesn't modify original
      tmp[1] = 9;
      eql(tmp, new Uint8Array([1, 9, 3]));
      eql(arr, new Uint8Array([1, 2, 3]));
    }
  });
});

should.runWhen(import.meta.url);
