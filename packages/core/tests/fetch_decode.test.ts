import { describe, it, expect } from 'vitest';
import { fetch } from '../src/cpu/fetch.js';
import { decode } from '../src/cpu/decode.js';
import { encodeI, encodeJ, encodeR, programFromWords } from '../src/cpu/encode.js';
import { ExecutionFault } from '../src/cpu/exceptions.js';
import { initialize } from '../src/cpu/state.js';
import * as bit from '../src/utils/bit.js';

describe('fetch', () => {
  it('reads big-endian words and advances ip by 4', () => {
    const s = initialize(new Uint8Array([0x12, 0x34, 0x56, 0x78, 0x9a, 0xbc, 0xde, 0xf0]));
    expect(fetch(s)).toBe(0x12345678);
    expect(s.ip).toBe(4);
    expect(fetch(s)).toBe(0x9abcdef0);
    expect(s.ip).toBe(8);
  });

  it('faults with invalid-program past the end and keeps ip', () => {
    const s = initialize(new Uint8Array([0, 0, 0, 0, 0, 0]));
    fetch(s);
    let err: unknown;
    try { fetch(s); } catch (e) { err = e; }
    expect(err).toBeInstanceOf(ExecutionFault);
    expect(err instanceof ExecutionFault && err.reason).toBe('invalid-program');
    expect(err instanceof ExecutionFault && err.message).toBe('Instruction pointer 0x00000004 is outside the program (6 bytes).');
    expect(s.ip).toBe(4);
  });

  it('faults when no program is attached', () => {
    const s = initialize(null);
    expect(() => fetch(s)).toThrowError('Invalid program provided.');
  });
});

describe('decode', () => {
  it('extracts R-type fields', () => {
    const w = encodeR({ rs: 17, rt: 18, rd: 19, shamt: 7, funct: 0x2a });
    const d = decode(w);
    expect(d.opcode).toBe(0);
    expect(d.rs).toBe(17);
    expect(d.rt).toBe(18);
    expect(d.rd).toBe(19);
    expect(d.shamt).toBe(7);
    expect(d.funct).toBe(0x2a);
    expect(d.word).toBe(w);
  });

  it('extracts I-type and J-type fields', () => {
    const i = decode(encodeI(0x0d, 3, 4, 0xbeef));
    expect([i.opcode, i.rs, i.rt, i.immediate]).toEqual([0x0d, 3, 4, 0xbeef]);
    const j = decode(encodeJ(0x03, 0x3ffffff));
    expect([j.opcode, j.target]).toEqual([0x03, 0x3ffffff]);
  });

  it('masks every field of an all-ones word', () => {
    const d = decode(0xffffffff);
    expect(d).toEqual({
      word: 0xffffffff, opcode: 63, rs: 31, rt: 31, rd: 31, shamt: 31, funct: 63, immediate: 0xffff, target: 0x3ffffff,
    });
  });

  it('decodes what the encoders build', () => {
    const cases = [
      { rs: 1, rt: 2, rd: 3, shamt: 4, funct: 5 },
      { rs: 31, rt: 0, rd: 29, shamt: 16, funct: 0x3f },
    ];
    for (const c of cases) {
      const d = decode(encodeR(c));
      expect({ rs: d.rs, rt: d.rt, rd: d.rd, shamt: d.shamt, funct: d.funct }).toEqual(c);
    }
    const imm = decode(encodeI(0x08, 30, 9, 0x8001));
    expect([imm.opcode, imm.rs, imm.rt, imm.immediate]).toEqual([0x08, 30, 9, 0x8001]);
  });

  it('lays out programFromWords big-endian', () => {
    expect(Array.from(programFromWords([0x20020003, 0x0000000c]))).toEqual([0x20, 0x02, 0x00, 0x03, 0x00, 0x00, 0x00, 0x0c]);
  });
});

describe('bit helpers', () => {
  it('extends 16-bit immediates', () => {
    expect(bit.signExtend16(0x8000)).toBe(-32768);
    expect(bit.signExtend16(0x7fff)).toBe(32767);
    expect(bit.signExtend16(0x1ffff)).toBe(-1);
    expect(bit.zeroExtend16(0xffff)).toBe(65535);
  });

  it('splits 64-bit signed products into hi/lo', () => {
    expect(bit.mul64Signed(0x10000, 0x20000)).toEqual({ hi: 2, lo: 0 });
    expect(bit.mul64Signed(-1, 1)).toEqual({ hi: -1, lo: -1 });
    expect(bit.mul64Signed(0x7fffffff, 0x7fffffff)).toEqual({ hi: 0x3fffffff, lo: 1 });
  });

  it('formats hex32', () => {
    expect(bit.hex32(0x2a)).toBe('0x0000002a');
    expect(bit.hex32(-1)).toBe('0xffffffff');
  });

  it('formats unpadded hex', () => {
    expect(bit.hex(0x2a)).toBe('0x2a');
    expect(bit.hex(-4)).toBe('0xfffffffc');
  });

  it('falls back to reason and address for an ExecutionFault without a message', () => {
    expect(new ExecutionFault('unrecognized-instruction', 0x10).message).toBe('unrecognized-instruction at 0x10');
  });
});
