import { writeU32BE } from '../utils/bit.js';

export type RFields = { rs?: number; rt?: number; rd?: number; shamt?: number; funct: number };

// SPECIAL-class word (opcode 0)
export function encodeR(f: RFields): number {
  return (
    (0x00 << 26) |
    (((f.rs ?? 0) & 0x1f) << 21) |
    (((f.rt ?? 0) & 0x1f) << 16) |
    (((f.rd ?? 0) & 0x1f) << 11) |
    (((f.shamt ?? 0) & 0x1f) << 6) |
    (f.funct & 0x3f)
  ) >>> 0;
}

export function encodeI(opcode: number, rs: number, rt: number, imm16: number): number {
  return (((opcode & 0x3f) << 26) | ((rs & 0x1f) << 21) | ((rt & 0x1f) << 16) | (imm16 & 0xffff)) >>> 0;
}

export function encodeJ(opcode: number, target26: number): number {
  return (((opcode & 0x3f) << 26) | (target26 & 0x03ffffff)) >>> 0;
}

export function programFromWords(words: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(words.length * 4);
  words.forEach((w, i) => writeU32BE(bytes, i * 4, w >>> 0));
  return bytes;
}
