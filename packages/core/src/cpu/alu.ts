import { hex32, signExtend16, zeroExtend16 } from '../utils/bit.js';
import type { DecodedInstruction } from './decode.js';
import { ExecutionFault } from './exceptions.js';
import type { ProcessorState } from './state.js';

const INT32_MAX = 0x7fffffff;
const INT32_MIN = -0x80000000;

export type BitwiseOp = 'and' | 'or' | 'xor' | 'nor';

const BITWISE: Record<BitwiseOp, (a: number, b: number) => number> = {
  and: (a, b) => a & b,
  or: (a, b) => a | b,
  xor: (a, b) => a ^ b,
  nor: (a, b) => ~(a | b),
};

// Operands are signed 32-bit, so the exact sum/difference fits a double without rounding
function checked(exact: number, mnemonic: string, ip: number): number {
  if (exact > INT32_MAX || exact < INT32_MIN) {
    throw new ExecutionFault('integer-overflow', ip, `${mnemonic} overflow at ${hex32(ip)}`);
  }
  return exact;
}

// SLL rd, rt, sa / SLLV rd, rt, rs
export function shiftLeft(state: ProcessorState, d: DecodedInstruction, variable: boolean): void {
  const sa = variable ? (state.read(d.rs) & 0x1f) : d.shamt;
  state.write(d.rd, state.read(d.rt) << sa);
}

// SRL/SRA rd, rt, sa and SRLV/SRAV rd, rt, rs all take the signed shift
export function shiftRight(state: ProcessorState, d: DecodedInstruction, variable: boolean): void {
  const sa = variable ? (state.read(d.rs) & 0x1f) : d.shamt;
  state.write(d.rd, state.read(d.rt) >> sa);
}

// ADD/SUB rd, rs, rt: nothing is written when the result leaves the int32 range
export function addSubTrapping(state: ProcessorState, d: DecodedInstruction, subtract: boolean, ip: number): void {
  const a = state.read(d.rs);
  const b = state.read(d.rt);
  const r = checked(subtract ? a - b : a + b, subtract ? 'SUB' : 'ADD', ip);
  state.write(d.rd, r);
}

// ADDU/SUBU rd, rs, rt
export function addSubWrapping(state: ProcessorState, d: DecodedInstruction, subtract: boolean): void {
  const a = state.read(d.rs);
  const b = state.read(d.rt);
  state.write(d.rd, subtract ? a - b : a + b);
}

export function bitwise(state: ProcessorState, d: DecodedInstruction, op: BitwiseOp): void {
  state.write(d.rd, BITWISE[op](state.read(d.rs), state.read(d.rt)));
}

// SLT and SLTU share the signed compare
export function setLessThan(state: ProcessorState, d: DecodedInstruction): void {
  state.write(d.rd, state.read(d.rs) < state.read(d.rt) ? 1 : 0);
}

// ADDI rt, rs, imm
export function addImmediateTrapping(state: ProcessorState, d: DecodedInstruction, ip: number): void {
  const r = checked(state.read(d.rs) + signExtend16(d.immediate), 'ADDI', ip);
  state.write(d.rt, r);
}

// ADDIU rt, rs, imm: the immediate is zero-extended
export function addImmediateWrapping(state: ProcessorState, d: DecodedInstruction): void {
  state.write(d.rt, state.read(d.rs) + zeroExtend16(d.immediate));
}

export function setLessThanImmediate(state: ProcessorState, d: DecodedInstruction, unsigned: boolean): void {
  const lt = unsigned
    ? (state.read(d.rs) >>> 0) < zeroExtend16(d.immediate)
    : state.read(d.rs) < signExtend16(d.immediate);
  state.write(d.rt, lt ? 1 : 0);
}

// ANDI/ORI/XORI rt, rs, imm
export function bitwiseImmediate(state: ProcessorState, d: DecodedInstruction, op: Exclude<BitwiseOp, 'nor'>): void {
  const lhs = state.options.legacyImmediateLogical ? d.rs : state.read(d.rs);
  state.write(d.rt, BITWISE[op](lhs, zeroExtend16(d.immediate)));
}
