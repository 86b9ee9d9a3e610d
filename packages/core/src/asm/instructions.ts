import { encodeI, encodeJ, encodeR } from '../cpu/encode.js';
import { FUNCT, OP, REG_AT, REG_RA, type FunctCode, type Opcode } from '../cpu/opcodes.js';
import {
  INT32_MIN, UINT32_MAX, branchOffset, expectOperands, imm, isImmediate, jumpTarget, loadImmediate, reg,
  type EmitContext, type Expander,
} from './emit.js';

// A register operand at `i`, or an immediate staged through $at first
export function regOrAt(ctx: EmitContext, i: number): { prefix: number[]; register: number } {
  if (!isImmediate(ctx, i)) return { prefix: [], register: reg(ctx, i) };
  return { prefix: loadImmediate(REG_AT, imm(ctx, i, INT32_MIN, UINT32_MAX)), register: REG_AT };
}

// op rd, rs, rt
const threeReg = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 3);
  const rt = regOrAt(ctx, 2);
  return [...rt.prefix, encodeR({ rd: reg(ctx, 0), rs: reg(ctx, 1), rt: rt.register, funct })];
};

// op rd, rt, sa
const shiftImm = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 3);
  return [encodeR({ rd: reg(ctx, 0), rt: reg(ctx, 1), shamt: imm(ctx, 2, 0, 31), funct })];
};

// op rd, rt, rs
const shiftVar = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 3);
  return [encodeR({ rd: reg(ctx, 0), rt: reg(ctx, 1), rs: reg(ctx, 2), funct })];
};

const hiLoPair = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 2);
  return [encodeR({ rs: reg(ctx, 0), rt: reg(ctx, 1), funct })];
};

const moveFrom = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 1);
  return [encodeR({ rd: reg(ctx, 0), funct })];
};

const moveTo = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 1);
  return [encodeR({ rs: reg(ctx, 0), funct })];
};

// op rt, rs, imm16
const immArith = (op: Opcode): Expander => (ctx) => {
  expectOperands(ctx, 3);
  return [encodeI(op, reg(ctx, 1), reg(ctx, 0), imm(ctx, 2))];
};

// op rs, rt, target
const branchCompare = (op: Opcode): Expander => (ctx) => {
  expectOperands(ctx, 3);
  const rt = regOrAt(ctx, 1);
  const at = ctx.address + rt.prefix.length * 4;
  return [...rt.prefix, encodeI(op, reg(ctx, 0), rt.register, branchOffset(ctx, 2, at))];
};

// op rs, target
const branchZero = (op: Opcode): Expander => (ctx) => {
  expectOperands(ctx, 2);
  return [encodeI(op, reg(ctx, 0), 0, branchOffset(ctx, 1, ctx.address))];
};

const jump = (op: Opcode): Expander => (ctx) => {
  expectOperands(ctx, 1);
  return [encodeJ(op, jumpTarget(ctx, 0))];
};

export const NATIVE_INSTRUCTIONS: ReadonlyMap<string, Expander> = new Map<string, Expander>([
  ['add', threeReg(FUNCT.ADD)],
  ['addu', threeReg(FUNCT.ADDU)],
  ['sub', threeReg(FUNCT.SUB)],
  ['subu', threeReg(FUNCT.SUBU)],
  ['and', threeReg(FUNCT.AND)],
  ['or', threeReg(FUNCT.OR)],
  ['xor', threeReg(FUNCT.XOR)],
  ['nor', threeReg(FUNCT.NOR)],
  ['slt', threeReg(FUNCT.SLT)],
  ['sltu', threeReg(FUNCT.SLTU)],
  ['sll', shiftImm(FUNCT.SLL)],
  ['srl', shiftImm(FUNCT.SRL)],
  ['sra', shiftImm(FUNCT.SRA)],
  ['sllv', shiftVar(FUNCT.SLLV)],
  ['srlv', shiftVar(FUNCT.SRLV)],
  ['srav', shiftVar(FUNCT.SRAV)],
  ['mult', hiLoPair(FUNCT.MULT)],
  ['multu', hiLoPair(FUNCT.MULTU)],
  ['div', hiLoPair(FUNCT.DIV)],
  ['divu', hiLoPair(FUNCT.DIVU)],
  ['mfhi', moveFrom(FUNCT.MFHI)],
  ['mflo', moveFrom(FUNCT.MFLO)],
  ['mthi', moveTo(FUNCT.MTHI)],
  ['mtlo', moveTo(FUNCT.MTLO)],
  ['jr', moveTo(FUNCT.JR)],
  ['jalr', (ctx) => {
    expectOperands(ctx, 1, 2);
    if (ctx.node.operands.length === 1) return [encodeR({ rd: REG_RA, rs: reg(ctx, 0), funct: FUNCT.JALR })];
    return [encodeR({ rd: reg(ctx, 0), rs: reg(ctx, 1), funct: FUNCT.JALR })];
  }],
  ['syscall', (ctx) => {
    expectOperands(ctx, 0);
    return [encodeR({ funct: FUNCT.SYSCALL })];
  }],
  ['addi', immArith(OP.ADDI)],
  ['addiu', immArith(OP.ADDIU)],
  ['slti', immArith(OP.SLTI)],
  ['sltiu', immArith(OP.SLTIU)],
  ['andi', immArith(OP.ANDI)],
  ['ori', immArith(OP.ORI)],
  ['xori', immArith(OP.XORI)],
  ['beq', branchCompare(OP.BEQ)],
  ['bne', branchCompare(OP.BNE)],
  ['blez', branchZero(OP.BLEZ)],
  ['bgtz', branchZero(OP.BGTZ)],
  ['j', jump(OP.J)],
  ['jal', jump(OP.JAL)],
]);
