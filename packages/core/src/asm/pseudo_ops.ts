import { encodeI, encodeJ, encodeR } from '../cpu/encode.js';
import { FUNCT, OP, REG_AT, REG_ZERO, type FunctCode } from '../cpu/opcodes.js';
import {
  INT32_MIN, UINT32_MAX, address, branchOffset, expectOperands, imm, jumpTarget, loadImmediate, reg,
  type Expander,
} from './emit.js';
import { AssemblyError } from './errors.js';
import { regOrAt } from './instructions.js';

// neg rd, rs => sub rd, $zero, rs
const negate = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 2);
  return [encodeR({ rd: reg(ctx, 0), rs: REG_ZERO, rt: reg(ctx, 1), funct })];
};

// rem rd, rs, rt => div rs, rt ; mfhi rd
const remainder = (funct: FunctCode): Expander => (ctx) => {
  expectOperands(ctx, 3);
  const rt = regOrAt(ctx, 2);
  return [
    ...rt.prefix,
    encodeR({ rs: reg(ctx, 1), rt: rt.register, funct }),
    encodeR({ rd: reg(ctx, 0), funct: FUNCT.MFHI }),
  ];
};

export const PSEUDO_OPS: ReadonlyMap<string, Expander> = new Map<string, Expander>([
  ['nop', (ctx) => {
    expectOperands(ctx, 0);
    return [0];
  }],
  ['li', (ctx) => {
    expectOperands(ctx, 2);
    return loadImmediate(reg(ctx, 0), imm(ctx, 1, INT32_MIN, UINT32_MAX));
  }],
  // move rd, rs => add rd, $zero, rs
  ['move', (ctx) => {
    expectOperands(ctx, 2);
    return [encodeR({ rd: reg(ctx, 0), rs: REG_ZERO, rt: reg(ctx, 1), funct: FUNCT.ADD })];
  }],
  ['neg', negate(FUNCT.SUB)],
  ['negu', negate(FUNCT.SUBU)],
  ['rem', remainder(FUNCT.DIV)],
  ['remu', remainder(FUNCT.DIVU)],
  // Unconditional, through J
  ['b', (ctx) => {
    expectOperands(ctx, 1);
    return [encodeJ(OP.J, jumpTarget(ctx, 0))];
  }],
  // blt rs, rt, target => slt $at, rs, rt ; bne $at, $zero, target
  ['blt', (ctx) => {
    expectOperands(ctx, 3);
    const rt = regOrAt(ctx, 1);
    const slt = encodeR({ rd: REG_AT, rs: reg(ctx, 0), rt: rt.register, funct: FUNCT.SLT });
    const at = ctx.address + (rt.prefix.length + 1) * 4;
    return [...rt.prefix, slt, encodeI(OP.BNE, REG_AT, REG_ZERO, branchOffset(ctx, 2, at))];
  }],
  // la rt, label => addiu rt, $zero, address
  ['la', (ctx) => {
    expectOperands(ctx, 2);
    const addr = address(ctx, 1);
    if (addr > 0xffff) throw new AssemblyError(`Address of operand 2 of 'la' does not fit in 16 bits`, ctx.node.line);
    return [encodeI(OP.ADDIU, REG_ZERO, reg(ctx, 0), addr)];
  }],
]);
