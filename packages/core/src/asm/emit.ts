import { encodeI, encodeR } from '../cpu/encode.js';
import { FUNCT, OP, REG_ZERO } from '../cpu/opcodes.js';
import { hex32 } from '../utils/bit.js';
import { AssemblyError } from './errors.js';
import type { InstructionNode, Operand } from './parser.js';

export const INT32_MIN = -0x80000000;
export const UINT32_MAX = 0xffffffff;
export const IMM16_MIN = -0x8000;
export const IMM16_MAX = 0xffff;

export type Resolver = (name: string, line: number) => number;

export type EmitContext = {
  node: InstructionNode;
  // Byte address of the first word this statement emits
  address: number;
  resolve: Resolver;
  // Layout pass: only the word count is used, labels are not looked up
  sizing: boolean;
};

export type Expander = (ctx: EmitContext) => number[];

function fail(ctx: EmitContext, detail: string): never {
  throw new AssemblyError(detail, ctx.node.line);
}

export function expectOperands(ctx: EmitContext, ...counts: number[]): void {
  const n = ctx.node.operands.length;
  if (!counts.includes(n)) fail(ctx, `'${ctx.node.name}' expects ${counts.join(' or ')} operands, got ${n}`);
}

function operand(ctx: EmitContext, i: number): Operand {
  return ctx.node.operands[i] ?? fail(ctx, `Missing operand ${i + 1} of '${ctx.node.name}'`);
}

export function reg(ctx: EmitContext, i: number): number {
  const op = operand(ctx, i);
  if (op.kind !== 'register') fail(ctx, `Operand ${i + 1} of '${ctx.node.name}' must be a register`);
  return op.register;
}

export function isImmediate(ctx: EmitContext, i: number): boolean {
  return ctx.node.operands[i]?.kind === 'immediate';
}

export function imm(ctx: EmitContext, i: number, min = IMM16_MIN, max = IMM16_MAX): number {
  const op = operand(ctx, i);
  if (op.kind !== 'immediate') fail(ctx, `Operand ${i + 1} of '${ctx.node.name}' must be an immediate`);
  if (op.value < min || op.value > max) fail(ctx, `Immediate ${op.value} out of range for '${ctx.node.name}'`);
  return op.value;
}

// A label, or a number taken as an absolute byte address
export function address(ctx: EmitContext, i: number): number {
  const op = operand(ctx, i);
  if (op.kind === 'label') return ctx.sizing ? 0 : ctx.resolve(op.name, ctx.node.line) >>> 0;
  if (op.kind === 'immediate') return op.value >>> 0;
  return fail(ctx, `Operand ${i + 1} of '${ctx.node.name}' must be a label or an address`);
}

// Word offset from the instruction after the branch at `at`
export function branchOffset(ctx: EmitContext, i: number, at: number): number {
  const target = address(ctx, i);
  if (ctx.sizing) return 0;
  const delta = target - (at + 4);
  if (delta % 4 !== 0) fail(ctx, `Branch target ${hex32(target)} is not word aligned`);
  const words = delta / 4;
  if (words < -0x8000 || words > 0x7fff) fail(ctx, `Branch target ${hex32(target)} is out of range`);
  return words & 0xffff;
}

export function jumpTarget(ctx: EmitContext, i: number): number {
  const target = address(ctx, i);
  if (target % 4 !== 0) fail(ctx, `Jump target ${hex32(target)} is not word aligned`);
  return (target >>> 2) & 0x03ffffff;
}

/**
 * Shortest sequence that puts a 32-bit constant in `rt`. Only ADDI, ADDIU and
 * SLL are used, so the result does not depend on the legacy logical-immediate
 * mode.
 */
export function loadImmediate(rt: number, value: number): number[] {
  if (value >= 0 && value <= 0xffff) return [encodeI(OP.ADDIU, REG_ZERO, rt, value)];
  if (value >= IMM16_MIN && value < 0) return [encodeI(OP.ADDI, REG_ZERO, rt, value)];
  const u = value >>> 0;
  const words = [
    encodeI(OP.ADDIU, REG_ZERO, rt, u >>> 16),
    encodeR({ rt, rd: rt, shamt: 16, funct: FUNCT.SLL }),
  ];
  if (u & 0xffff) words.push(encodeI(OP.ADDIU, rt, rt, u & 0xffff));
  return words;
}
