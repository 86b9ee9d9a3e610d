// Instruction builders and a tiny harness for CPU tests
import { encodeI, encodeJ, encodeR, programFromWords } from '../../src/cpu/encode.js';
import { FUNCT, OP, REG_V0, SYSCALL_EXIT } from '../../src/cpu/opcodes.js';
import { initialize, type ProcessorOptions, type ProcessorState } from '../../src/cpu/state.js';
import { step, type StepOutcome } from '../../src/system/run_loop.js';

const rType = (funct: number) => (rd: number, rs: number, rt: number) => encodeR({ rd, rs, rt, funct });
const iType = (op: number) => (rt: number, rs: number, imm16: number) => encodeI(op, rs, rt, imm16);

export const ADD = rType(FUNCT.ADD);
export const ADDU = rType(FUNCT.ADDU);
export const SUB = rType(FUNCT.SUB);
export const SUBU = rType(FUNCT.SUBU);
export const AND = rType(FUNCT.AND);
export const OR = rType(FUNCT.OR);
export const XOR = rType(FUNCT.XOR);
export const NOR = rType(FUNCT.NOR);
export const SLT = rType(FUNCT.SLT);
export const SLTU = rType(FUNCT.SLTU);

export function SLL(rd: number, rt: number, sa: number) { return encodeR({ rd, rt, shamt: sa, funct: FUNCT.SLL }); }
export function SRL(rd: number, rt: number, sa: number) { return encodeR({ rd, rt, shamt: sa, funct: FUNCT.SRL }); }
export function SRA(rd: number, rt: number, sa: number) { return encodeR({ rd, rt, shamt: sa, funct: FUNCT.SRA }); }
export function SLLV(rd: number, rt: number, rs: number) { return encodeR({ rd, rt, rs, funct: FUNCT.SLLV }); }
export function SRLV(rd: number, rt: number, rs: number) { return encodeR({ rd, rt, rs, funct: FUNCT.SRLV }); }
export function SRAV(rd: number, rt: number, rs: number) { return encodeR({ rd, rt, rs, funct: FUNCT.SRAV }); }

export function JR(rs: number) { return encodeR({ rs, funct: FUNCT.JR }); }
export function JALR(rd: number, rs: number) { return encodeR({ rd, rs, funct: FUNCT.JALR }); }
export function SYSCALL() { return encodeR({ funct: FUNCT.SYSCALL }); }

export function MFHI(rd: number) { return encodeR({ rd, funct: FUNCT.MFHI }); }
export function MFLO(rd: number) { return encodeR({ rd, funct: FUNCT.MFLO }); }
export function MTHI(rs: number) { return encodeR({ rs, funct: FUNCT.MTHI }); }
export function MTLO(rs: number) { return encodeR({ rs, funct: FUNCT.MTLO }); }
export function MULT(rs: number, rt: number) { return encodeR({ rs, rt, funct: FUNCT.MULT }); }
export function MULTU(rs: number, rt: number) { return encodeR({ rs, rt, funct: FUNCT.MULTU }); }
export function DIV(rs: number, rt: number) { return encodeR({ rs, rt, funct: FUNCT.DIV }); }
export function DIVU(rs: number, rt: number) { return encodeR({ rs, rt, funct: FUNCT.DIVU }); }

export const ADDI = iType(OP.ADDI);
export const ADDIU = iType(OP.ADDIU);
export const SLTI = iType(OP.SLTI);
export const SLTIU = iType(OP.SLTIU);
export const ANDI = iType(OP.ANDI);
export const ORI = iType(OP.ORI);
export const XORI = iType(OP.XORI);

export function BEQ(rs: number, rt: number, off16: number) { return encodeI(OP.BEQ, rs, rt, off16); }
export function BNE(rs: number, rt: number, off16: number) { return encodeI(OP.BNE, rs, rt, off16); }
export function BLEZ(rs: number, off16: number) { return encodeI(OP.BLEZ, rs, 0, off16); }
export function BGTZ(rs: number, off16: number) { return encodeI(OP.BGTZ, rs, 0, off16); }
export function J(target26: number) { return encodeJ(OP.J, target26); }
export function JAL(target26: number) { return encodeJ(OP.JAL, target26); }

// addi $v0, $zero, 10 ; syscall
export function EXIT(): number[] { return [ADDI(REG_V0, 0, SYSCALL_EXIT), SYSCALL()]; }

export function load(words: number[], opts?: ProcessorOptions): ProcessorState {
  return initialize(programFromWords(words), opts);
}

// Steps n instructions, failing the test on the first non-success outcome
export function stepN(state: ProcessorState, n: number, log: (m: string) => void = () => {}): void {
  for (let i = 0; i < n; i++) {
    const out: StepOutcome = step(state, { log });
    if (out.kind !== 'success') throw new Error(`step ${i} failed: ${out.reason} (${out.message})`);
  }
}

// Run a program whose registers are preset, one step per word
export function exec(words: number[], preset: Record<number, number> = {}, opts?: ProcessorOptions): ProcessorState {
  const s = load(words, opts);
  for (const [k, v] of Object.entries(preset)) s.regs[Number(k)] = v;
  stepN(s, words.length);
  return s;
}
