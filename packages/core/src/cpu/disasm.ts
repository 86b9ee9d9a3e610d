import { hex, signExtend16, zeroExtend16 } from '../utils/bit.js';
import { decode } from './decode.js';
import { FUNCT, OP, REG_RA, REG_ZERO, registerName as r } from './opcodes.js';

function branchTarget(ip: number, imm16: number): string {
  return hex((ip + 4 + (signExtend16(imm16) << 2)) >>> 0);
}

const THREE_REG: Partial<Record<number, string>> = {
  [FUNCT.ADD]: 'add', [FUNCT.ADDU]: 'addu', [FUNCT.SUB]: 'sub', [FUNCT.SUBU]: 'subu',
  [FUNCT.AND]: 'and', [FUNCT.OR]: 'or', [FUNCT.XOR]: 'xor', [FUNCT.NOR]: 'nor',
  [FUNCT.SLT]: 'slt', [FUNCT.SLTU]: 'sltu',
};

const SHIFT_IMM: Partial<Record<number, string>> = { [FUNCT.SLL]: 'sll', [FUNCT.SRL]: 'srl', [FUNCT.SRA]: 'sra' };
const SHIFT_VAR: Partial<Record<number, string>> = { [FUNCT.SLLV]: 'sllv', [FUNCT.SRLV]: 'srlv', [FUNCT.SRAV]: 'srav' };
const HILO_PAIR: Partial<Record<number, string>> = { [FUNCT.MULT]: 'mult', [FUNCT.MULTU]: 'multu', [FUNCT.DIV]: 'div', [FUNCT.DIVU]: 'divu' };

/**
 * Renders one instruction word as assembly text. `ip` is the word's address and
 * only matters for branch targets. Words outside the implemented subset come
 * back as `.word 0x...`.
 */
export function disassemble(word: number, ip = 0): string {
  const { opcode, rs, rt, rd, shamt, funct, immediate, target } = decode(word);
  if (opcode === OP.SPECIAL) {
    if ((word >>> 0) === 0) return 'nop';
    const three = THREE_REG[funct];
    if (three) return `${three} ${r(rd)}, ${r(rs)}, ${r(rt)}`;
    const shImm = SHIFT_IMM[funct];
    if (shImm) return `${shImm} ${r(rd)}, ${r(rt)}, ${shamt}`;
    const shVar = SHIFT_VAR[funct];
    if (shVar) return `${shVar} ${r(rd)}, ${r(rt)}, ${r(rs)}`;
    const pair = HILO_PAIR[funct];
    if (pair) return `${pair} ${r(rs)}, ${r(rt)}`;
    switch (funct) {
      case FUNCT.JR: return `jr ${r(rs)}`;
      case FUNCT.JALR: return `jalr ${r(rd === REG_ZERO ? REG_RA : rd)}, ${r(rs)}`;
      case FUNCT.SYSCALL: return 'syscall';
      case FUNCT.MFHI: return `mfhi ${r(rd)}`;
      case FUNCT.MFLO: return `mflo ${r(rd)}`;
      case FUNCT.MTHI: return `mthi ${r(rs)}`;
      case FUNCT.MTLO: return `mtlo ${r(rs)}`;
      default: return `.word ${hex(word)}`;
    }
  }
  switch (opcode) {
    case OP.J: return `j ${hex(target << 2)}`;
    case OP.JAL: return `jal ${hex(target << 2)}`;
    case OP.BEQ: return `beq ${r(rs)}, ${r(rt)}, ${branchTarget(ip, immediate)}`;
    case OP.BNE: return `bne ${r(rs)}, ${r(rt)}, ${branchTarget(ip, immediate)}`;
    case OP.BLEZ: return `blez ${r(rs)}, ${branchTarget(ip, immediate)}`;
    case OP.BGTZ: return `bgtz ${r(rs)}, ${branchTarget(ip, immediate)}`;
    case OP.ADDI: return `addi ${r(rt)}, ${r(rs)}, ${signExtend16(immediate)}`;
    case OP.ADDIU: return `addiu ${r(rt)}, ${r(rs)}, ${zeroExtend16(immediate)}`;
    case OP.SLTI: return `slti ${r(rt)}, ${r(rs)}, ${signExtend16(immediate)}`;
    case OP.SLTIU: return `sltiu ${r(rt)}, ${r(rs)}, ${zeroExtend16(immediate)}`;
    case OP.ANDI: return `andi ${r(rt)}, ${r(rs)}, ${hex(immediate)}`;
    case OP.ORI: return `ori ${r(rt)}, ${r(rs)}, ${hex(immediate)}`;
    case OP.XORI: return `xori ${r(rt)}, ${r(rs)}, ${hex(immediate)}`;
    default: return `.word ${hex(word)}`;
  }
}
