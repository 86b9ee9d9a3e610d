import * as alu from './alu.js';
import * as control from './control.js';
import type { DecodedInstruction } from './decode.js';
import { ExecutionFault } from './exceptions.js';
import * as muldiv from './muldiv.js';
import { FUNCT, OP } from './opcodes.js';
import type { ProcessorState } from './state.js';
import { syscall } from './syscall.js';

// Executes one decoded instruction. `ip` is the instruction's own address
// (state.ip has already moved past it). Faults are thrown as ExecutionFault.
export function dispatch(state: ProcessorState, d: DecodedInstruction, ip: number): void {
  switch (d.opcode) {
    case OP.SPECIAL:
      dispatchSpecial(state, d, ip);
      return;
    case OP.J: control.jump(state, d, false); return;
    case OP.JAL: control.jump(state, d, true); return;
    case OP.BEQ: control.branch(state, d, 'eq'); return;
    case OP.BNE: control.branch(state, d, 'ne'); return;
    case OP.BLEZ: control.branch(state, d, 'lez'); return;
    case OP.BGTZ: control.branch(state, d, 'gez'); return;
    case OP.ADDI: alu.addImmediateTrapping(state, d, ip); return;
    case OP.ADDIU: alu.addImmediateWrapping(state, d); return;
    case OP.SLTI: alu.setLessThanImmediate(state, d, false); return;
    case OP.SLTIU: alu.setLessThanImmediate(state, d, true); return;
    case OP.ANDI: alu.bitwiseImmediate(state, d, 'and'); return;
    case OP.ORI: alu.bitwiseImmediate(state, d, 'or'); return;
    case OP.XORI: alu.bitwiseImmediate(state, d, 'xor'); return;
    default:
      throw new ExecutionFault('unrecognized-instruction', ip, `Unknown instruction ${d.opcode}`);
  }
}

function dispatchSpecial(state: ProcessorState, d: DecodedInstruction, ip: number): void {
  switch (d.funct) {
    case FUNCT.SLL: alu.shiftLeft(state, d, false); return;
    case FUNCT.SRL:
    case FUNCT.SRA: alu.shiftRight(state, d, false); return;
    case FUNCT.SLLV: alu.shiftLeft(state, d, true); return;
    case FUNCT.SRLV:
    case FUNCT.SRAV: alu.shiftRight(state, d, true); return;
    case FUNCT.JR: control.jumpRegister(state, d, false); return;
    case FUNCT.JALR: control.jumpRegister(state, d, true); return;
    case FUNCT.SYSCALL: syscall(state, ip); return;
    case FUNCT.MFHI: muldiv.moveFromHi(state, d); return;
    case FUNCT.MTHI: muldiv.moveToHi(state, d); return;
    case FUNCT.MFLO: muldiv.moveFromLo(state, d); return;
    case FUNCT.MTLO: muldiv.moveToLo(state, d); return;
    case FUNCT.MULT:
    case FUNCT.MULTU: muldiv.multiply(state, d); return;
    case FUNCT.DIV:
    case FUNCT.DIVU: muldiv.divide(state, d); return;
    case FUNCT.ADD: alu.addSubTrapping(state, d, false, ip); return;
    case FUNCT.ADDU: alu.addSubWrapping(state, d, false); return;
    case FUNCT.SUB: alu.addSubTrapping(state, d, true, ip); return;
    case FUNCT.SUBU: alu.addSubWrapping(state, d, true); return;
    case FUNCT.AND: alu.bitwise(state, d, 'and'); return;
    case FUNCT.OR: alu.bitwise(state, d, 'or'); return;
    case FUNCT.XOR: alu.bitwise(state, d, 'xor'); return;
    case FUNCT.NOR: alu.bitwise(state, d, 'nor'); return;
    case FUNCT.SLT:
    case FUNCT.SLTU: alu.setLessThan(state, d); return;
    default:
      throw new ExecutionFault('unrecognized-instruction', ip, `Unknown special instruction ${d.funct}`);
  }
}
