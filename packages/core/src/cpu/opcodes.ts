// Primary opcodes (bits 31..26)
export const OP = {
  SPECIAL: 0x00,
  J: 0x02,
  JAL: 0x03,
  BEQ: 0x04,
  BNE: 0x05,
  BLEZ: 0x06,
  BGTZ: 0x07,
  ADDI: 0x08,
  ADDIU: 0x09,
  SLTI: 0x0a,
  SLTIU: 0x0b,
  ANDI: 0x0c,
  ORI: 0x0d,
  XORI: 0x0e,
} as const;

// SPECIAL function codes (bits 5..0)
export const FUNCT = {
  SLL: 0x00,
  SRL: 0x02,
  SRA: 0x03,
  SLLV: 0x04,
  SRLV: 0x06,
  SRAV: 0x07,
  JR: 0x08,
  JALR: 0x09,
  SYSCALL: 0x0c,
  MFHI: 0x10,
  MTHI: 0x11,
  MFLO: 0x12,
  MTLO: 0x13,
  MULT: 0x18,
  MULTU: 0x19,
  DIV: 0x1a,
  DIVU: 0x1b,
  ADD: 0x20,
  ADDU: 0x21,
  SUB: 0x22,
  SUBU: 0x23,
  AND: 0x24,
  OR: 0x25,
  XOR: 0x26,
  NOR: 0x27,
  SLT: 0x2a,
  SLTU: 0x2b,
} as const;

export type Opcode = typeof OP[keyof typeof OP];
export type FunctCode = typeof FUNCT[keyof typeof FUNCT];

// Selector read from $v0 by SYSCALL
export const SYSCALL_EXIT = 10;

export const REG_COUNT = 32;
export const REG_ZERO = 0;
// Assembler temporary, clobbered by pseudo-op expansions
export const REG_AT = 1;
export const REG_V0 = 2;
export const REG_V1 = 3;
export const REG_SP = 29;
export const REG_RA = 31;

export const REGISTER_NAMES: readonly string[] = [
  '$zero', '$at', '$v0', '$v1', '$a0', '$a1', '$a2', '$a3',
  '$t0', '$t1', '$t2', '$t3', '$t4', '$t5', '$t6', '$t7',
  '$s0', '$s1', '$s2', '$s3', '$s4', '$s5', '$s6', '$s7',
  '$t8', '$t9', '$k0', '$k1', '$gp', '$sp', '$fp', '$ra',
];

export function registerName(index: number): string {
  return REGISTER_NAMES[index] ?? `$${index}`;
}
