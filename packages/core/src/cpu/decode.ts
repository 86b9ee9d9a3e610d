export type DecodedInstruction = {
  readonly word: number;
  readonly opcode: number; // [31:26]
  readonly rs: number; // [25:21]
  readonly rt: number; // [20:16]
  readonly rd: number; // [15:11]
  readonly shamt: number; // [10:6]
  readonly funct: number; // [5:0]
  readonly immediate: number; // [15:0], not extended
  readonly target: number; // [25:0]
};

export function decode(instr: number): DecodedInstruction {
  const word = instr >>> 0;
  return {
    word,
    opcode: (word >>> 26) & 0x3f,
    rs: (word >>> 21) & 0x1f,
    rt: (word >>> 16) & 0x1f,
    rd: (word >>> 11) & 0x1f,
    shamt: (word >>> 6) & 0x1f,
    funct: word & 0x3f,
    immediate: word & 0xffff,
    target: word & 0x03ffffff,
  };
}
