import { hex32, readU32BE } from '../utils/bit.js';
import { ExecutionFault } from './exceptions.js';
import type { ProcessorState } from './state.js';

// Reads the big-endian word at ip, then advances ip by 4.
// ip is left untouched when the word is not fully inside the program.
export function fetch(state: ProcessorState): number {
  const program = state.program;
  const ip = state.ip >>> 0;
  if (program === null) {
    throw new ExecutionFault('invalid-program', ip, 'Invalid program provided.');
  }
  if (ip + 4 > program.length) {
    throw new ExecutionFault(
      'invalid-program',
      ip,
      `Instruction pointer ${hex32(ip)} is outside the program (${program.length} bytes).`,
    );
  }
  const word = readU32BE(program, ip);
  state.ip = (ip + 4) >>> 0;
  return word;
}
