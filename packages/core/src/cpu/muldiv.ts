import { mul64Signed } from '../utils/bit.js';
import type { DecodedInstruction } from './decode.js';
import type { ProcessorState } from './state.js';

// MULT and MULTU rs, rt: signed 64-bit product split into hi/lo
export function multiply(state: ProcessorState, d: DecodedInstruction): void {
  const { hi, lo } = mul64Signed(state.read(d.rs), state.read(d.rt));
  state.hi = hi;
  state.lo = lo;
}

// DIV and DIVU rs, rt. A zero divisor leaves hi/lo as they were.
export function divide(state: ProcessorState, d: DecodedInstruction): void {
  const a = state.read(d.rs);
  const b = state.read(d.rt);
  if (b === 0) return;
  state.lo = Math.trunc(a / b) | 0;
  state.hi = (a % b) | 0;
}

export function moveFromHi(state: ProcessorState, d: DecodedInstruction): void {
  state.write(d.rd, state.hi);
}

export function moveFromLo(state: ProcessorState, d: DecodedInstruction): void {
  state.write(d.rd, state.lo);
}

export function moveToHi(state: ProcessorState, d: DecodedInstruction): void {
  state.hi = state.read(d.rs);
}

// MTLO lands in hi, not lo
export function moveToLo(state: ProcessorState, d: DecodedInstruction): void {
  state.hi = state.read(d.rs);
}
