import { signExtend16 } from '../utils/bit.js';
import type { DecodedInstruction } from './decode.js';
import { REG_RA, REG_ZERO } from './opcodes.js';
import type { ProcessorState } from './state.js';

// No delay slot: ip already points past the jump or branch when these run.

export type BranchCondition = 'eq' | 'ne' | 'lez' | 'gez';

function taken(state: ProcessorState, d: DecodedInstruction, cond: BranchCondition): boolean {
  const a = state.read(d.rs);
  switch (cond) {
    case 'eq': return a === state.read(d.rt);
    case 'ne': return a !== state.read(d.rt);
    case 'lez': return a <= 0;
    case 'gez': return a >= 0;
  }
}

// BEQ/BNE/BLEZ/BGTZ. BGTZ tests rs >= 0.
export function branch(state: ProcessorState, d: DecodedInstruction, cond: BranchCondition): void {
  if (!taken(state, d, cond)) return;
  state.ip = (state.ip + (signExtend16(d.immediate) << 2)) >>> 0;
}

// J / JAL target
export function jump(state: ProcessorState, d: DecodedInstruction, link: boolean): void {
  if (link) state.write(REG_RA, state.ip);
  state.ip = (d.target << 2) >>> 0;
}

// JR rs / JALR rd, rs. The target is read after the link write.
export function jumpRegister(state: ProcessorState, d: DecodedInstruction, link: boolean): void {
  if (link) state.write(d.rd === REG_ZERO ? REG_RA : d.rd, state.ip);
  state.ip = state.read(d.rs) >>> 0;
}
