import { ExecutionFault } from './exceptions.js';
import { REG_V0, SYSCALL_EXIT } from './opcodes.js';
import type { ProcessorState } from './state.js';

export function syscall(state: ProcessorState, ip: number): void {
  const selector = state.read(REG_V0);
  switch (selector) {
    case SYSCALL_EXIT:
      state.halt();
      return;
    default:
      throw new ExecutionFault('unrecognized-syscall', ip, `Unknown syscall instruction ${selector}`);
  }
}
