import { REG_COUNT, REG_SP, REG_ZERO } from './opcodes.js';

export const DEFAULT_STACK_SIZE = 0x10000;

export type ProcessorOptions = {
  // Initial value of $sp
  stackSize?: number;
  // Drop writes to $zero, as real hardware does. Off by default: every register is writable.
  hardwireZero?: boolean;
  // ANDI/ORI/XORI combine the rs field number instead of the register contents
  legacyImmediateLogical?: boolean;
};

export type ResolvedProcessorOptions = Required<ProcessorOptions>;

export function resolveOptions(opts?: ProcessorOptions): ResolvedProcessorOptions {
  return {
    stackSize: (opts?.stackSize ?? DEFAULT_STACK_SIZE) | 0,
    hardwireZero: opts?.hardwireZero ?? false,
    legacyImmediateLogical: opts?.legacyImmediateLogical ?? false,
  };
}

export class ProcessorState {
  readonly regs = new Int32Array(REG_COUNT);
  hi = 0;
  lo = 0;
  ip = 0 >>> 0;
  halted = false;
  // Borrowed; never copied or resized
  program: Uint8Array | null = null;

  constructor(public readonly options: ResolvedProcessorOptions = resolveOptions()) {}

  // Zeroes everything, including the stack pointer and the program reference
  reset(): void {
    this.regs.fill(0);
    this.hi = 0;
    this.lo = 0;
    this.ip = 0;
    this.halted = false;
    this.program = null;
  }

  read(i: number): number {
    return this.regs[i & 0x1f] ?? 0;
  }

  write(i: number, value: number): void {
    const idx = i & 0x1f;
    if (idx === REG_ZERO && this.options.hardwireZero) return;
    this.regs[idx] = value | 0;
  }

  halt(): void {
    this.halted = true;
  }
}

export function initialize(program: Uint8Array | null, opts?: ProcessorOptions): ProcessorState {
  const state = new ProcessorState(resolveOptions(opts));
  state.reset();
  state.regs[REG_SP] = state.options.stackSize;
  state.program = program;
  return state;
}
