export * from './cpu/state.js';
export * from './cpu/fetch.js';
export * from './cpu/decode.js';
export * from './cpu/encode.js';
export * from './cpu/dispatch.js';
export * from './cpu/exceptions.js';
export * from './cpu/faults.js';
export * from './cpu/opcodes.js';
export * from './cpu/disasm.js';
export * from './system/run_loop.js';
export * from './utils/bit.js';
export * from './asm/assembler.js';
export * from './asm/errors.js';
