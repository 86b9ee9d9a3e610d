import { decode } from '../cpu/decode.js';
import { disassemble } from '../cpu/disasm.js';
import { dispatch } from '../cpu/dispatch.js';
import { ExecutionFault, type FaultReason } from '../cpu/exceptions.js';
import { defaultLog, reportFault, type DiagnosticLog } from '../cpu/faults.js';
import { fetch } from '../cpu/fetch.js';
import type { ProcessorState } from '../cpu/state.js';
import { hex32 } from '../utils/bit.js';

export type Success = { kind: 'success' };
export type Failure = { kind: 'failure'; reason: FaultReason; ip: number; message: string };
export type ExecutionOutcome = Success | Failure;
export type StepOutcome = ExecutionOutcome;
// The budget in RunOptions.maxSteps ran out before the program halted
export type StepLimit = { kind: 'step-limit' };
export type RunOutcome = (ExecutionOutcome | StepLimit) & { steps: number };

export type RunHooks = {
  // Receives diagnostics for faults; defaults to console.error
  log?: DiagnosticLog;
  // Called after each fetch with the instruction's address and word
  onTrace?: (ip: number, word: number) => void;
};

export type RunOptions = RunHooks & {
  // Stop with a step-limit outcome after this many steps; unbounded when absent
  maxSteps?: number;
};

const SUCCESS: Success = { kind: 'success' };

function traceFromEnv(): RunHooks['onTrace'] {
  if (!process.env.MIPSI_TRACE) return undefined;
  return (ip, word) => {
    // eslint-disable-next-line no-console
    console.log(`[trace] ${hex32(ip)} ${hex32(word)}  ${disassemble(word, ip)}`);
  };
}

// One fetch/decode/execute cycle. A halted state executes nothing.
export function step(state: ProcessorState, hooks: RunHooks = {}): StepOutcome {
  if (state.halted) return SUCCESS;
  const log = hooks.log ?? defaultLog;
  const ip = state.ip >>> 0;
  try {
    const word = fetch(state);
    hooks.onTrace?.(ip, word);
    dispatch(state, decode(word), ip);
  } catch (e) {
    if (e instanceof ExecutionFault) {
      if (e.reason !== 'integer-overflow') log(e.message);
      return { kind: 'failure', reason: e.reason, ip: e.ip >>> 0, message: e.message };
    }
    throw e;
  }
  return SUCCESS;
}

// Steps until the exit syscall, the first fault or the step budget. Faults halt the state.
export function run(state: ProcessorState, opts: RunOptions = {}): RunOutcome {
  const log = opts.log ?? defaultLog;
  if (state.program === null) {
    log('Invalid program provided.');
    return { kind: 'failure', reason: 'invalid-program', ip: state.ip >>> 0, message: 'Invalid program provided.', steps: 0 };
  }
  const stepHooks: RunHooks = { log, onTrace: opts.onTrace ?? traceFromEnv() };
  let steps = 0;
  while (!state.halted) {
    if (opts.maxSteps !== undefined && steps >= opts.maxSteps) return { kind: 'step-limit', steps };
    const outcome = step(state, stepHooks);
    steps++;
    if (outcome.kind === 'failure') {
      state.halt();
      reportFault(outcome, log);
      return { ...outcome, steps };
    }
  }
  return { kind: 'success', steps };
}
