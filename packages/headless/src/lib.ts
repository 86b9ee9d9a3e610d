import { readFile, writeFile } from 'node:fs/promises';
import {
  AssemblyError, REGISTER_NAMES, assemble, disassemble, hex32, initialize, readU32BE, run,
  type DiagnosticLog, type FaultReason, type ProcessorState, type RunHooks,
} from '@mipsi/core';

export type Io = { out: (line: string) => void; err: (line: string) => void };

export type RunConfig = {
  stackSize?: number;
  maxSteps?: number;
  hardwireZero: boolean;
  legacyImmediateLogical: boolean;
  trace: boolean;
};

export type RunReport = {
  outcome: 'success' | 'failure' | 'step-limit';
  reason?: FaultReason;
  message?: string;
  steps: number;
  ip: string;
  hi: number;
  lo: number;
  registers: Record<string, number>;
};

export function parseNum(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const s = val.trim();
  if (s.startsWith('0x') || s.startsWith('0X')) {
    const n = parseInt(s, 16);
    return Number.isFinite(n) ? (n >>> 0) : def;
  }
  const n = Number(s);
  return (s !== '' && Number.isFinite(n)) ? (n >>> 0) : def;
}

// `--key value` pairs and single-letter `-k value`; a flag with no value reads as '1'
export function parseArgs(args: readonly string[]): { positional: string[]; opts: Record<string, string> } {
  const positional: string[] = [];
  const opts: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? '';
    const key = a.startsWith('--') ? a.slice(2) : /^-[A-Za-z]$/.test(a) ? a.slice(1) : null;
    if (key !== null) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        opts[key] = next;
        i++;
      } else {
        opts[key] = '1';
      }
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

export function configFromOpts(opts: Record<string, string>): RunConfig {
  const stackSize = opts['stack-size'];
  const maxSteps = opts['max-steps'];
  return {
    stackSize: stackSize === undefined ? undefined : parseNum(stackSize, 0),
    maxSteps: maxSteps === undefined ? undefined : parseNum(maxSteps, 0),
    hardwireZero: opts['hardwire-zero'] !== undefined,
    legacyImmediateLogical: opts['legacy-imm-logical'] !== undefined,
    trace: opts['trace'] !== undefined,
  };
}

export function registerDump(state: ProcessorState): Record<string, number> {
  const out: Record<string, number> = {};
  REGISTER_NAMES.forEach((name, i) => { out[name] = state.read(i); });
  return out;
}

function report(state: ProcessorState, steps: number, outcome: RunReport['outcome'], failure?: { reason: FaultReason; message: string }): RunReport {
  return {
    outcome,
    ...(failure ? { reason: failure.reason, message: failure.message } : {}),
    steps,
    ip: hex32(state.ip),
    hi: state.hi,
    lo: state.lo,
    registers: registerDump(state),
  };
}

export function runImage(program: Uint8Array, cfg: RunConfig, log: DiagnosticLog, trace?: RunHooks['onTrace']): RunReport {
  const state = initialize(program, {
    stackSize: cfg.stackSize,
    hardwireZero: cfg.hardwireZero,
    legacyImmediateLogical: cfg.legacyImmediateLogical,
  });
  const out = run(state, { log, onTrace: trace, maxSteps: cfg.maxSteps });
  return out.kind === 'failure' ? report(state, out.steps, out.kind, out) : report(state, out.steps, out.kind);
}

// One line per complete word; a trailing partial word is skipped
export function disassembleImage(program: Uint8Array): string[] {
  const lines: string[] = [];
  for (let ip = 0; ip + 4 <= program.length; ip += 4) {
    const w = readU32BE(program, ip);
    lines.push(`${hex32(ip)}: ${hex32(w)}  ${disassemble(w, ip)}`);
  }
  return lines;
}

export function isAssemblySource(filePath: string): boolean {
  return /\.(s|asm)$/i.test(filePath);
}

export async function loadAssembly(filePath: string): Promise<Uint8Array> {
  return assemble(await readFile(filePath, 'utf8')).image;
}

// Assembly sources (.s, .asm) are assembled on load; anything else is a raw image
export async function loadImage(filePath: string): Promise<Uint8Array> {
  if (isAssemblySource(filePath)) return loadAssembly(filePath);
  const buf = await readFile(filePath);
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

export function defaultOutputPath(sourcePath: string): string {
  return isAssemblySource(sourcePath) ? sourcePath.replace(/\.(s|asm)$/i, '.bin') : `${sourcePath}.bin`;
}

export const USAGE = `Usage:
  mipsi run <program.bin> [--stack-size N] [--max-steps N] [--hardwire-zero] [--legacy-imm-logical] [--trace]
  mipsi disasm <program.bin>
  mipsi asm <program.s> [-o out.bin]
  mipsi help

Program files hold raw big-endian instruction words, loaded at offset 0.
run and disasm also take assembly sources (.s, .asm) and assemble them first.

Examples:
  mipsi run build/exit.bin
  mipsi run loop.bin --max-steps 100000 --trace
  mipsi disasm build/exit.bin
  mipsi asm examples/sum.s -o build/sum.bin`;

async function readImage(filePath: string | undefined, cmd: string, io: Io, load = loadImage): Promise<Uint8Array | null> {
  if (!filePath) {
    io.err(`${cmd} requires a program file path`);
    return null;
  }
  try {
    return await load(filePath);
  } catch (e) {
    if (e instanceof AssemblyError) io.err(`${filePath}: ${e.message}`);
    else io.err(`Failed to read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

// Returns the process exit code
export async function runCli(argv: readonly string[], io: Io): Promise<number> {
  const { positional, opts } = parseArgs(argv);
  const cmd = positional[0];
  if (!cmd || cmd === 'help' || opts['help'] !== undefined || opts['h'] !== undefined) {
    io.out(USAGE);
    return 0;
  }
  if (cmd === 'run') {
    const program = await readImage(positional[1], cmd, io);
    if (!program) return 1;
    const cfg = configFromOpts(opts);
    const trace: RunHooks['onTrace'] = cfg.trace
      ? (ip, word) => io.err(`[trace] ${hex32(ip)} ${hex32(word)}  ${disassemble(word, ip)}`)
      : undefined;
    const rep = runImage(program, cfg, io.err, trace);
    io.out(JSON.stringify(rep, null, 2));
    return rep.outcome === 'success' ? 0 : 1;
  }
  if (cmd === 'disasm') {
    const program = await readImage(positional[1], cmd, io);
    if (!program) return 1;
    for (const line of disassembleImage(program)) io.out(line);
    return 0;
  }
  if (cmd === 'asm') {
    const source = positional[1];
    const program = await readImage(source, cmd, io, loadAssembly);
    if (!source || !program) return 1;
    const outPath = opts['o'] ?? opts['out'] ?? defaultOutputPath(source);
    await writeFile(outPath, program);
    io.out(`Wrote ${program.length} bytes to ${outPath}`);
    return 0;
  }
  io.out(USAGE);
  return 1;
}
