import type { Expander, Resolver } from './emit.js';
import { AssemblyError } from './errors.js';
import { NATIVE_INSTRUCTIONS } from './instructions.js';
import { tokenize } from './lexer.js';
import { parse, type DirectiveNode, type InstructionNode, type Operand } from './parser.js';
import { PSEUDO_OPS } from './pseudo_ops.js';

/**
 * A flat program image: text from offset 0, data straight after it. Labels
 * resolve to byte offsets in the image, which is also the address space the
 * interpreter fetches from.
 */
export type AssembledProgram = {
  image: Uint8Array;
  textSize: number;
  dataSize: number;
  symbols: ReadonlyMap<string, number>;
};

function expander(node: InstructionNode): Expander {
  const e = NATIVE_INSTRUCTIONS.get(node.name) ?? PSEUDO_OPS.get(node.name);
  if (!e) throw new AssemblyError(`Unknown instruction '${node.name}'`, node.line);
  return e;
}

function bigEndian(value: number, width: number): number[] {
  const out: number[] = [];
  for (let i = width - 1; i >= 0; i--) out.push((value >>> (8 * i)) & 0xff);
  return out;
}

const WIDTHS: Partial<Record<string, { width: number; min: number; max: number }>> = {
  '.byte': { width: 1, min: -0x80, max: 0xff },
  '.half': { width: 2, min: -0x8000, max: 0xffff },
  '.word': { width: 4, min: -0x80000000, max: 0xffffffff },
};

function value(arg: Operand, d: DirectiveNode, resolve: Resolver, min: number, max: number): number {
  if (arg.kind === 'label') return resolve(arg.name, d.line);
  if (arg.kind !== 'immediate') throw new AssemblyError(`${d.name} expects numeric arguments`, d.line);
  if (arg.value < min || arg.value > max) throw new AssemblyError(`Value ${arg.value} out of range for ${d.name}`, d.line);
  return arg.value;
}

function ascii(s: string, line: number): number[] {
  return Array.from(s, (ch) => {
    const code = ch.charCodeAt(0);
    if (code > 0xff) throw new AssemblyError(`Character '${ch}' does not fit in a byte`, line);
    return code;
  });
}

function directiveBytes(d: DirectiveNode, resolve: Resolver): number[] {
  const w = WIDTHS[d.name];
  if (w) return d.args.flatMap((a) => bigEndian(value(a, d, resolve, w.min, w.max), w.width));
  const zero = d.name === '.asciiz' ? [0] : [];
  return d.args.flatMap((a) => (a.kind === 'string' ? [...ascii(a.value, d.line), ...zero] : []));
}

export function assemble(source: string): AssembledProgram {
  const nodes = parse(tokenize(source));

  // Pass 1: layout. Expansion lengths depend only on literal operands.
  const textLabels = new Map<string, number>();
  const dataLabels = new Map<string, number>();
  const noLookup: Resolver = () => 0;
  let textSize = 0;
  let dataSize = 0;
  for (const node of nodes) {
    switch (node.kind) {
      case 'label':
        if (textLabels.has(node.name) || dataLabels.has(node.name)) {
          throw new AssemblyError(`Duplicate label '${node.name}'`, node.line);
        }
        if (node.segment === 'text') textLabels.set(node.name, textSize);
        else dataLabels.set(node.name, dataSize);
        break;
      case 'directive': {
        const n = directiveBytes(node, noLookup).length;
        if (node.segment === 'text') textSize += n;
        else dataSize += n;
        break;
      }
      case 'instruction':
        textSize += 4 * expander(node)({ node, address: textSize, resolve: noLookup, sizing: true }).length;
        break;
    }
  }

  const symbols = new Map(textLabels);
  for (const [name, offset] of dataLabels) symbols.set(name, textSize + offset);
  const resolve: Resolver = (name, line) => {
    const addr = symbols.get(name);
    if (addr === undefined) throw new AssemblyError(`Undefined label '${name}'`, line);
    return addr;
  };

  // Pass 2: emit
  const text: number[] = [];
  const data: number[] = [];
  for (const node of nodes) {
    if (node.kind === 'directive') {
      (node.segment === 'text' ? text : data).push(...directiveBytes(node, resolve));
    } else if (node.kind === 'instruction') {
      const words = expander(node)({ node, address: text.length, resolve, sizing: false });
      for (const w of words) text.push(...bigEndian(w, 4));
    }
  }

  return { image: Uint8Array.from([...text, ...data]), textSize, dataSize, symbols };
}
