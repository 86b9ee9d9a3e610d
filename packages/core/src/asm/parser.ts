import { REGISTER_NAMES } from '../cpu/opcodes.js';
import { AssemblyError } from './errors.js';
import type { LexedLine, Token } from './lexer.js';

export type Segment = 'text' | 'data';

export type Operand =
  | { kind: 'register'; register: number }
  | { kind: 'immediate'; value: number }
  | { kind: 'label'; name: string }
  | { kind: 'string'; value: string };

export type LabelNode = { kind: 'label'; name: string; segment: Segment; line: number };
export type DirectiveNode = { kind: 'directive'; name: string; args: Operand[]; segment: Segment; line: number };
export type InstructionNode = { kind: 'instruction'; name: string; operands: Operand[]; line: number };
export type AstNode = LabelNode | DirectiveNode | InstructionNode;

const REGISTER_ALIASES: ReadonlyMap<string, number> = new Map([
  ...REGISTER_NAMES.map((name, i): [string, number] => [name.slice(1), i]),
  ['s8', 30],
]);

export function parseRegister(name: string, line: number): number {
  if (/^\d+$/.test(name)) {
    const n = Number(name);
    if (n > 31) throw new AssemblyError(`Register index out of bounds '$${name}'`, line);
    return n;
  }
  const idx = REGISTER_ALIASES.get(name);
  if (idx === undefined) throw new AssemblyError(`Unknown register '$${name}'`, line);
  return idx;
}

function parseOperand(group: Token[], line: number): Operand {
  const [tok] = group;
  if (!tok) throw new AssemblyError('Missing operand', line);
  if (group.length > 1) {
    throw new AssemblyError(`Unable to parse operand near '${group.map((t) => t.raw).join(' ')}'`, line);
  }
  switch (tok.type) {
    case 'register': return { kind: 'register', register: parseRegister(tok.value, line) };
    case 'number': return { kind: 'immediate', value: tok.value };
    case 'identifier': return { kind: 'label', name: tok.value };
    case 'string': return { kind: 'string', value: tok.value };
    default: throw new AssemblyError(`Unexpected '${tok.raw}' in operand`, line);
  }
}

function collectOperands(tokens: Token[], line: number): Operand[] {
  if (tokens.length === 0) return [];
  const groups: Token[][] = [[]];
  for (const t of tokens) {
    if (t.type === 'comma') groups.push([]);
    else groups[groups.length - 1]?.push(t);
  }
  return groups.map((g) => parseOperand(g, line));
}

// Data directives accept numbers; .word may also name a label
function checkDirective(name: string, args: Operand[], segment: Segment, line: number): void {
  switch (name) {
    case '.text':
    case '.data':
      if (args.length) throw new AssemblyError(`Directive ${name} does not take arguments`, line);
      return;
    case '.globl':
    case '.global':
      if (!args.length || args.some((a) => a.kind !== 'label')) {
        throw new AssemblyError(`${name} expects symbol names`, line);
      }
      return;
    case '.word':
    case '.half':
    case '.byte':
      if (segment === 'text' && name !== '.word') {
        throw new AssemblyError(`Directive ${name} is only allowed in .data`, line);
      }
      if (!args.length) throw new AssemblyError(`${name} expects at least one value`, line);
      for (const a of args) {
        if (a.kind === 'immediate' || (a.kind === 'label' && name === '.word')) continue;
        throw new AssemblyError(`${name} expects numeric arguments`, line);
      }
      return;
    case '.ascii':
    case '.asciiz':
      if (segment !== 'data') throw new AssemblyError(`Directive ${name} is only allowed in .data`, line);
      if (!args.length || args.some((a) => a.kind !== 'string')) {
        throw new AssemblyError(`${name} expects string arguments`, line);
      }
      return;
    default:
      throw new AssemblyError(`Unknown directive ${name}`, line);
  }
}

export function parse(lines: LexedLine[]): AstNode[] {
  const nodes: AstNode[] = [];
  let segment: Segment = 'text';

  for (const { line, tokens } of lines) {
    let i = 0;
    // Labels open the line and may be chained
    for (;;) {
      const t = tokens[i];
      if (t?.type !== 'identifier' || tokens[i + 1]?.type !== 'colon') break;
      nodes.push({ kind: 'label', name: t.value, segment, line });
      i += 2;
    }
    const first = tokens[i];
    if (!first) continue;
    const rest = tokens.slice(i + 1);

    if (first.type === 'directive') {
      const args = collectOperands(rest, line);
      checkDirective(first.value, args, segment, line);
      if (first.value === '.text' || first.value === '.data') segment = first.value === '.text' ? 'text' : 'data';
      else if (first.value !== '.globl' && first.value !== '.global') {
        nodes.push({ kind: 'directive', name: first.value, args, segment, line });
      }
      continue;
    }
    if (first.type === 'identifier') {
      const name = first.value.toLowerCase();
      if (segment !== 'text') throw new AssemblyError(`Instruction '${name}' is only valid in .text`, line);
      nodes.push({ kind: 'instruction', name, operands: collectOperands(rest, line), line });
      continue;
    }
    throw new AssemblyError(`Unexpected token '${first.raw}'`, line);
  }
  return nodes;
}
