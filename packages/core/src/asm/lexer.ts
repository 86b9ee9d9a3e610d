import { AssemblyError } from './errors.js';

type TokenPos = { line: number; column: number; raw: string };

export type Token =
  | (TokenPos & { type: 'number'; value: number })
  | (TokenPos & { type: 'identifier' | 'directive' | 'register' | 'string' | 'comma' | 'colon'; value: string });

export type LexedLine = { line: number; tokens: Token[] };

const WORD_CHAR = /[A-Za-z0-9_.$]/;
const NUMBER = /^(-?)(0x[0-9a-f]+|0b[01]+|[0-9]+)$/i;

// `#` and `//` start a comment outside string literals
function stripComment(text: string): string {
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === '\\' && inString) { i++; continue; }
    if (c === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (c === '#' || (c === '/' && text[i + 1] === '/')) return text.slice(0, i);
  }
  return text;
}

function readString(text: string, start: number, line: number): { literal: string; end: number } {
  let literal = '';
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (c === '"') return { literal, end: i + 1 };
    if (c === '\\') {
      const next = text[++i];
      switch (next) {
        case 'n': literal += '\n'; break;
        case 't': literal += '\t'; break;
        case '0': literal += '\0'; break;
        case undefined: throw new AssemblyError('Unterminated string', line);
        default: literal += next;
      }
      continue;
    }
    literal += c;
  }
  throw new AssemblyError('Unterminated string', line);
}

function readWord(text: string, start: number): number {
  let i = start;
  while (i < text.length && WORD_CHAR.test(text[i] ?? '')) i++;
  return i;
}

export function parseNumber(raw: string): number | null {
  const m = NUMBER.exec(raw);
  if (!m) return null;
  const magnitude = Number(m[2]);
  return m[1] === '-' ? -magnitude : magnitude;
}

export function tokenizeLine(text: string, line: number): Token[] {
  const src = stripComment(text);
  const tokens: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const c = src[i] ?? '';
    const column = i + 1;
    if (/\s/.test(c)) { i++; continue; }
    if (c === ',' || c === ':') {
      tokens.push({ type: c === ',' ? 'comma' : 'colon', value: c, line, column, raw: c });
      i++;
      continue;
    }
    if (c === '"') {
      const { literal, end } = readString(src, i + 1, line);
      tokens.push({ type: 'string', value: literal, line, column, raw: src.slice(i, end) });
      i = end;
      continue;
    }
    if (c === '$' || c === '.') {
      const end = readWord(src, i + 1);
      const raw = src.slice(i, end);
      if (c === '$') tokens.push({ type: 'register', value: raw.slice(1).toLowerCase(), line, column, raw });
      else tokens.push({ type: 'directive', value: raw.toLowerCase(), line, column, raw });
      i = end;
      continue;
    }
    if (/[0-9-]/.test(c)) {
      const end = readWord(src, i + 1);
      const raw = src.slice(i, end);
      const value = parseNumber(raw);
      if (value === null) throw new AssemblyError(`Invalid number '${raw}'`, line);
      tokens.push({ type: 'number', value, line, column, raw });
      i = end;
      continue;
    }
    if (/[A-Za-z_]/.test(c)) {
      const end = readWord(src, i);
      const raw = src.slice(i, end);
      tokens.push({ type: 'identifier', value: raw, line, column, raw });
      i = end;
      continue;
    }
    throw new AssemblyError(`Unexpected character '${c}' at column ${column}`, line);
  }
  return tokens;
}

export function tokenize(source: string): LexedLine[] {
  return source.split(/\r?\n/).map((text, index) => ({ line: index + 1, tokens: tokenizeLine(text, index + 1) }));
}
