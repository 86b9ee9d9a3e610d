import { describe, it, expect } from 'vitest';
import { assemble } from '../src/asm/assembler.js';
import { AssemblyError } from '../src/asm/errors.js';
import { disassemble } from '../src/cpu/disasm.js';
import { initialize } from '../src/cpu/state.js';
import { run } from '../src/system/run_loop.js';
import { readU32BE } from '../src/utils/bit.js';
import {
  ADD, ADDI, ADDIU, BNE, DIV, J, JALR, MFHI, SLL, SLT, SUB, SYSCALL,
} from './helpers/test_utils.js';

function words(image: Uint8Array): number[] {
  const out: number[] = [];
  for (let i = 0; i + 4 <= image.length; i += 4) out.push(readU32BE(image, i));
  return out;
}

function assembleAndRun(source: string) {
  const asm = assemble(source);
  const state = initialize(asm.image);
  const outcome = run(state, { log: () => {} });
  return { asm, state, outcome };
}

describe('assemble', () => {
  it('encodes native instructions into big-endian words', () => {
    const { image, textSize, dataSize } = assemble(`
main:   addi $v0, $zero, 3
        addi $v1, $zero, 7
        add  $v0, $v0, $v1     # 10 doubles as the exit selector
        syscall
`);
    expect(Array.from(image)).toEqual([
      0x20, 0x02, 0x00, 0x03,
      0x20, 0x03, 0x00, 0x07,
      0x00, 0x43, 0x10, 0x20,
      0x00, 0x00, 0x00, 0x0c,
    ]);
    expect(textSize).toBe(16);
    expect(dataSize).toBe(0);
  });

  it('resolves backward branch labels and runs the loop', () => {
    const { asm, state, outcome } = assembleAndRun(`
        li   $t0, 5
        li   $t1, 0
loop:   add  $t1, $t1, $t0
        addi $t0, $t0, -1
        bne  $t0, $zero, loop
        li   $v0, 10
        syscall
`);
    expect(asm.symbols.get('loop')).toBe(8);
    expect(words(asm.image)[4]).toBe(BNE(8, 0, 0xfffd));
    expect(outcome).toEqual({ kind: 'success', steps: 19 });
    expect(state.regs[9]).toBe(15);
    expect(state.regs[8]).toBe(0);
  });

  it('expands pseudo-ops and lays data out after the text', () => {
    const { asm, state, outcome } = assembleAndRun(`
        .text
main:   li    $t0, 17
        rem   $t1, $t0, 5
        remu  $t2, $t0, $t1
        neg   $t3, $t0
        move  $t4, $t3
        la    $t5, message
        li    $t6, 0x12345678
        blt   $t0, 20, small
        li    $t7, 99
small:  b     done
        li    $t7, 98
done:   li    $v0, 10
        syscall
        .data
message: .asciiz "hi"
`);
    expect(asm.textSize).toBe(80);
    expect(asm.dataSize).toBe(3);
    expect(Object.fromEntries(asm.symbols)).toEqual({ main: 0, small: 64, done: 72, message: 80 });
    expect(Array.from(asm.image.slice(80))).toEqual([0x68, 0x69, 0x00]);
    expect(outcome).toEqual({ kind: 'success', steps: 18 });
    expect(Array.from(state.regs.slice(8, 16))).toEqual([17, 2, 1, -17, -17, 80, 0x12345678, 0]);
    expect(state.regs[1]).toBe(1);
  });

  it('picks the shortest li sequence for the value', () => {
    expect(words(assemble('li $t0, 0xffff').image)).toEqual([ADDIU(8, 0, 0xffff)]);
    expect(words(assemble('li $t0, -2').image)).toEqual([ADDI(8, 0, 0xfffe)]);
    expect(words(assemble('li $t0, 0x80000000').image)).toEqual([ADDIU(8, 0, 0x8000), SLL(8, 8, 16)]);
    expect(words(assemble('li $t0, 100000').image)).toEqual([ADDIU(8, 0, 1), SLL(8, 8, 16), ADDIU(8, 8, 0x86a0)]);
  });

  it('stages an immediate third operand through $at', () => {
    expect(words(assemble('add $t0, $t1, 12').image)).toEqual([ADDIU(1, 0, 12), ADD(8, 9, 1)]);
    expect(words(assemble('rem $t0, $t1, $t2').image)).toEqual([DIV(9, 10), MFHI(8)]);
    expect(words(assemble('neg $t0, $t1').image)).toEqual([SUB(8, 0, 9)]);
  });

  it('expands blt into slt and bne on $at', () => {
    expect(words(assemble('top: blt $t0, $t1, top').image)).toEqual([SLT(1, 8, 9), BNE(1, 0, 0xfffe)]);
  });

  it('links jalr into $ra when rd is left out', () => {
    expect(words(assemble('jalr $t9\njalr $s0, $t9').image)).toEqual([JALR(31, 25), JALR(16, 25)]);
  });

  it('treats numeric jump and branch targets as absolute addresses', () => {
    expect(words(assemble('j 0x400\nb 0x400').image)).toEqual([J(0x100), J(0x100)]);
    expect(words(assemble('nop\nbne $t0, $zero, 0x0').image)).toEqual([0, BNE(8, 0, 0xfffe)]);
  });

  it('emits data directives big-endian', () => {
    const asm = assemble(`
        .data
bytes:  .byte 1, -1
halfs:  .half 0x1234
words:  .word 7, bytes
str:    .ascii "a#b\\n"
`);
    expect(Array.from(asm.image)).toEqual([
      0x01, 0xff, 0x12, 0x34,
      0x00, 0x00, 0x00, 0x07,
      0x00, 0x00, 0x00, 0x00,
      0x61, 0x23, 0x62, 0x0a,
    ]);
    expect(Object.fromEntries(asm.symbols)).toEqual({ bytes: 0, halfs: 2, words: 4, str: 12 });
  });

  it('offsets data labels by the text size', () => {
    const asm = assemble('  syscall\n  .data\nx: .word x');
    expect(words(asm.image)).toEqual([SYSCALL(), 4]);
  });

  it('round-trips through the disassembler', () => {
    const first = assemble(`
start:  addi  $t0, $zero, -3
        addiu $sp, $sp, 65528
        slti  $t1, $t0, 0
        sltiu $t2, $t0, 7
        andi  $t3, $t0, 0xff
        ori   $t3, $t3, 0x100
        xori  $t3, $t3, 0xf
        sll   $t4, $t3, 2
        srl   $t5, $t4, 1
        sra   $t6, $t4, 1
        sllv  $t4, $t3, $t1
        mult  $t0, $t1
        mflo  $t7
        mthi  $t7
        jalr  $ra, $t9
        jr    $ra
        beq   $t0, $t1, start
        bgtz  $t0, end
        jal   start
        nop
        .word 0xfc000000
end:    syscall
`).image;
    const listing = words(first).map((w, i) => disassemble(w, i * 4));
    expect(listing[16]).toBe('beq $t0, $t1, 0x0');
    expect(listing[17]).toBe('bgtz $t0, 0x54');
    expect(listing[20]).toBe('.word 0xfc000000');
    expect(assemble(listing.join('\n')).image).toEqual(first);
  });
});

describe('assemble errors', () => {
  it.each([
    ['  j nowhere', "Undefined label 'nowhere' (line 1)"],
    ['  li $t0, 1\n  beq $t0, $zero, missing', "Undefined label 'missing' (line 2)"],
    ['  la $t0, nothing', "Undefined label 'nothing' (line 1)"],
    ['  .data\nw: .word later', "Undefined label 'later' (line 2)"],
    ['a:\na: nop', "Duplicate label 'a' (line 2)"],
    ['  frob $t0', "Unknown instruction 'frob' (line 1)"],
    ['  add $t0, $t1, $bogus', "Unknown register '$bogus' (line 1)"],
    ['  add $t0, $t1', "'add' expects 3 operands, got 2 (line 1)"],
    ['  addi $t0, $t0, 70000', "Immediate 70000 out of range for 'addi' (line 1)"],
    ['  sll $t0, $t1, 32', "Immediate 32 out of range for 'sll' (line 1)"],
    ['  addi 5, $t0, 1', "Operand 1 of 'addi' must be a register (line 1)"],
    ['  .data\n  add $t0, $t0, $t0', "Instruction 'add' is only valid in .text (line 2)"],
    ['  .byte 1', 'Directive .byte is only allowed in .data (line 1)'],
    ['  .data\n  .byte 256', 'Value 256 out of range for .byte (line 2)'],
    ['  .space 4', 'Unknown directive .space (line 1)'],
  ])('rejects %j', (source, message) => {
    expect(() => assemble(source)).toThrow(message);
  });

  it('throws AssemblyError carrying the line', () => {
    let caught: unknown;
    try {
      assemble('nop\n\n  j nowhere');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(AssemblyError);
    expect(caught instanceof AssemblyError && caught.line).toBe(3);
    expect(caught instanceof AssemblyError && caught.detail).toBe("Undefined label 'nowhere'");
  });
});
