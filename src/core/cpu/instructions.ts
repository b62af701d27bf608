import type { Address, InstructionData, ProcessorState } from './types';
import { ARCH_BITMASK, INSTRUCTION_SIZE } from '@core/arch/constants';

export const Opcode = {
  ADD: 0,
  AND: 1,
  ORR: 2,
  XOR: 3,
  LDR: 4,
  STR: 5,
  JMP: 6,
  JNE: 7,
} as const;

export type Mnemonic = keyof typeof Opcode;

export interface Instruction {
  readonly op: Mnemonic;
  readonly address: Address;
}

const BY_OPCODE: readonly Mnemonic[] = ['ADD', 'AND', 'ORR', 'XOR', 'LDR', 'STR', 'JMP', 'JNE'];

function assertNever(op: never): never {
  throw new Error(`unhandled instruction: ${String(op)}`);
}

/**
 * Turn a fetched (opcode, address) pair into an instruction.
 * Returns null for any opcode outside the table.
 */
export function decode(data: InstructionData): Instruction | null {
  const op: Mnemonic | undefined = BY_OPCODE[data.opcode];
  if (op === undefined) return null;
  return Object.freeze({ op, address: data.address & ARCH_BITMASK });
}

export function encode(op: Mnemonic, address: Address): [number, number] {
  return [Opcode[op], address & ARCH_BITMASK];
}

/**
 * Apply one instruction to the processor state, then advance PC and mask
 * ACC/PC to the word width. Jumps land exactly on their operand.
 */
export function execute(instr: Instruction, state: ProcessorState): void {
  const a = instr.address;
  const mem = state.memory;
  let next = state.pc + INSTRUCTION_SIZE;

  switch (instr.op) {
    case 'ADD': state.acc = state.acc + mem[a]; break;
    case 'AND': state.acc = state.acc & mem[a]; break;
    case 'ORR': state.acc = state.acc | mem[a]; break;
    case 'XOR': state.acc = state.acc ^ mem[a]; break;
    case 'LDR': state.acc = mem[a]; break;
    case 'STR': mem[a] = state.acc & ARCH_BITMASK; break;
    case 'JMP': next = a; break;
    case 'JNE':
      if (state.acc !== 0) next = a;
      break;
    default: assertNever(instr.op);
  }

  state.pc = next & ARCH_BITMASK;
  state.acc &= ARCH_BITMASK;
}

export function instructionToString(instr: Instruction): string {
  const a = instr.address;
  switch (instr.op) {
    case 'ADD': return `ADD: ACC <- ACC + [${a}]`;
    case 'AND': return `AND: ACC <- ACC & [${a}]`;
    case 'ORR': return `ORR: ACC <- ACC | [${a}]`;
    case 'XOR': return `XOR: ACC <- ACC ^ [${a}]`;
    case 'LDR': return `LDR: ACC <- [${a}]`;
    case 'STR': return `STR: ACC -> [${a}]`;
    case 'JMP': return `JMP: PC  <- ${a}`;
    case 'JNE': return `JNE: PC  <- ${a} if ACC != 0`;
    default: return assertNever(instr.op);
  }
}
