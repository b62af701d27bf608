import type { Address, Word } from '@core/cpu/types';
import type { Instruction } from '@core/cpu/instructions';
import { decode, instructionToString } from '@core/cpu/instructions';
import { INSTRUCTION_SIZE, MEMORY_SIZE } from '@core/arch/constants';

export type ReadWordFn = (addr: Address) => Word;

export interface DisasmResult {
  opcode: Word;
  address: Address;
  instruction: Instruction | null;
  text: string | null; // null for unknown opcodes and the empty (0, 0) cell
}

export function disasmAt(read: ReadWordFn, offset: Address): DisasmResult {
  const opcode = read(offset);
  const address = read(offset + 1);
  const instruction = decode({ opcode, address });
  const empty = opcode === 0 && address === 0;
  const text = instruction && !empty ? instructionToString(instruction) : null;
  return { opcode, address, instruction, text };
}

// "<offset>:\t<opcode>\t<address>" plus "\t:\t<mnemonic>" when there is one
export function formatListingLine(offset: Address, res: DisasmResult): string {
  const left = `${offset}:\t${res.opcode}\t${res.address}`;
  return res.text === null ? left : `${left}\t:\t${res.text}`;
}

export function listProgram(read: ReadWordFn): string[] {
  const lines: string[] = [];
  for (let offset = 0; offset < MEMORY_SIZE; offset += INSTRUCTION_SIZE) {
    lines.push(formatListingLine(offset, disasmAt(read, offset)));
  }
  return lines;
}
