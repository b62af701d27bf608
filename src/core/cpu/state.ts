import type { InstructionData, ProcessorState } from './types';
import { MEMORY_SIZE } from '@core/arch/constants';

export function createProcessorState(): ProcessorState {
  return { acc: 0, pc: 0, memory: new Uint8Array(MEMORY_SIZE) };
}

export function cloneProcessorState(state: ProcessorState): ProcessorState {
  return { acc: state.acc, pc: state.pc, memory: state.memory.slice() };
}

// Reads the (opcode, address) pair at PC. Alignment is the caller's concern.
export function fetch(state: ProcessorState): InstructionData {
  const pc = state.pc;
  if (pc < 0 || pc + 1 >= MEMORY_SIZE) {
    throw new RangeError(`fetch out of range: pc=${pc}`);
  }
  return { opcode: state.memory[pc], address: state.memory[pc + 1] };
}
