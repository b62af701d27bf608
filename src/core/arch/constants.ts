// Machine architecture. Fixed at build time; every stored value is masked to ARCH_BITS.

export const ARCH_BITS = 8;
export const ARCH_BITMASK = (1 << ARCH_BITS) - 1; // 0xFF
export const ARCH_MAXVAL = ARCH_BITMASK;

// One cell per address, so a masked PC always indexes into memory
export const MEMORY_SIZE = 1 << ARCH_BITS;

// opcode word + operand word
export const INSTRUCTION_SIZE = 2;

// Upper bound on distinct instruction addresses (and on breakpoints)
export const MAX_INSTRUCTIONS = MEMORY_SIZE / INSTRUCTION_SIZE;
