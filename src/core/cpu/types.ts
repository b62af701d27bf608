export type Word = number; // 0..ARCH_MAXVAL
export type Address = number; // 0..MEMORY_SIZE-1

export interface ProcessorState {
  acc: Word;
  pc: Address; // instructions live on even addresses
  memory: Uint8Array;
}

// Raw instruction as fetched from memory, before decoding
export interface InstructionData {
  opcode: Word;
  address: Address;
}
