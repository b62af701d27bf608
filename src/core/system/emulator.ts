import type { Address, ProcessorState, Word } from '@core/cpu/types';
import type { Instruction } from '@core/cpu/instructions';
import type { Breakpoint } from '@core/debug/breakpoints';
import type { EmulatorSnapshot } from '@core/io/state-format';
import type { EmulatorConfig } from '@core/config';
import { cloneProcessorState, createProcessorState, fetch } from '@core/cpu/state';
import { decode, execute, instructionToString } from '@core/cpu/instructions';
import { BreakpointTable } from '@core/debug/breakpoints';
import { formatState, parseState } from '@core/io/state-format';
import { readEmulatorConfig } from '@core/config';
import { listProgram } from '@utils/disasm';
import { ARCH_BITMASK, ARCH_MAXVAL, MEMORY_SIZE } from '@core/arch/constants';

export type HaltReason = 'completed' | 'breakpoint' | 'misaligned-pc' | 'illegal-opcode';

export interface RunResult {
  ok: boolean; // false only for faults
  reason: HaltReason;
  executed: number; // instructions executed by this call
}

export type TraceHook = (pc: Address, instr: Instruction) => void;

// eslint-disable-next-line no-console
const defaultSink = (line: string) => console.log(line);

export class Emulator {
  private state: ProcessorState = createProcessorState();
  private table = new BreakpointTable();
  private totalCycles = 0;
  private traceHook: TraceHook | null = null;
  private traced = 0;

  constructor(private readonly config: EmulatorConfig = readEmulatorConfig()) {}

  // Optional per-instruction callback (after execution, with the PC it was fetched from)
  setTraceHook(fn: TraceHook | null) { this.traceHook = fn; }

  reset(): void {
    this.state = createProcessorState();
    this.table.clear();
    this.totalCycles = 0;
    this.traced = 0;
  }

  /**
   * Execute up to `steps` instructions.
   * Stops early on an odd PC or unknown opcode (fault), or when an executed
   * instruction leaves PC on a breakpoint. Breakpoints are never checked
   * before the first instruction.
   */
  run(steps: number): RunResult {
    let executed = 0;
    while (executed < steps) {
      if ((this.state.pc & 1) === 1) return { ok: false, reason: 'misaligned-pc', executed };

      const pc = this.state.pc;
      const instr = decode(fetch(this.state));
      if (!instr) return { ok: false, reason: 'illegal-opcode', executed };

      execute(instr, this.state);
      this.totalCycles++;
      executed++;
      this.onTrace(pc, instr);

      if (this.isBreakpoint()) return { ok: true, reason: 'breakpoint', executed };
    }
    return { ok: true, reason: 'completed', executed };
  }

  private onTrace(pc: Address, instr: Instruction) {
    if (this.traceHook) this.traceHook(pc, instr);
    if (this.config.trace && this.traced < this.config.traceLimit) {
      this.traced++;
      // eslint-disable-next-line no-console
      console.log(`[trace] pc=${pc} ${instructionToString(instr)} acc=${this.state.acc} cyc=${this.totalCycles}`);
    }
  }

  // ----- breakpoints

  insertBreakpoint(address: Address, name: string): boolean {
    return this.table.insert(address, name);
  }

  findBreakpoint(key: Address | string): Breakpoint | undefined {
    return typeof key === 'string' ? this.table.findByName(key) : this.table.findByAddress(key);
  }

  deleteBreakpoint(key: Address | string): boolean {
    return typeof key === 'string' ? this.table.deleteByName(key) : this.table.deleteByAddress(key);
  }

  numBreakpoints(): number { return this.table.count(); }

  breakpoints(): readonly Breakpoint[] { return this.table.entries(); }

  // ----- inspection

  cycles(): number { return this.totalCycles; }
  readAcc(): Word { return this.state.acc; }
  readPc(): Address { return this.state.pc; }
  readMem(address: Address): Word { return this.state.memory[address & ARCH_BITMASK]; }
  isZero(): boolean { return this.state.acc === 0; }
  isBreakpoint(): boolean { return this.table.indexOfAddress(this.state.pc) >= 0; }

  // ----- program image

  /** Copy words into memory starting at `offset`. Fails without writing if any word is out of range or the image overflows. */
  loadProgram(bytes: ArrayLike<number>, offset: Address = 0): boolean {
    if (!Number.isInteger(offset) || offset < 0 || offset + bytes.length > MEMORY_SIZE) return false;
    for (let i = 0; i < bytes.length; i++) {
      const v = bytes[i];
      if (!Number.isInteger(v) || v < 0 || v > ARCH_MAXVAL) return false;
    }
    this.state.memory.set(Array.from(bytes), offset);
    return true;
  }

  listProgram(): string[] {
    return listProgram((addr) => this.state.memory[addr]);
  }

  printProgram(write: (line: string) => void = defaultSink): boolean {
    for (const line of this.listProgram()) write(line);
    return true;
  }

  // ----- persistence

  snapshot(): EmulatorSnapshot {
    return {
      totalCycles: this.totalCycles,
      acc: this.state.acc,
      pc: this.state.pc,
      memory: Array.from(this.state.memory),
      breakpoints: this.table.entries().map((bp) => ({ address: bp.address, name: bp.name })),
    };
  }

  /**
   * Replace the whole machine state. The snapshot is validated first; on
   * failure nothing is changed and false is returned.
   */
  restore(snap: EmulatorSnapshot): boolean {
    const isWord = (v: number) => Number.isInteger(v) && v >= 0 && v <= ARCH_MAXVAL;
    if (!Number.isSafeInteger(snap.totalCycles) || snap.totalCycles < 0) return false;
    if (!isWord(snap.acc)) return false;
    if (!Number.isInteger(snap.pc) || snap.pc < 0 || snap.pc >= MEMORY_SIZE) return false;
    if (snap.memory.length !== MEMORY_SIZE || !snap.memory.every(isWord)) return false;

    const table = new BreakpointTable();
    for (const bp of snap.breakpoints) {
      if (!Number.isInteger(bp.address) || bp.address < 0 || bp.address >= MEMORY_SIZE) return false;
      if (!table.insert(bp.address, bp.name)) return false;
    }

    const state = createProcessorState();
    state.acc = snap.acc + 0;
    state.pc = snap.pc + 0;
    state.memory.set(snap.memory);
    this.state = state;
    this.table = table;
    this.totalCycles = snap.totalCycles + 0;
    return true;
  }

  saveState(): string {
    return formatState(this.snapshot());
  }

  loadState(text: string): boolean {
    const snap = parseState(text);
    return snap !== null && this.restore(snap);
  }

  clone(): Emulator {
    const copy = new Emulator(this.config);
    copy.state = cloneProcessorState(this.state);
    copy.table = this.table.clone();
    copy.totalCycles = this.totalCycles;
    copy.traceHook = this.traceHook;
    return copy;
  }
}
