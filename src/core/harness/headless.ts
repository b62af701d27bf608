import type { Address, Word } from '@core/cpu/types';
import type { HaltReason } from '@core/system/emulator';
import { Emulator } from '@core/system/emulator';
import { DEFAULT_CONFIG } from '@core/config';

export interface RunImageResult {
  cycles: number;
  reason: HaltReason | 'bad-image';
  acc: Word;
  pc: Address;
}

export interface RunImageOptions {
  maxSteps: number;
  breakpoints?: Array<{ address: Address; name: string }>;
  acc?: Word; // starting accumulator, default 0
  pc?: Address; // starting PC, default 0
}

// Load a memory image at 0, arm breakpoints and run it without any host attached
export function runImage(bytes: ArrayLike<number>, opts: RunImageOptions): RunImageResult {
  const emu = new Emulator(DEFAULT_CONFIG);
  const done = (reason: RunImageResult['reason']): RunImageResult =>
    ({ cycles: emu.cycles(), reason, acc: emu.readAcc(), pc: emu.readPc() });

  if (!emu.loadProgram(bytes)) return done('bad-image');
  // restore() range-checks the registers and rejects the whole start state if either is off
  const start = { ...emu.snapshot(), acc: opts.acc ?? 0, pc: opts.pc ?? 0 };
  if (!emu.restore(start)) return done('bad-image');
  for (const bp of opts.breakpoints ?? []) {
    if (!emu.insertBreakpoint(bp.address, bp.name)) return done('bad-image');
  }
  return done(emu.run(opts.maxSteps).reason);
}
