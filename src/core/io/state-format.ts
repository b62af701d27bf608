import type { Address, Word } from '@core/cpu/types';
import type { Breakpoint } from '@core/debug/breakpoints';
import { ARCH_MAXVAL, MEMORY_SIZE } from '@core/arch/constants';

// Saved emulator state, line by line:
//   total cycles
//   acc
//   pc
//   memory[0] .. memory[MEMORY_SIZE-1], one per line
//   "<address> <name>" per breakpoint, until end of text
export interface EmulatorSnapshot {
  totalCycles: number;
  acc: Word;
  pc: Address;
  memory: number[];
  breakpoints: Breakpoint[];
}

const HEADER_LINES = 3;

// Header lines only need to start with a number; memory lines must hold nothing else
const LEADING_INT = /^\s*([+-]?\d+)/;
const WHOLE_INT = /^\s*([+-]?\d+)\s*$/;
const INT_TOKEN = /^[+-]?\d+$/;

function readInt(line: string | undefined, re: RegExp): number | null {
  if (line === undefined) return null;
  const m = re.exec(line);
  if (!m) return null;
  const v = Number.parseInt(m[1], 10);
  // + 0 folds a parsed "-0" into 0
  return Number.isSafeInteger(v) ? v + 0 : null;
}

const inRange = (v: number | null, lo: number, hi: number): v is number => v !== null && v >= lo && v <= hi;

/**
 * Parse saved state text. Checks syntax and value ranges only; breakpoint
 * uniqueness and capacity are enforced when the snapshot is restored.
 * Returns null on the first malformed or out-of-range entry.
 */
export function parseState(text: string): EmulatorSnapshot | null {
  const lines = text.split(/\r?\n/);

  const totalCycles = readInt(lines[0], LEADING_INT);
  if (!inRange(totalCycles, 0, Number.MAX_SAFE_INTEGER)) return null;
  const acc = readInt(lines[1], LEADING_INT);
  if (!inRange(acc, 0, ARCH_MAXVAL)) return null;
  const pc = readInt(lines[2], LEADING_INT);
  if (!inRange(pc, 0, MEMORY_SIZE - 1)) return null;

  const memory: number[] = [];
  for (let offset = 0; offset < MEMORY_SIZE; offset++) {
    const v = readInt(lines[HEADER_LINES + offset], WHOLE_INT);
    if (!inRange(v, 0, ARCH_MAXVAL)) return null;
    memory.push(v);
  }

  const rest = lines.slice(HEADER_LINES + MEMORY_SIZE).join('\n');
  const tokens = rest.split(/\s+/).filter((t) => t.length > 0);
  const breakpoints: Breakpoint[] = [];
  for (let i = 0; i < tokens.length; i += 2) {
    const addrTok = tokens[i];
    const name: string | undefined = tokens[i + 1];
    if (!INT_TOKEN.test(addrTok) || name === undefined) return null;
    const address = Number.parseInt(addrTok, 10);
    if (!inRange(address, 0, MEMORY_SIZE - 1)) return null;
    breakpoints.push({ address, name });
  }

  return { totalCycles, acc, pc, memory, breakpoints };
}

export function formatState(snap: EmulatorSnapshot): string {
  const out: string[] = [String(snap.totalCycles), String(snap.acc), String(snap.pc)];
  for (const v of snap.memory) out.push(String(v));
  for (const bp of snap.breakpoints) out.push(`${bp.address} ${bp.name}`);
  return out.join('\n') + '\n';
}
