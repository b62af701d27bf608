import { describe, it, expect } from 'vitest';
import { formatState, parseState } from '@core/io/state-format';
import type { EmulatorSnapshot } from '@core/io/state-format';
import { Emulator } from '@core/system/emulator';
import { DEFAULT_CONFIG } from '@core/config';
import { MEMORY_SIZE } from '@core/arch/constants';

function memoryLines(fill: (i: number) => string = () => '0'): string[] {
  return Array.from({ length: MEMORY_SIZE }, (_, i) => fill(i));
}

function stateText(header: string[], memory: string[], tail: string[] = []): string {
  return [...header, ...memory, ...tail].join('\n') + '\n';
}

describe('formatState', () => {
  it('writes header, memory and breakpoints one per line', () => {
    const memory = new Array<number>(MEMORY_SIZE).fill(0);
    memory[0] = 4; memory[1] = 9;
    const snap: EmulatorSnapshot = {
      totalCycles: 12, acc: 7, pc: 2, memory,
      breakpoints: [{ address: 6, name: 'loop' }, { address: 0, name: 'top' }],
    };
    const lines = formatState(snap).split('\n');
    expect(lines.slice(0, 5)).toEqual(['12', '7', '2', '4', '9']);
    expect(lines.length).toBe(3 + MEMORY_SIZE + 2 + 1);
    expect(lines.slice(-3)).toEqual(['6 loop', '0 top', '']);
  });
});

describe('parseState', () => {
  it('reads a well-formed state', () => {
    const text = stateText(['3', '200', '10'], memoryLines((i) => String(i % 7)), ['4 a', '8 b']);
    const snap = parseState(text);
    expect(snap).not.toBeNull();
    expect(snap?.totalCycles).toBe(3);
    expect(snap?.acc).toBe(200);
    expect(snap?.pc).toBe(10);
    expect(snap?.memory[13]).toBe(6);
    expect(snap?.breakpoints).toEqual([{ address: 4, name: 'a' }, { address: 8, name: 'b' }]);
  });

  it('accepts CRLF line endings and breakpoint pairs split across whitespace', () => {
    const text = ['0', '0', '0', ...memoryLines(), '4', 'a   6 b'].join('\r\n');
    expect(parseState(text)?.breakpoints).toEqual([{ address: 4, name: 'a' }, { address: 6, name: 'b' }]);
  });

  it('ignores trailing text on header lines', () => {
    const snap = parseState(stateText(['5 cycles', '1 acc', '2 pc'], memoryLines()));
    expect(snap?.totalCycles).toBe(5);
    expect(snap?.acc).toBe(1);
    expect(snap?.pc).toBe(2);
  });

  it('rejects out-of-range header values', () => {
    expect(parseState(stateText(['-1', '0', '0'], memoryLines()))).toBeNull();
    expect(parseState(stateText(['0', '256', '0'], memoryLines()))).toBeNull();
    expect(parseState(stateText(['0', '0', '256'], memoryLines()))).toBeNull();
    expect(parseState(stateText(['', '0', '0'], memoryLines()))).toBeNull();
    expect(parseState(stateText(['x', '0', '0'], memoryLines()))).toBeNull();
  });

  it('rejects bad memory lines', () => {
    expect(parseState(stateText(['0', '0', '0'], memoryLines((i) => (i === 5 ? '256' : '0'))))).toBeNull();
    expect(parseState(stateText(['0', '0', '0'], memoryLines((i) => (i === 5 ? '1 2' : '0'))))).toBeNull();
    expect(parseState(stateText(['0', '0', '0'], memoryLines((i) => (i === 5 ? '' : '0'))))).toBeNull();
    expect(parseState(stateText(['0', '0', '0'], memoryLines((i) => (i === 5 ? 'x' : '0'))))).toBeNull();
  });

  it('rejects missing memory lines', () => {
    expect(parseState(stateText(['0', '0', '0'], memoryLines().slice(1)))).toBeNull();
    expect(parseState('0\n0\n0\n')).toBeNull();
  });

  it('rejects malformed breakpoints', () => {
    const base = ['0', '0', '0'];
    expect(parseState(stateText(base, memoryLines(), ['256 far']))).toBeNull();
    expect(parseState(stateText(base, memoryLines(), ['-2 neg']))).toBeNull();
    expect(parseState(stateText(base, memoryLines(), ['x name']))).toBeNull();
    expect(parseState(stateText(base, memoryLines(), ['4']))).toBeNull();
  });
});

describe('Emulator save/load', () => {
  it('round-trips through text into a fresh emulator', () => {
    const src = new Emulator(DEFAULT_CONFIG);
    src.loadProgram([4, 20, 0, 20, 5, 21], 0);
    src.loadProgram([9], 20);
    src.insertBreakpoint(4, 'store');
    src.insertBreakpoint(30, 'never');
    src.run(10);

    const dst = new Emulator(DEFAULT_CONFIG);
    expect(dst.loadState(src.saveState())).toBe(true);
    expect(dst.readAcc()).toBe(src.readAcc());
    expect(dst.readPc()).toBe(src.readPc());
    expect(dst.cycles()).toBe(src.cycles());
    for (let a = 0; a < MEMORY_SIZE; a++) expect(dst.readMem(a)).toBe(src.readMem(a));
    expect(new Set(dst.breakpoints().map((b) => `${b.address} ${b.name}`)))
      .toEqual(new Set(['4 store', '30 never']));
  });

  it('replaces existing breakpoints on load', () => {
    const emu = new Emulator(DEFAULT_CONFIG);
    emu.insertBreakpoint(2, 'old');
    expect(emu.loadState(stateText(['0', '0', '0'], memoryLines(), ['6 new']))).toBe(true);
    expect(emu.breakpoints()).toEqual([{ address: 6, name: 'new' }]);
  });

  it('fails a load whose breakpoints collide', () => {
    const emu = new Emulator(DEFAULT_CONFIG);
    expect(emu.loadState(stateText(['0', '0', '0'], memoryLines(), ['4 a', '4 b']))).toBe(false);
    expect(emu.loadState(stateText(['0', '0', '0'], memoryLines(), ['4 a', '6 a']))).toBe(false);
  });

  it('fails a load with more breakpoints than instruction slots', () => {
    const tail = Array.from({ length: 129 }, (_, i) => `${i} bp${i}`);
    const emu = new Emulator(DEFAULT_CONFIG);
    expect(emu.loadState(stateText(['0', '0', '0'], memoryLines(), tail))).toBe(false);
  });
});

describe('signed zero in saved state', () => {
  it('loads "-0" as plain 0', () => {
    const emu = new Emulator(DEFAULT_CONFIG);
    expect(emu.loadState(stateText(['-0', '-0', '-0'], memoryLines(() => '-0'), ['-0 top']))).toBe(true);
    expect(Object.is(emu.readAcc(), 0)).toBe(true);
    expect(Object.is(emu.readPc(), 0)).toBe(true);
    expect(Object.is(emu.cycles(), 0)).toBe(true);
    expect(emu.saveState().split('\n').slice(0, 3)).toEqual(['0', '0', '0']);
    expect(emu.breakpoints()).toEqual([{ address: 0, name: 'top' }]);
  });

  it('restore folds -0 registers into 0', () => {
    const emu = new Emulator(DEFAULT_CONFIG);
    const snap = emu.snapshot();
    expect(emu.restore({ ...snap, acc: -0, pc: -0, totalCycles: -0 })).toBe(true);
    expect(Object.is(emu.readAcc(), 0)).toBe(true);
    expect(Object.is(emu.readPc(), 0)).toBe(true);
    expect(Object.is(emu.cycles(), 0)).toBe(true);
  });
});
