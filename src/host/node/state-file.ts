import fs from 'node:fs';
import type { Emulator } from '@core/system/emulator';

// File-backed persistence. I/O errors are reported as false, never thrown.

export function loadStateFile(emu: Emulator, filePath: string): boolean {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.warn(`[state-file] cannot read ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    return false;
  }
  return emu.loadState(text);
}

export function saveStateFile(emu: Emulator, filePath: string): boolean {
  try {
    fs.writeFileSync(filePath, emu.saveState(), 'utf8');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.warn(`[state-file] cannot write ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    return false;
  }
  return true;
}
