import type { Address } from '@core/cpu/types';
import { ARCH_BITMASK, MAX_INSTRUCTIONS } from '@core/arch/constants';

export interface Breakpoint {
  readonly address: Address;
  readonly name: string;
}

// Names are stored whitespace-separated in saved state, so they must be a single token
const NAME_RE = /^\S+$/;

/**
 * Ordered, capacity-bounded set of named breakpoints.
 * No two entries share an address, and no two share a name.
 * Deleting an entry shifts the later ones down; insertion order is otherwise kept.
 */
export class BreakpointTable {
  private items: Breakpoint[] = [];

  insert(address: Address, name: string): boolean {
    if (this.items.length >= MAX_INSTRUCTIONS) return false;
    if (!NAME_RE.test(name)) return false;
    const addr = address & ARCH_BITMASK;
    if (this.indexOfAddress(addr) >= 0) return false;
    if (this.indexOfName(name) >= 0) return false;
    this.items.push(Object.freeze({ address: addr, name }));
    return true;
  }

  indexOfAddress(address: Address): number {
    const addr = address & ARCH_BITMASK;
    return this.items.findIndex((bp) => bp.address === addr);
  }

  indexOfName(name: string): number {
    return this.items.findIndex((bp) => bp.name === name);
  }

  findByAddress(address: Address): Breakpoint | undefined {
    const idx = this.indexOfAddress(address);
    return idx >= 0 ? this.items[idx] : undefined;
  }

  findByName(name: string): Breakpoint | undefined {
    const idx = this.indexOfName(name);
    return idx >= 0 ? this.items[idx] : undefined;
  }

  deleteByAddress(address: Address): boolean {
    return this.removeAt(this.indexOfAddress(address));
  }

  deleteByName(name: string): boolean {
    return this.removeAt(this.indexOfName(name));
  }

  count(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }

  entries(): readonly Breakpoint[] {
    return this.items.slice();
  }

  // Entries are frozen, so sharing them between copies is safe
  clone(): BreakpointTable {
    const copy = new BreakpointTable();
    copy.items = this.items.slice();
    return copy;
  }

  private removeAt(idx: number): boolean {
    if (idx < 0) return false;
    this.items.splice(idx, 1);
    return true;
  }
}
