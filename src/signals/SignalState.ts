import type { SymbolSignalState } from './SignalDetector.js';

export function initialSignalState(): SymbolSignalState {
  return { lastDirection: 'NONE', lastFiredAt: null };
}

/**
 * In-memory signal state per symbol. Each entry is handed to exactly one
 * detector call at a time; nothing is shared between symbols.
 */
export class SignalStateStore {
  private readonly states = new Map<string, SymbolSignalState>();

  get(symbol: string): SymbolSignalState {
    let state = this.states.get(symbol);
    if (!state) {
      state = initialSignalState();
      this.states.set(symbol, state);
    }
    return state;
  }

  has(symbol: string): boolean {
    return this.states.has(symbol);
  }

  get size(): number {
    return this.states.size;
  }

  entries(): Array<{ symbol: string } & Readonly<SymbolSignalState>> {
    return [...this.states].map(([symbol, state]) => ({ symbol, ...state }));
  }
}
