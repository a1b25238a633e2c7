import type { FastifyInstance } from 'fastify';
import type { SignalStateStore } from './signals/SignalState.js';

export interface StatusInfo {
  exchange: string;
  timeframe: string;
  symbols: string[];
  startedAt: number;
}

export function registerStatusRoutes(server: FastifyInstance, states: SignalStateStore, info: StatusInfo) {
  server.get('/health', async () => {
    return { status: 'ok' };
  });

  server.get('/state', async () => {
    return {
      exchange: info.exchange,
      timeframe: info.timeframe,
      symbols: info.symbols,
      startedAt: new Date(info.startedAt).toISOString(),
      states: states.entries().map((entry) => ({
        symbol: entry.symbol,
        lastDirection: entry.lastDirection,
        lastFiredAt: entry.lastFiredAt === null ? null : new Date(entry.lastFiredAt).toISOString(),
      })),
    };
  });
}
