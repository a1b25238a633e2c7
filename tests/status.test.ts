import fastify from 'fastify';
import { afterAll, describe, it, expect } from 'vitest';
import { SignalStateStore } from '../src/signals/SignalState.js';
import { registerStatusRoutes } from '../src/status.js';

describe('status routes', () => {
  const server = fastify();
  const states = new SignalStateStore();
  registerStatusRoutes(server, states, {
    exchange: 'binance',
    timeframe: '5m',
    symbols: ['BTC/USDT', 'ETH/USDT'],
    startedAt: Date.UTC(2024, 0, 1),
  });

  afterAll(async () => {
    await server.close();
  });

  it('answers the health check', async () => {
    const res = await server.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('reports per-symbol signal state', async () => {
    const btc = states.get('BTC/USDT');
    btc.lastDirection = 'BULLISH';
    btc.lastFiredAt = Date.UTC(2024, 0, 2, 12, 5);
    states.get('ETH/USDT');

    const res = await server.inject({ method: 'GET', url: '/state' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      exchange: 'binance',
      timeframe: '5m',
      symbols: ['BTC/USDT', 'ETH/USDT'],
      startedAt: '2024-01-01T00:00:00.000Z',
      states: [
        { symbol: 'BTC/USDT', lastDirection: 'BULLISH', lastFiredAt: '2024-01-02T12:05:00.000Z' },
        { symbol: 'ETH/USDT', lastDirection: 'NONE', lastFiredAt: null },
      ],
    });
  });
});
