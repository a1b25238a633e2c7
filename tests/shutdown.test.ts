import { describe, it, expect, vi } from 'vitest';
import { createChildLogger } from '../src/logger.js';
import { createShutdown } from '../src/shutdown.js';

const log = createChildLogger('test');

describe('createShutdown', () => {
  it('stops the task, closes the server and exits with 0', async () => {
    const task = { stop: vi.fn() };
    const server = { close: vi.fn().mockResolvedValue(undefined) };
    const exit = vi.fn();

    await createShutdown(task, server, log, exit)('SIGTERM');

    expect(task.stop).toHaveBeenCalledOnce();
    expect(server.close).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('exits with 1 when the server fails to close', async () => {
    const server = { close: vi.fn().mockRejectedValue(new Error('still busy')) };
    const exit = vi.fn();

    await createShutdown({ stop: vi.fn() }, server, log, exit)('SIGINT');

    expect(exit).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(1);
  });
});
