import { describe, it, expect, vi, afterEach } from 'vitest';
import net from 'net';

// Mock logger
vi.mock('../utils/logger.js', () => ({
  createModuleLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { parsePortAnswer, probePort, resolveLocalEndpoint } from '../utils/port-detect.js';

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address && typeof address === 'object') resolve(address.port);
      else reject(new Error('server has no port'));
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise(resolve => server.close(() => resolve()));
}

describe('probePort', () => {
  let server: net.Server | null = null;

  afterEach(async () => {
    if (server?.listening) await close(server);
    server = null;
  });

  it('detects a listening port', async () => {
    server = net.createServer(socket => socket.end());
    const port = await listen(server);

    expect(await probePort(port)).toBe(true);
  });

  it('reports a closed port', async () => {
    server = net.createServer();
    const port = await listen(server);
    await close(server);

    expect(await probePort(port)).toBe(false);
  });
});

describe('parsePortAnswer', () => {
  it('uses the default for an empty answer', () => {
    expect(parsePortAnswer('', 8080)).toBe(8080);
    expect(parsePortAnswer('   ', 8080)).toBe(8080);
  });

  it('accepts a valid port', () => {
    expect(parsePortAnswer(' 9000 ', 8080)).toBe(9000);
  });

  it('falls back to the default for garbage', () => {
    expect(parsePortAnswer('abc', 8080)).toBe(8080);
    expect(parsePortAnswer('70000', 8080)).toBe(8080);
  });
});

describe('resolveLocalEndpoint', () => {
  it('uses an explicit LOCAL_RPC_URL without probing', async () => {
    const probe = vi.fn(async () => true);

    const endpoint = await resolveLocalEndpoint({ localRpcUrl: 'http://node.test:9999', localRpcPort: 8080 }, { probe });

    expect(endpoint).toBe('http://node.test:9999');
    expect(probe).not.toHaveBeenCalled();
  });

  it('uses the default port when something is listening there', async () => {
    const prompt = vi.fn(async () => '9000');

    const endpoint = await resolveLocalEndpoint(
      { localRpcUrl: null, localRpcPort: 8080 },
      { probe: async () => true, prompt, interactive: true },
    );

    expect(endpoint).toBe('http://localhost:8080');
    expect(prompt).not.toHaveBeenCalled();
  });

  it('asks for a port on a terminal when nothing is listening', async () => {
    const endpoint = await resolveLocalEndpoint(
      { localRpcUrl: null, localRpcPort: 8080 },
      { probe: async () => false, prompt: async () => '9000', interactive: true },
    );

    expect(endpoint).toBe('http://localhost:9000');
  });

  it('keeps the default port when not interactive', async () => {
    const prompt = vi.fn(async () => '9000');

    const endpoint = await resolveLocalEndpoint(
      { localRpcUrl: null, localRpcPort: 8080 },
      { probe: async () => false, prompt, interactive: false },
    );

    expect(endpoint).toBe('http://localhost:8080');
    expect(prompt).not.toHaveBeenCalled();
  });

  it('hands the abort signal to the prompt', async () => {
    const controller = new AbortController();
    const prompt = vi.fn(async () => '');

    await resolveLocalEndpoint(
      { localRpcUrl: null, localRpcPort: 8080 },
      { probe: async () => false, prompt, interactive: true, signal: controller.signal },
    );

    expect(prompt).toHaveBeenCalledWith(8080, controller.signal);
  });

  it('rejects with an AbortError when Ctrl+C interrupts the prompt', async () => {
    const prompt = async () => {
      throw Object.assign(new Error('Aborted with Ctrl+C'), { name: 'AbortError' });
    };

    const pending = resolveLocalEndpoint(
      { localRpcUrl: null, localRpcPort: 8080 },
      { probe: async () => false, prompt, interactive: true },
    );

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});
