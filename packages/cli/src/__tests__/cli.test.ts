/**
 * honeyport CLI Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { connect, createServer } from 'net';
import { EventCollector, loadLogFile, logFileName, verifyChain } from '@honeyport/trace';
import {
  createProgram,
  flagsLayer,
  formatEvent,
  runConfigCheck,
  runLogSummary,
  runLogVerify,
  runServe,
} from '../program.js';
import type { Output } from '../program.js';

const ANSI = /\u001b\[[0-9;]*m/g;

class CapturedOutput implements Output {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  log(message: string): void {
    this.lines.push(message.replace(ANSI, ''));
  }

  error(message: string): void {
    this.errors.push(message.replace(ANSI, ''));
  }
}

async function waitFor(condition: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('Timed out waiting for condition');
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

/**
 * Listen on an ephemeral port; the caller closes it.
 */
async function occupyPort(): Promise<{ port: number; close: () => Promise<void> }> {
  const server = createServer();
  await new Promise<void>(resolve => server.listen({ port: 0, host: '127.0.0.1' }, () => resolve()));
  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : 0;
  return { port, close: () => new Promise<void>(resolve => server.close(() => resolve())) };
}

/**
 * Connect, answer the banner with `reply`, return what the decoy sent.
 */
function exchange(port: number, reply: string): Promise<string> {
  return new Promise(resolve => {
    const chunks: Buffer[] = [];
    const socket = connect({ port, host: '127.0.0.1' });
    socket.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      if (chunks.length === 1) socket.write(reply);
    });
    socket.on('error', () => undefined);
    socket.on('close', () => resolve(Buffer.concat(chunks).toString('utf8')));
  });
}

describe('CLI Structure', () => {
  it('should define the top-level commands', () => {
    const program = createProgram(new CapturedOutput());
    expect(program.name()).toBe('honeyport');
    expect(program.commands.map(c => c.name())).toEqual(['serve', 'config', 'log']);
  });

  it('should define config and log subcommands', () => {
    const program = createProgram(new CapturedOutput());
    const sub = (name: string): string[] =>
      program.commands.find(c => c.name() === name)?.commands.map(c => c.name()) ?? [];

    expect(sub('config')).toEqual(['check']);
    expect(sub('log')).toEqual(['summary', 'verify']);
  });
});

describe('flagsLayer', () => {
  it('should leave file logging to other sources unless disabled', () => {
    expect(flagsLayer({ fileLog: true }).layer.fileLog).toBeUndefined();
    expect(flagsLayer({ fileLog: false }).layer.fileLog).toBe(false);
  });

  it('should decode banner flags', () => {
    const { layer, errors } = flagsLayer({ banner: ['2222=SSH-2.0-OpenSSH_8.9\\r\\n'] });

    expect(layer.banners).toEqual({ '2222': Buffer.from('SSH-2.0-OpenSSH_8.9\r\n') });
    expect(errors).toEqual([]);
  });

  it('should map timeout and connection limits', () => {
    const { layer } = flagsLayer({ ports: '22,23', timeout: '500', maxConnections: '4' });

    expect(layer.ports).toBe('22,23');
    expect(layer.connectionTimeoutMs).toBe('500');
    expect(layer.maxConnections).toBe('4');
    expect(layer.banners).toBeUndefined();
  });
});

describe('formatEvent', () => {
  it('should show the type and payload', async () => {
    const collector = new EventCollector({ flush_interval_ms: 0 });
    const event = collector.record('listener_started', { port: 22, host: '0.0.0.0' });
    await collector.close();

    const line = formatEvent(event).replace(ANSI, '');

    expect(line).toContain('info  listener_started');
    expect(line.endsWith('{"port":22,"host":"0.0.0.0"}')).toBe(true);
  });
});

describe('config check', () => {
  it('should fail when no port is valid', async () => {
    const out = new CapturedOutput();

    const code = await runConfigCheck({ ports: 'abc,99999' }, out, {});

    expect(code).toBe(1);
    expect(out.lines).toContain('Warning: Invalid port number: abc');
    expect(out.lines).toContain('Warning: Invalid port number: 99999');
    expect(out.lines).toContain('Error: No valid ports provided.');
  });

  it('should print the resolved configuration as JSON', async () => {
    const out = new CapturedOutput();

    const code = await runConfigCheck({ ports: '2222,8080', json: true }, out, { HONEYPORT_TIMEOUT_MS: '750' });

    expect(code).toBe(0);
    const report: unknown = JSON.parse(out.lines[0]);
    expect(report).toMatchObject({
      valid: true,
      config: { ports: [2222, 8080], connection_timeout_ms: 750 },
      errors: [],
      warnings: [],
    });
  });

  it('should report banner flag mistakes as errors', async () => {
    const out = new CapturedOutput();

    const code = await runConfigCheck({ ports: '22', banner: ['nonsense'] }, out, {});

    expect(code).toBe(1);
    expect(out.lines).toContain('Error: Banner must look like PORT=TEXT: nonsense');
  });
});

describe('serve', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'honeyport-cli-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should exit 1 when no port is valid', async () => {
    const out = new CapturedOutput();

    const code = await runServe({ ports: 'abc' }, out, { env: {}, signal: new AbortController().signal });

    expect(code).toBe(1);
    expect(out.errors).toEqual(['Invalid port number: abc', 'No valid ports provided.']);
  });

  it('should exit 1 when no listener can start', async () => {
    const occupied = await occupyPort();
    const out = new CapturedOutput();

    try {
      const code = await runServe(
        { ports: String(occupied.port), host: '127.0.0.1', fileLog: false, quiet: true },
        out,
        { env: {}, signal: new AbortController().signal }
      );

      expect(code).toBe(1);
      expect(out.errors).toContain('No listener could start.');
    } finally {
      await occupied.close();
    }
  });

  it('should serve until stopped and leave a verifiable log', async () => {
    const occupied = await occupyPort();
    const port = occupied.port;
    await occupied.close();

    const out = new CapturedOutput();
    const controller = new AbortController();
    const running = runServe(
      { ports: String(port), host: '127.0.0.1', logDir: dir, banner: [`${port}=SSH-2.0-OpenSSH_8.9\\r\\n`] },
      out,
      { env: {}, signal: controller.signal }
    );

    await waitFor(() => out.lines.some(l => l.startsWith('honeyport listening')));
    const received = await exchange(port, 'root\r\n');
    controller.abort('SIGTERM');
    const code = await running;

    expect(code).toBe(0);
    expect(received).toBe('SSH-2.0-OpenSSH_8.9\r\n');
    expect(out.lines).toContain(`honeyport listening on 127.0.0.1 ports ${port}`);
    expect(out.lines.some(l => l.startsWith('Shutdown complete (SIGTERM, '))).toBe(true);
    expect(out.lines.some(l => l.includes('data_received'))).toBe(true);

    const events = await loadLogFile(path.join(dir, logFileName()));
    const types = events.map(e => e.event_type);
    expect(types[0]).toBe('config_loaded');
    expect(types).toContain('listener_started');
    expect(types).toContain('connection_received');
    expect(types[types.length - 1]).toBe('shutdown_complete');
    expect(events.find(e => e.event_type === 'data_received')?.payload.payload).toBe('root');
    expect(verifyChain(events).valid).toBe(true);
  });
});

describe('log commands', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'honeyport-log-'));
    const collector = new EventCollector({ output_dir: dir, file_output: true, flush_interval_ms: 0 });
    collector.record('connection_received', { port: 22, remote_addr: '10.0.0.5:40000' });
    collector.record('data_received', { port: 22, remote_addr: '10.0.0.5:40000', byte_count: 12, payload: 'SSH-2.0-PuTTY', truncated: false });
    collector.record('connection_received', { port: 80, remote_addr: '10.0.0.5:40001' });
    collector.record('read_error', { port: 80, remote_addr: '10.0.0.5:40001', err: 'EOF' }, { severity: 'warn' });
    collector.record('connection_received', { port: 22, remote_addr: '10.0.0.9:5000' });
    await collector.close();
    file = path.join(dir, logFileName());
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should summarize a log', async () => {
    const out = new CapturedOutput();

    const code = await runLogSummary(file, {}, out);

    expect(code).toBe(0);
    expect(out.lines).toContain('  Connections: 3');
    expect(out.lines).toContain('  Bytes received: 12');
    expect(out.lines).toContain('  Errors: 1');
  });

  it('should summarize as JSON with a peer limit', async () => {
    const out = new CapturedOutput();

    await runLogSummary(file, { json: true, top: '1' }, out);

    const summary: unknown = JSON.parse(out.lines.join('\n'));
    expect(summary).toMatchObject({
      connections: 3,
      by_port: { '22': 2, '80': 1 },
      top_peers: [{ remote_addr: '10.0.0.5', connections: 2 }],
    });
  });

  it('should reject a bad --top', async () => {
    const out = new CapturedOutput();

    expect(await runLogSummary(file, { top: 'many' }, out)).toBe(1);
    expect(out.errors).toEqual(['--top must be a non-negative integer, got many']);
  });

  it('should verify an intact log', async () => {
    const out = new CapturedOutput();

    expect(await runLogVerify(file, out)).toBe(0);
    expect(out.lines[0]).toBe('✓ Log integrity verified');
    expect(out.lines[1]).toBe('  Events: 5');
  });

  it('should detect a tampered log', async () => {
    const lines = (await fs.promises.readFile(file, 'utf-8')).trim().split('\n');
    lines[1] = lines[1].replace('SSH-2.0-PuTTY', 'SSH-2.0-XXXXX');
    await fs.promises.writeFile(file, lines.join('\n') + '\n');
    const out = new CapturedOutput();

    expect(await runLogVerify(file, out)).toBe(1);
    expect(out.lines[0]).toBe('✗ Log integrity check failed');
  });

  it('should fail on a missing file', async () => {
    const out = new CapturedOutput();

    expect(await runLogVerify(path.join(dir, 'missing.jsonl'), out)).toBe(1);
    expect(out.errors[0].startsWith(`Cannot read ${path.join(dir, 'missing.jsonl')}: `)).toBe(true);
  });
});
