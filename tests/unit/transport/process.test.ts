import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ProcessTransport,
  describeCurlExit,
  parseDumpedStatus,
  type CommandRunner,
} from '../../../src/transport/process.js';
import type { HttpRequest } from '../../../src/transport/types.js';
import { silentLogger } from '../../helpers.js';

const policy = { connectTimeoutMs: 30_000, overallTimeoutMs: 60_000 };

const request: HttpRequest = {
  url: 'https://api.example.test/v1/chat/completions',
  headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
  body: '{"model":"gpt-test"}',
};

function argAfter(args: string[], flag: string): string {
  const value = args[args.indexOf(flag) + 1];
  if (value === undefined) throw new Error(`missing value for ${flag}`);
  return value;
}

describe('ProcessTransport', () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await mkdtemp(path.join(os.tmpdir(), 'process-transport-test-'));
  });

  afterEach(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  it('passes body and headers through files and reads the response file', async () => {
    let seenHeaders = '';
    let seenBody = '';
    let seenArgs: string[] = [];
    const run: CommandRunner = async (_command, args) => {
      seenArgs = args;
      seenHeaders = await readFile(argAfter(args, '-H').slice(1), 'utf8');
      seenBody = await readFile(argAfter(args, '--data-binary').slice(1), 'utf8');
      await writeFile(argAfter(args, '-o'), '{"ok":true}');
      return { exitCode: 0, stdout: '200', stderr: '' };
    };
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });

    const outcome = await transport.send(request, policy);

    expect(outcome).toEqual({ kind: 'success', status: 200, body: '{"ok":true}' });
    expect(seenHeaders).toBe('Content-Type: application/json\nAuthorization: Bearer test-secret\n');
    expect(seenBody).toBe('{"model":"gpt-test"}');
    expect(argAfter(seenArgs, '--connect-timeout')).toBe('30');
    expect(argAfter(seenArgs, '--max-time')).toBe('60');
    expect(seenArgs.at(-1)).toBe(request.url);
    expect(seenArgs.join(' ')).not.toContain('test-secret');
  });

  it('removes the per-call directory after success', async () => {
    const run: CommandRunner = async (_command, args) => {
      await writeFile(argAfter(args, '-o'), '{}');
      return { exitCode: 0, stdout: '200', stderr: '' };
    };
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });

    await transport.send(request, policy);

    expect(await readdir(tmpRoot)).toEqual([]);
  });

  it('removes the per-call directory when the command cannot start', async () => {
    const run: CommandRunner = async () => {
      throw new Error('spawn curl ENOENT');
    };
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });

    const outcome = await transport.send(request, policy);

    expect(outcome).toEqual({ kind: 'connection-error', detail: 'Failed to run curl: spawn curl ENOENT' });
    expect(await readdir(tmpRoot)).toEqual([]);
  });

  it('classifies HTTP errors from the written status code', async () => {
    const run: CommandRunner = async (_command, args) => {
      await writeFile(argAfter(args, '-o'), 'rate limited');
      return { exitCode: 0, stdout: '429', stderr: '' };
    };
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });

    await expect(transport.send(request, policy)).resolves.toEqual({
      kind: 'http-error',
      status: 429,
      body: 'rate limited',
    });
    expect(await readdir(tmpRoot)).toEqual([]);
  });

  it('describes a failed exit without stderr', async () => {
    const run: CommandRunner = async () => ({ exitCode: 7, stdout: '', stderr: '' });
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });

    await expect(transport.send(request, policy)).resolves.toEqual({
      kind: 'connection-error',
      detail: 'Failed to connect to host',
    });
    expect(await readdir(tmpRoot)).toEqual([]);
  });

  it('redacts URL keys echoed on stderr', async () => {
    const url = 'https://api.example.test/v1beta/models/gemini-test:generateContent?key=test-secret';
    const run: CommandRunner = async () => ({
      exitCode: 6,
      stdout: '',
      stderr: `curl: (6) Could not resolve host for ${url}\n`,
    });
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });

    await expect(transport.send({ ...request, url }, policy)).resolves.toEqual({
      kind: 'connection-error',
      detail:
        'curl: (6) Could not resolve host for https://api.example.test/v1beta/models/gemini-test:generateContent?key=***',
    });
    expect(await readdir(tmpRoot)).toEqual([]);
  });

  it('streams stdout and takes the status from dumped headers', async () => {
    const run: CommandRunner = async (_command, args, options) => {
      await writeFile(
        argAfter(args, '-D'),
        'HTTP/1.1 100 Continue\r\n\r\nHTTP/1.1 200 OK\r\nContent-Type: text/event-stream\r\n\r\n'
      );
      options.onStdout?.('data: one\n\n');
      options.onStdout?.('data: two\n\n');
      return { exitCode: 0, stdout: 'data: one\n\ndata: two\n\n', stderr: '' };
    };
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });
    const onData = vi.fn();

    const outcome = await transport.send(request, { ...policy, onData });

    expect(outcome).toEqual({ kind: 'success', status: 200, body: 'data: one\n\ndata: two\n\n' });
    expect(onData.mock.calls).toEqual([['data: one\n\n'], ['data: two\n\n']]);
  });

  it('returns cancelled when aborted before the call', async () => {
    const run = vi.fn<CommandRunner>();
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });
    const controller = new AbortController();
    controller.abort();

    await expect(transport.send(request, { ...policy, signal: controller.signal })).resolves.toEqual({
      kind: 'cancelled',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('returns cancelled and cleans up when aborted while the command runs', async () => {
    const started = vi.fn();
    const run: CommandRunner = (_command, _args, options) =>
      new Promise<never>((_resolve, reject) => {
        started();
        options.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')), {
          once: true,
        });
      });
    const transport = new ProcessTransport({ tmpDir: tmpRoot, run, logger: silentLogger });
    const controller = new AbortController();

    const outcome = transport.send(request, { ...policy, signal: controller.signal });
    await vi.waitFor(() => expect(started).toHaveBeenCalledTimes(1));
    expect(await readdir(tmpRoot)).toHaveLength(1);
    controller.abort();

    await expect(outcome).resolves.toEqual({ kind: 'cancelled' });
    expect(await readdir(tmpRoot)).toEqual([]);
  });
});

describe('describeCurlExit', () => {
  it('names known exit codes', () => {
    expect(describeCurlExit(28)).toBe('Operation timed out');
  });

  it('falls back to the numeric code', () => {
    expect(describeCurlExit(99)).toBe('curl exited with code 99');
  });

  it('reports termination by signal', () => {
    expect(describeCurlExit(null)).toBe('curl was terminated by a signal');
  });
});

describe('parseDumpedStatus', () => {
  it('takes the last status line', () => {
    expect(parseDumpedStatus('HTTP/1.1 100 Continue\r\n\r\nHTTP/2 503\r\n')).toBe(503);
  });

  it('returns undefined without a status line', () => {
    expect(parseDumpedStatus('')).toBeUndefined();
  });
});
