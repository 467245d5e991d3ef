import { spawn } from 'node:child_process';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import { redactText, redactUrl } from '../middleware/redact.js';
import { describeNetworkError } from './native.js';
import {
  classifyStatus,
  type HttpRequest,
  type RequestOutcome,
  type SendOptions,
  type Transport,
} from './types.js';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunOptions {
  signal?: AbortSignal;
  onStdout?: (chunk: string) => void;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandRunOptions
) => Promise<CommandResult>;

export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      signal: options.signal,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
      options.onStdout?.(chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', reject);
    child.on('close', (exitCode) => resolve({ exitCode, stdout, stderr }));
  });

const CURL_EXIT_REASONS: Record<number, string> = {
  6: 'Could not resolve host',
  7: 'Failed to connect to host',
  28: 'Operation timed out',
  35: 'TLS handshake failed',
  52: 'Empty reply from server',
  56: 'Failure receiving network data',
};

export function describeCurlExit(exitCode: number | null): string {
  if (exitCode === null) return 'curl was terminated by a signal';
  return CURL_EXIT_REASONS[exitCode] ?? `curl exited with code ${exitCode}`;
}

export function parseDumpedStatus(headers: string): number | undefined {
  let status: number | undefined;
  for (const line of headers.split(/\r?\n/)) {
    const match = /^HTTP\/[\d.]+\s+(\d{3})/.exec(line);
    if (match) status = Number(match[1]);
  }
  return status;
}

const toSeconds = (ms: number): string => String(Math.max(1, Math.ceil(ms / 1000)));

export interface ProcessTransportOptions {
  command?: string;
  tmpDir?: string;
  run?: CommandRunner;
  logger?: Logger;
}

interface CallFiles {
  dir: string;
  requestBody: string;
  requestHeaders: string;
  responseBody: string;
  responseHeaders: string;
}

/**
 * Fallback transport for hosts whose TLS stack is unreliable: hands the
 * request to curl through files in a per-call temp directory. Headers go
 * through a file as well so credentials never show up in the process list.
 */
export class ProcessTransport implements Transport {
  readonly name = 'process';
  private command: string;
  private tmpDir: string;
  private run: CommandRunner;
  private logger: Logger;

  constructor(options: ProcessTransportOptions = {}) {
    this.command = options.command ?? 'curl';
    this.tmpDir = options.tmpDir ?? os.tmpdir();
    this.run = options.run ?? spawnCommand;
    this.logger = options.logger ?? defaultLogger;
  }

  buildArgs(httpRequest: HttpRequest, options: SendOptions, files: CallFiles): string[] {
    const args = [
      '-sS',
      '-X',
      'POST',
      '-H',
      `@${files.requestHeaders}`,
      '--connect-timeout',
      toSeconds(options.connectTimeoutMs),
      '--max-time',
      toSeconds(options.overallTimeoutMs),
      '--data-binary',
      `@${files.requestBody}`,
    ];
    if (options.onData) {
      args.push('-N', '-D', files.responseHeaders);
    } else {
      args.push('-o', files.responseBody, '-w', '%{http_code}');
    }
    args.push(httpRequest.url);
    return args;
  }

  async send(httpRequest: HttpRequest, options: SendOptions): Promise<RequestOutcome> {
    if (options.signal?.aborted) {
      return { kind: 'cancelled' };
    }

    const dir = await mkdtemp(path.join(this.tmpDir, 'llm-dispatch-'));
    const files: CallFiles = {
      dir,
      requestBody: path.join(dir, 'request.body'),
      requestHeaders: path.join(dir, 'request.headers'),
      responseBody: path.join(dir, 'response.body'),
      responseHeaders: path.join(dir, 'response.headers'),
    };

    try {
      await writeFile(files.requestBody, httpRequest.body, 'utf8');
      const headerLines = Object.entries(httpRequest.headers).map(([name, value]) => `${name}: ${value}`);
      await writeFile(files.requestHeaders, `${headerLines.join('\n')}\n`, { encoding: 'utf8', mode: 0o600 });

      const args = this.buildArgs(httpRequest, options, files);
      this.logger.debug(
        { command: [this.command, ...args.slice(0, -1), redactUrl(httpRequest.url)].join(' ') },
        'Process transport request'
      );

      let result: CommandResult;
      try {
        result = await this.run(this.command, args, {
          signal: options.signal,
          onStdout: options.onData,
        });
      } catch (error) {
        if (options.signal?.aborted) {
          return { kind: 'cancelled' };
        }
        return {
          kind: 'connection-error',
          detail: `Failed to run ${this.command}: ${describeNetworkError(error)}`,
        };
      }

      if (options.signal?.aborted) {
        return { kind: 'cancelled' };
      }

      if (result.exitCode !== 0) {
        const stderr = result.stderr.trim();
        const detail = redactText(stderr || describeCurlExit(result.exitCode), httpRequest.headers, httpRequest.url);
        this.logger.warn({ exitCode: result.exitCode, detail }, 'Process transport failed');
        return { kind: 'connection-error', detail };
      }

      const status = options.onData
        ? parseDumpedStatus(await readOptional(files.responseHeaders))
        : Number.parseInt(result.stdout.trim(), 10);
      if (status === undefined || Number.isNaN(status) || status === 0) {
        return { kind: 'connection-error', detail: `Could not determine HTTP status from ${this.command} output` };
      }

      const body = options.onData ? result.stdout : await readOptional(files.responseBody);
      return classifyStatus(status, body);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

async function readOptional(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}
