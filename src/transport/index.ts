import type { Logger } from '../middleware/logger.js';
import { NativeTransport } from './native.js';
import { ProcessTransport } from './process.js';
import type { Transport } from './types.js';

export { NativeTransport, describeNetworkError } from './native.js';
export {
  ProcessTransport,
  spawnCommand,
  describeCurlExit,
  parseDumpedStatus,
  type CommandRunner,
  type CommandResult,
} from './process.js';
export * from './types.js';

export type TransportMode = 'auto' | 'native' | 'process';

/** What the host knows about its own platform. */
export interface HostEnvironment {
  nativeTlsReliable(): boolean;
}

export const nodeHostEnvironment: HostEnvironment = {
  nativeTlsReliable: () => typeof process.versions.openssl === 'string',
};

export interface TransportFactoryOptions {
  mode: TransportMode;
  curlPath?: string;
  tmpDir?: string;
  logger?: Logger;
}

export function createTransport(
  options: TransportFactoryOptions,
  host: HostEnvironment = nodeHostEnvironment
): Transport {
  const useProcess =
    options.mode === 'process' || (options.mode === 'auto' && !host.nativeTlsReliable());

  if (useProcess) {
    return new ProcessTransport({
      command: options.curlPath,
      tmpDir: options.tmpDir,
      logger: options.logger,
    });
  }
  return new NativeTransport({ logger: options.logger });
}
