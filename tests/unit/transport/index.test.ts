import { describe, expect, it } from 'vitest';
import { NativeTransport, ProcessTransport, createTransport } from '../../../src/transport/index.js';
import { silentLogger } from '../../helpers.js';

const reliable = { nativeTlsReliable: () => true };
const unreliable = { nativeTlsReliable: () => false };

describe('createTransport', () => {
  it('uses the native transport when TLS is reliable', () => {
    expect(createTransport({ mode: 'auto', logger: silentLogger }, reliable)).toBeInstanceOf(NativeTransport);
  });

  it('falls back to the process transport when TLS is unreliable', () => {
    expect(createTransport({ mode: 'auto', logger: silentLogger }, unreliable)).toBeInstanceOf(ProcessTransport);
  });

  it('honours an explicit mode', () => {
    expect(createTransport({ mode: 'process', logger: silentLogger }, reliable)).toBeInstanceOf(ProcessTransport);
    expect(createTransport({ mode: 'native', logger: silentLogger }, unreliable)).toBeInstanceOf(NativeTransport);
  });
});
