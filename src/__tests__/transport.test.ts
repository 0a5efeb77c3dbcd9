import { describe, it, expect } from 'vitest';
import { parseTarget } from '../transport.js';

describe('parseTarget', () => {
  it('reads tcp targets', () => {
    expect(parseTarget('tcp://127.0.0.1:9000')).toEqual({ kind: 'tcp', host: '127.0.0.1', port: 9000 });
    expect(parseTarget(' tcp://bridge.local:4000 ')).toEqual({ kind: 'tcp', host: 'bridge.local', port: 4000 });
  });

  it('treats anything else as a device path', () => {
    expect(parseTarget('/dev/rfcomm0')).toEqual({ kind: 'device', path: '/dev/rfcomm0' });
  });

  it('rejects tcp targets without a port', () => {
    expect(() => parseTarget('tcp://127.0.0.1')).toThrow('Invalid tcp target: tcp://127.0.0.1 (expected tcp://host:port)');
  });

  it('rejects an empty target', () => {
    expect(() => parseTarget('  ')).toThrow('No device given');
  });
});
