import { createReadStream, createWriteStream } from 'node:fs';
import { Socket } from 'node:net';
import { Duplex } from 'node:stream';

export type Target =
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'device'; path: string };

const TCP_PREFIX = 'tcp://';

/** `tcp://host:port` for a bridged RFCOMM channel, anything else is a device path. */
export function parseTarget(target: string): Target {
  const trimmed = target.trim();
  if (trimmed === '') {
    throw new Error('No device given');
  }
  if (!trimmed.startsWith(TCP_PREFIX)) {
    return { kind: 'device', path: trimmed };
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (err) {
    throw new Error(`Invalid tcp target: ${trimmed}`, { cause: err });
  }
  const port = Number(url.port);
  if (url.hostname === '' || !Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid tcp target: ${trimmed} (expected tcp://host:port)`);
  }
  return { kind: 'tcp', host: url.hostname, port };
}

/** Connect a socket to host:port and return it once connected. */
function connectSocket(host: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const sock = new Socket();
    sock.connect(port, host, () => {
      sock.off('error', reject);
      resolve(sock);
    });
    sock.once('error', reject);
  });
}

/** Open a duplex byte stream to a headset. */
export async function openTransport(target: string | Target): Promise<Duplex> {
  const parsed = typeof target === 'string' ? parseTarget(target) : target;
  switch (parsed.kind) {
    case 'tcp':
      return connectSocket(parsed.host, parsed.port);
    case 'device':
      return Duplex.from({
        readable: createReadStream(parsed.path),
        writable: createWriteStream(parsed.path, { flags: 'r+' }),
      });
  }
}
