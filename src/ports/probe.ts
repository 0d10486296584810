import * as net from 'net';

export type PortProbe = (port: number) => Promise<boolean>;

/**
 * Connect test against 127.0.0.1. Accepted means something is listening,
 * refused or timed out means the port is free. Point-in-time only.
 */
export function isPortFreeOnHost(port: number, timeoutMs = 300, host = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port, timeout: timeoutMs }, () => {
      socket.end();
      resolve(false);
    });

    socket.on('error', () => resolve(true));
    socket.on('timeout', () => {
      socket.destroy();
      resolve(true);
    });
  });
}

export function createPortProbe(timeoutMs: number): PortProbe {
  return (port) => isPortFreeOnHost(port, timeoutMs);
}
