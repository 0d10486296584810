import * as http from 'http';
import * as https from 'https';
import * as net from 'net';
import * as tls from 'tls';
import { SocksClient } from 'socks';
import { ProxyType } from './types';
import { config } from './config';
import { errorMessage, log } from './logger';
import { ProfileManager } from './manager';

export interface HealthCheckResult {
  name: string;
  healthy: boolean;
  port?: number;
  exitIp?: string;
  error?: string;
}

const CHECK_TIMEOUT_MS = 5000;

function targetPort(url: URL): number {
  return parseInt(url.port || (url.protocol === 'https:' ? '443' : '80'), 10);
}

async function openSocksTunnel(proxyPort: number, url: URL): Promise<net.Socket> {
  const info = await SocksClient.createConnection({
    proxy: { host: '127.0.0.1', port: proxyPort, type: 5 },
    command: 'connect',
    destination: { host: url.hostname, port: targetPort(url) },
    timeout: CHECK_TIMEOUT_MS
  });
  return info.socket;
}

function openHttpTunnel(proxyPort: number, url: URL): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const authority = `${url.hostname}:${targetPort(url)}`;
    const req = http.request({
      host: '127.0.0.1',
      port: proxyPort,
      method: 'CONNECT',
      path: authority,
      headers: { Host: authority },
      timeout: CHECK_TIMEOUT_MS
    });
    req.on('connect', (res, socket) => {
      if (res.statusCode === 200) {
        resolve(socket);
      } else {
        socket.destroy();
        reject(new Error(`Proxy refused CONNECT with status ${res.statusCode}`));
      }
    });
    req.on('timeout', () => req.destroy(new Error('Proxy CONNECT timed out')));
    req.on('error', reject);
    req.end();
  });
}

/** GET `url` over an already-established tunnel and return the body as an IP. */
export function fetchExitIp(socket: net.Socket, url: URL): Promise<string | null> {
  const secure = url.protocol === 'https:';
  const stream: net.Socket = secure ? tls.connect({ socket, servername: url.hostname }) : socket;
  const client = secure ? https : http;

  return new Promise((resolve) => {
    const req = client.request(
      {
        host: url.hostname,
        path: `${url.pathname}${url.search}`,
        method: 'GET',
        headers: { Host: url.hostname, 'User-Agent': 'curl/8.0' },
        createConnection: () => stream,
        timeout: CHECK_TIMEOUT_MS
      },
      (res) => {
        let data = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => (data += chunk));
        res.on('end', () => {
          stream.end();
          const ip = data.trim();
          resolve(net.isIP(ip) ? ip : null);
        });
      }
    );

    req.on('timeout', () => req.destroy());
    req.on('error', () => {
      stream.destroy();
      resolve(null);
    });
    req.end();
  });
}

export async function testProxyAndGetIp(
  proxyType: ProxyType,
  proxyPort: number,
  checkUrl: string = config.exitIpCheckUrl
): Promise<string | null> {
  const url = new URL(checkUrl);
  const socket = proxyType === 'http'
    ? await openHttpTunnel(proxyPort, url)
    : await openSocksTunnel(proxyPort, url);
  return fetchExitIp(socket, url);
}

export async function checkProfileHealth(
  manager: ProfileManager,
  name: string,
  checkUrl: string = config.exitIpCheckUrl
): Promise<HealthCheckResult> {
  manager.reconcile();
  const profile = manager.store.findByName(name);

  if (!profile) {
    return { name, healthy: false, error: 'Profile not found' };
  }
  if (!profile.running || profile.proxyPort === undefined) {
    return { name, healthy: false, error: 'Not running' };
  }

  const port = profile.proxyPort;
  // Records from before the launch type was kept fall back to the current setting
  const proxyType = profile.proxyType ?? manager.getSettings().proxyType;
  try {
    const exitIp = await testProxyAndGetIp(proxyType, port, checkUrl);
    if (!exitIp) {
      return { name, healthy: false, port, error: 'Proxy not responding' };
    }
    log.health(`'${name}' healthy`, { port, exitIp });
    return { name, healthy: true, port, exitIp };
  } catch (err) {
    log.health(`'${name}' unhealthy`, { port, error: errorMessage(err) });
    return { name, healthy: false, port, error: errorMessage(err) };
  }
}

export async function bulkHealthCheck(
  manager: ProfileManager,
  names: string[],
  checkUrl: string = config.exitIpCheckUrl
): Promise<Map<string, HealthCheckResult>> {
  const results = await Promise.all(names.map((name) => checkProfileHealth(manager, name, checkUrl)));

  const resultMap = new Map<string, HealthCheckResult>();
  for (const result of results) {
    resultMap.set(result.name, result);
  }
  return resultMap;
}
