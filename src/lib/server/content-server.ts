/**
 * Ephemeral Content Server
 *
 * Serves one directory tree over loopback HTTP for the duration of a single
 * render, so the page can fetch sibling data files (CSV, JSON, GeoJSON) the
 * way it would from a real origin.
 */

import { createServer, IncomingMessage, ServerResponse, Server } from 'http';
import { readdir, readFile, stat } from 'fs/promises';
import type { Stats } from 'fs';
import { extname, resolve } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import {
  PortInUseError,
  ServerDidNotStartError,
  ServerUnreachableError,
  errorMessage,
  systemErrorCode,
} from '../errors/index.js';
import { resolveServedRoot, isWithinRoot } from '../documents/index.js';
import { createLogger, type Logger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ContentServerConfig {
  rootDir: string;
  /** 0 lets the OS pick a free port */
  port?: number;
  host?: string;
  probeAttempts?: number;
  probeIntervalMs?: number;
  probeTimeoutMs?: number;
  /** Answers with the HTTP status of `baseUrl`; defaults to `probeServer` */
  livenessCheck?: (baseUrl: string, timeoutMs: number) => Promise<number>;
  logger?: Logger;
}

export const LOOPBACK_HOSTS: readonly string[] = ['127.0.0.1', 'localhost'];

export interface ServerHandle {
  port: number;
  baseUrl: string;
  rootDir: string;
}

// ============================================================================
// MIME Types
// ============================================================================

export const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json',
  '.geojson': 'application/json',
  '.topojson': 'application/json',
  '.csv': 'text/csv; charset=utf-8',
  '.tsv': 'text/tab-separated-values; charset=utf-8',
  '.md': 'text/markdown; charset=utf-8',
  '.txt': 'text/plain; charset=utf-8',
  '.xml': 'application/xml',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
  '.wasm': 'application/wasm',
};

export const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, HEAD, OPTIONS',
  'Access-Control-Allow-Headers': 'Origin, Content-Type, Accept',
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[extname(filename).toLowerCase()] || 'application/octet-stream';
}

// ============================================================================
// Content Server
// ============================================================================

export class ContentServer {
  private rootDir: string;
  private port: number;
  private host: string;
  private probeAttempts: number;
  private probeIntervalMs: number;
  private probeTimeoutMs: number;
  private livenessCheck: (baseUrl: string, timeoutMs: number) => Promise<number>;
  private logger: Logger;
  private server: Server | null = null;
  private handle: ServerHandle | null = null;

  constructor(config: ContentServerConfig) {
    this.rootDir = resolve(config.rootDir);
    this.port = config.port ?? 0;
    this.host = config.host || '127.0.0.1';
    this.probeAttempts = config.probeAttempts ?? 5;
    this.probeIntervalMs = config.probeIntervalMs ?? 100;
    this.probeTimeoutMs = config.probeTimeoutMs ?? 5000;
    this.livenessCheck = config.livenessCheck ?? probeServer;
    this.logger = config.logger ?? createLogger('Server');
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  getHandle(): ServerHandle | null {
    return this.handle;
  }

  /**
   * Bind, then wait until the server answers its own root
   */
  async start(): Promise<ServerHandle> {
    if (this.handle) return this.handle;

    if (!LOOPBACK_HOSTS.includes(this.host)) {
      throw new ServerDidNotStartError(`Refusing to serve on ${this.host}; only loopback hosts are allowed`);
    }
    this.rootDir = await resolveServedRoot(this.rootDir);

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => this.sendError(res, error));
    });
    await this.listen(server);
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      await this.shutdown();
      throw new ServerDidNotStartError(`Server bound to an unexpected address: ${String(address)}`);
    }

    const handle: ServerHandle = {
      port: address.port,
      baseUrl: `http://${this.host}:${address.port}`,
      rootDir: this.rootDir,
    };
    this.handle = handle;

    try {
      await this.waitUntilLive(handle.baseUrl);
    } catch (error) {
      await this.shutdown();
      throw error;
    }

    this.logger.info(`🌐 Serving ${this.rootDir} at ${handle.baseUrl}`);
    return handle;
  }

  /**
   * Stop the server. Safe to call repeatedly, or before `start` succeeded.
   */
  async shutdown(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.handle = null;
    if (!server) return;

    const closed = new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    // Keep-alive sockets would otherwise hold the port open
    server.closeAllConnections();
    await closed;
    this.logger.debug('Server closed');
  }

  private listen(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening);
        if (systemErrorCode(error) === 'EADDRINUSE') {
          reject(new PortInUseError(this.port, { cause: error }));
        } else {
          reject(new ServerDidNotStartError(`Could not bind ${this.host}:${this.port}: ${error.message}`, { cause: error }));
        }
      };
      const onListening = () => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.port, this.host);
    });
  }

  private async waitUntilLive(baseUrl: string): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.probeAttempts; attempt++) {
      try {
        const status = await this.livenessCheck(baseUrl, this.probeTimeoutMs);
        if (status < 500) return;
        lastError = new Error(`status ${status}`);
      } catch (error) {
        lastError = error;
      }
      this.logger.debug(`Liveness probe ${attempt}/${this.probeAttempts} failed`, { reason: errorMessage(lastError) });
      await sleep(this.probeIntervalMs);
    }

    throw new ServerDidNotStartError(
      `Server at ${baseUrl} did not answer after ${this.probeAttempts} attempts: ${errorMessage(lastError)}`,
      { cause: lastError }
    );
  }

  // --------------------------------------------------------------------------
  // Request Handling
  // --------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method || 'GET';

    if (method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    if (method !== 'GET' && method !== 'HEAD') {
      this.sendText(res, 405, 'Method Not Allowed', { Allow: 'GET, HEAD, OPTIONS' });
      return;
    }

    const { pathname } = new URL(req.url || '/', 'http://localhost');
    let decoded: string;
    try {
      decoded = decodeURIComponent(pathname);
    } catch {
      this.sendText(res, 400, 'Bad Request');
      return;
    }

    const filepath = resolve(this.rootDir, `.${decoded}`);
    if (!isWithinRoot(this.rootDir, filepath)) {
      this.sendText(res, 403, 'Forbidden');
      return;
    }

    let stats: Stats;
    try {
      stats = await stat(filepath);
    } catch {
      this.sendText(res, 404, 'Not Found');
      return;
    }

    if (stats.isDirectory()) {
      if (!pathname.endsWith('/')) {
        res.writeHead(301, { ...CORS_HEADERS, Location: `${pathname}/` });
        res.end();
        return;
      }
      await this.serveDirectory(filepath, decoded, method, res);
      return;
    }

    await this.serveFile(filepath, method, res);
  }

  private async serveFile(filepath: string, method: string, res: ServerResponse): Promise<void> {
    const content = await readFile(filepath);
    res.writeHead(200, {
      ...CORS_HEADERS,
      'Content-Type': contentTypeFor(filepath),
      'Content-Length': content.length,
      'Cache-Control': 'no-store',
    });
    res.end(method === 'HEAD' ? undefined : content);
  }

  private async serveDirectory(dirpath: string, urlPath: string, method: string, res: ServerResponse): Promise<void> {
    const index = resolve(dirpath, 'index.html');
    if (await isFile(index)) {
      await this.serveFile(index, method, res);
      return;
    }

    const entries = await readdir(dirpath, { withFileTypes: true });
    const items = entries
      .map(entry => (entry.isDirectory() ? `${entry.name}/` : entry.name))
      .sort((a, b) => a.localeCompare(b));
    const html = this.generateListingHtml(urlPath, items);

    res.writeHead(200, {
      ...CORS_HEADERS,
      'Content-Type': 'text/html; charset=utf-8',
      'Content-Length': Buffer.byteLength(html),
    });
    res.end(method === 'HEAD' ? undefined : html);
  }

  private generateListingHtml(urlPath: string, items: string[]): string {
    const title = `Directory listing for ${escapeHtml(urlPath)}`;
    return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="UTF-8"><title>${title}</title></head>
<body>
  <h1>${title}</h1>
  <ul>
${items.map(item => `    <li><a href="${encodeURI(item)}">${escapeHtml(item)}</a></li>`).join('\n')}
  </ul>
</body>
</html>`;
  }

  // --------------------------------------------------------------------------
  // Error Handling
  // --------------------------------------------------------------------------

  private sendText(res: ServerResponse, status: number, body: string, headers: Record<string, string> = {}): void {
    res.writeHead(status, { ...CORS_HEADERS, 'Content-Type': 'text/plain; charset=utf-8', ...headers });
    res.end(body);
  }

  private sendError(res: ServerResponse, error: unknown): void {
    this.logger.error('Request failed', error);
    if (res.headersSent) {
      res.destroy();
      return;
    }
    this.sendText(res, 500, 'Internal Server Error');
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Single liveness request against a server root. Resolves with the HTTP
 * status; throws ServerUnreachableError when no connection can be made.
 */
export async function probeServer(baseUrl: string, timeoutMs: number = 5000): Promise<number> {
  const url = `${baseUrl.replace(/\/+$/, '')}/`;
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new ServerUnreachableError(url, { cause: error });
  }
  await response.arrayBuffer();
  return response.status;
}

// ============================================================================
// Factory
// ============================================================================

export function createContentServer(config: ContentServerConfig): ContentServer {
  return new ContentServer(config);
}

/**
 * Start a server for `rootDir`, run `work` against it, and always shut it
 * down afterwards.
 */
export async function withContentServer<T>(
  rootDir: string,
  work: (handle: ServerHandle) => Promise<T>,
  config: Omit<ContentServerConfig, 'rootDir'> = {}
): Promise<T> {
  const server = createContentServer({ ...config, rootDir });
  try {
    const handle = await server.start();
    return await work(handle);
  } finally {
    await server.shutdown();
  }
}
