/**
 * Local HTTP control server — lets an operator check on the trader and
 * stop it without killing the process.
 *
 * Endpoints:
 *   GET  /status   → { status, uptime, ...getStatus() }
 *   POST /shutdown → graceful shutdown
 */
import http from 'http';
import { errorMessage } from './utils/errors';

export interface ControlServerOptions {
  port:       number;
  host?:      string;
  getStatus:  () => Record<string, unknown>;
  onShutdown: () => Promise<void> | void;
}

export function startControlServer(opts: ControlServerOptions): http.Server {
  const host = opts.host ?? '127.0.0.1';

  const server = http.createServer((req, res) => {
    res.setHeader('Content-Type', 'application/json');

    if (req.method === 'GET' && req.url === '/status') {
      res.writeHead(200);
      res.end(JSON.stringify({ status: 'running', uptime: Math.floor(process.uptime()), ...opts.getStatus() }));

    } else if (req.method === 'POST' && req.url === '/shutdown') {
      res.writeHead(200);
      res.end(JSON.stringify({ ok: true, message: 'Shutting down...' }));
      console.log('\n🌙 Shutdown requested via control server');
      Promise.resolve(opts.onShutdown()).catch(err => {
        console.error('⚠️  Shutdown handler failed:', errorMessage(err));
      });

    } else {
      res.writeHead(404);
      res.end(JSON.stringify({ error: 'Not found' }));
    }
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.warn(`⚠️  Control server port ${opts.port} already in use — skipping (trader will run without it)`);
    } else {
      console.error('⚠️  Control server error:', err.message);
    }
  });

  server.listen(opts.port, host, () => {
    console.log(`🎮 Control server: http://${host}:${opts.port}`);
  });

  return server;
}
