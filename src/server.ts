/**
 * HTTP entry point: POST /mcp takes one JSON-RPC request, GET /health reports
 * the active snapshot.
 */
import 'dotenv/config';
import * as http from 'http';
import { initRealty } from './index';
import type { RealtyAtlas } from './index';
import { errorMessage } from './utils';

export function createServer(app: RealtyAtlas): http.Server {
  return http.createServer(async (req, res) => {
    const url = new URL(req.url || '/', `http://localhost:${app.config.port}`);

    res.setHeader('Content-Type', 'application/json');
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') { res.writeHead(204); res.end(); return; }

    try {
      if (url.pathname === '/mcp' && req.method === 'POST') {
        let body: unknown;
        try {
          body = await readBody(req);
        } catch (e) {
          res.writeHead(400);
          res.end(JSON.stringify({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32700, message: `Parse error: ${errorMessage(e)}` },
          }));
          return;
        }
        const result = await app.mcpService.handleMessage(body);
        res.writeHead(200);
        res.end(JSON.stringify(result));
        return;
      }

      if (url.pathname === '/health') {
        const { snapshot, index } = app.store.current();
        res.writeHead(200);
        res.end(JSON.stringify({
          status: 'ok',
          uptime: process.uptime(),
          generation: snapshot.generation,
          loadedAt: snapshot.loadedAt,
          diagnostics: snapshot.diagnostics.length,
          integrityIssues: index.issues.length,
        }));
        return;
      }

      res.writeHead(404);
      res.end(JSON.stringify({ error: 'Not Found' }));

    } catch (e) {
      console.error(e);
      res.writeHead(500);
      res.end(JSON.stringify({ error: errorMessage(e) }));
    }
  });
}

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let data = '';
    req.on('data', (chunk) => (data += chunk));
    req.on('end', () => {
      try { resolve(data ? JSON.parse(data) : {}); } catch (e) { reject(e); }
    });
    req.on('error', reject);
  });
}

async function startServer(): Promise<void> {
  console.log('🔄 Loading Realty Atlas records...');
  const app = await initRealty();

  const server = createServer(app);
  server.listen(app.config.port, () => {
    console.log(`🚀 Realty Atlas server running on port ${app.config.port}`);
  });
}

if (require.main === module) {
  startServer().catch((error) => {
    console.error('❌ Startup failed:', errorMessage(error));
    process.exit(1);
  });
}
