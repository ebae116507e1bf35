/**
 * Bridges node:http to fetch-style handlers (Request → Response)
 */

import http from 'node:http';

export type FetchHandler = (req: Request) => Promise<Response>;

function readBody(req: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

async function forward(handle: FetchHandler, req: http.IncomingMessage, res: http.ServerResponse, origin: string): Promise<void> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    if (typeof value === 'string') {
      headers[key] = value;
    } else if (Array.isArray(value)) {
      headers[key] = value.join(', ');
    }
  }

  const method = req.method ?? 'GET';
  const body = ['POST', 'PUT', 'PATCH'].includes(method) ? await readBody(req) : undefined;
  const request = new Request(`${origin}${req.url ?? '/'}`, { method, headers, body });

  const response = await handle(request);
  const responseHeaders: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    responseHeaders[key] = value;
  });

  res.writeHead(response.status, responseHeaders);
  res.end(Buffer.from(await response.arrayBuffer()));
}

export function createNodeServer(handle: FetchHandler, port: number, tag: string): http.Server {
  const server = http.createServer((req, res) => {
    forward(handle, req, res, `http://localhost:${port}`).catch((error: unknown) => {
      console.error(`[${tag}] Request failed:`, error);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ success: false, error: 'Internal server error' }));
    });
  });
  return server;
}
