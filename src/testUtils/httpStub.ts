/**
 * Loopback HTTP server standing in for the OCR and registry endpoints
 */

import http from 'http';

export interface StubRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

export interface StubReply {
  status: number;
  body?: unknown;
  delayMs?: number;
}

export interface HttpStub {
  url: string;
  requests: StubRequest[];
  reply(next: StubReply): void;
  close(): Promise<void>;
}

export async function startHttpStub(): Promise<HttpStub> {
  const requests: StubRequest[] = [];
  const timers = new Set<NodeJS.Timeout>();
  let next: StubReply = { status: 200, body: {} };

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString();
      requests.push({
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: raw ? JSON.parse(raw) : undefined,
      });

      const { status, body, delayMs = 0 } = next;
      const timer = setTimeout(() => {
        timers.delete(timer);
        if (res.destroyed) return;
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(body === undefined ? '' : JSON.stringify(body));
      }, delayMs);
      timers.add(timer);
    });
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Stub server is not listening on a TCP port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    reply: reply => {
      next = reply;
    },
    close: () => new Promise((resolve, reject) => {
      timers.forEach(timer => clearTimeout(timer));
      server.closeAllConnections();
      server.close(error => (error ? reject(error) : resolve()));
    }),
  };
}
