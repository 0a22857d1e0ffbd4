import http from 'node:http';

export type RecordedRequest = {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
};

export type Reply = {
  status?: number;
  contentType?: string;
  body: string;
};

export type TestServer = {
  baseUrl: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
};

/** In-process HTTP server on an ephemeral loopback port. */
export async function startServer(handler: (req: RecordedRequest) => Reply): Promise<TestServer> {
  const requests: RecordedRequest[] = [];

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf-8'),
      };
      requests.push(recorded);
      const reply = handler(recorded);
      res.writeHead(reply.status ?? 200, { 'Content-Type': reply.contentType ?? 'text/plain' });
      res.end(reply.body);
    });
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close(err => (err ? reject(err) : resolve()));
    }),
  };
}
