import http from 'http';

export interface HealthStatus {
  store: string;
  cacheFresh: boolean;
}

export function startHealthServer(port: number, getStatus: () => HealthStatus): http.Server {
  const server = http.createServer((_req, res) => {
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(
      JSON.stringify({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: 'costsheet-bot',
        ...getStatus(),
      })
    );
  });

  server.listen(port, () => {
    console.log(`Health check server running on port ${port}`);
  });

  return server;
}
