import http from 'http';
import { registry } from './metrics';
import { log } from './logger';

export type ReadinessProbe = () => boolean;

export function startMetricsServer(port: number, ready: ReadinessProbe = () => true): http.Server {
  const srv = http.createServer(async (req, res) => {
    if (req.url === '/metrics') {
      try {
        const data = await registry.metrics();
        res.writeHead(200, { 'Content-Type': registry.contentType });
        return res.end(data);
      } catch (e) {
        res.writeHead(500);
        return res.end(e instanceof Error ? e.message : String(e));
      }
    }
    if (req.url === '/live') {
      res.writeHead(200);
      return res.end('ok');
    }
    if (req.url === '/ready') {
      const ok = ready();
      res.writeHead(ok ? 200 : 503);
      return res.end(ok ? 'ok' : 'not-ready');
    }
    res.writeHead(404);
    res.end();
  });
  srv.on('error', (err) => log.error({ err: err.message, port }, 'metrics-server-error'));
  srv.listen(port, () => log.info({ port }, 'metrics-server-listening'));
  return srv;
}

export function stopMetricsServer(srv: http.Server): Promise<void> {
  return new Promise((resolve) => srv.close(() => resolve()));
}
