import * as http from "http";
import type { Registry } from "prom-client";
import type { Logger } from "winston";
import { describeError } from "./errors";

export interface StatusProvider {
  status(): { healthy: boolean } & Record<string, unknown>;
}

/**
 * GET /health → JSON status (503 once the service is no longer healthy)
 * GET /metrics → Prometheus text format
 */
export function createHealthServer(service: StatusProvider, registry: Registry, logger: Logger): http.Server {
  const log = logger.child({ component: "HealthServer" });

  return http.createServer((req, res) => {
    if (req.method !== "GET") {
      res.writeHead(405);
      res.end();
      return;
    }

    if (req.url === "/health") {
      const status = service.status();
      res.writeHead(status.healthy ? 200 : 503, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ...status, timestamp: new Date().toISOString() }));
      return;
    }

    if (req.url === "/metrics") {
      registry
        .metrics()
        .then((payload) => {
          res.writeHead(200, { "Content-Type": registry.contentType });
          res.end(payload);
        })
        .catch((err: unknown) => {
          log.error(`Metrics collection failed: ${describeError(err)}`);
          res.writeHead(500, { "Content-Type": "text/plain" });
          res.end("# Error collecting metrics\n");
        });
      return;
    }

    res.writeHead(404);
    res.end();
  });
}

export function listen(server: http.Server, port: number, bindHost: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, bindHost, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
