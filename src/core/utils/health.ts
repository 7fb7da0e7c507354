import http from "http";
import { Logger } from "./logger";

/**
 * Starts the /healthz endpoint used by container probes
 */
export function startHealthServer(port: number, label = "Health check"): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === "/healthz") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else {
      res.writeHead(404);
      res.end();
    }
  });
  server.listen(port, () => {
    Logger.info(`${label} endpoint listening on /healthz`, { port });
  });
  return server;
}
