import { createServer } from "node:http";
import analyzeHandler from "./api/analyze";
import cleanHandler from "./api/clean";
import type { ApiRequest, ApiResponse } from "./api/utils/http";
import { loadConfig } from "./src/lib/config";

type Handler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

const routes: Record<string, Handler> = {
  "/api/analyze": analyzeHandler,
  "/api/clean": cleanHandler
};

const { port, backend, model } = loadConfig();

const server = createServer((req, res) => {
  const path = (req.url ?? "").split("?")[0];
  const handler = routes[path];
  if (!handler) {
    res.statusCode = 404;
    res.setHeader("Content-Type", "application/json");
    res.end(JSON.stringify({ ok: false, error: "Not Found" }));
    return;
  }

  handler(req, res).catch((error: unknown) => {
    // surface the error in dev for visibility
    console.error(`[dev-server] handler error ${path}`, error);
    if (!res.headersSent) {
      res.statusCode = 500;
      res.setHeader("Content-Type", "application/json");
    }
    res.end(JSON.stringify({ ok: false, error: "Dev handler error", requestId: "dev" }));
  });
});

server.listen(port, () => {
  console.info("[dev-server] listening", { port, backend, model });
});
