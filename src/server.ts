import Fastify, { type FastifyInstance } from "fastify";
import { type DashboardSources, loadDashboardState, renderDashboard } from "./dashboard.js";

export interface ServerOptions {
  dashboard: DashboardSources;
  allowedHosts: string[];
  logger?: boolean;
}

export const FORBIDDEN_MESSAGE = "You're not allowed to access this resource";

// IPv4 clients on a dual-stack socket show up as ::ffff:a.b.c.d
const clientAddress = (ip: string): string => ip.replace(/^::ffff:/, "");

export function buildServer(options: ServerOptions): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? false });
  const allowed = new Set(options.allowedHosts);

  if (allowed.size > 0) {
    app.addHook("onRequest", async (request, reply) => {
      if (!allowed.has(clientAddress(request.ip))) {
        return reply.code(403).type("text/plain").send(FORBIDDEN_MESSAGE);
      }
    });
  }

  app.get("/health", async (_request, reply) => reply.type("text/plain").send("ok"));

  app.get("/api/status", async () => loadDashboardState(options.dashboard));

  app.get("/", async (_request, reply) => {
    const state = await loadDashboardState(options.dashboard);
    return reply.type("text/html; charset=utf-8").send(renderDashboard(state));
  });

  return app;
}
