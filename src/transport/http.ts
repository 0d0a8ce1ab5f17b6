import { randomUUID, timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import type { Request, Response, NextFunction } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createMcpServerInstance } from "../server.js";
import type { Connector } from "../connectors/interface.js";
import type { AppConfig, HttpTransportConfig } from "../config/types.js";
import { getLogger } from "../utils/logger.js";

export interface SessionEntry {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  lastAccessedAt: number;
}

type App = ReturnType<typeof createMcpExpressApp>;

export function isAuthorized(authHeader: string | undefined, token: string): boolean {
  const expectedBuf = Buffer.from(`Bearer ${token}`);
  const actualBuf = Buffer.from(authHeader ?? "");
  return actualBuf.length === expectedBuf.length && timingSafeEqual(actualBuf, expectedBuf);
}

export async function closeSession(entry: SessionEntry): Promise<void> {
  const logger = getLogger();
  await entry.transport.close().catch((err: unknown) => {
    logger.warn("Failed to close session transport", { error: String(err) });
  });
  await entry.server.close().catch((err: unknown) => {
    logger.warn("Failed to close session server", { error: String(err) });
  });
}

export async function startHttpTransport(config: AppConfig, transportConfig: HttpTransportConfig, connector: Connector) {
  const logger = getLogger();
  const sessions = new Map<string, SessionEntry>();

  const { host, port } = transportConfig;
  const app = createMcpExpressApp({ host });

  const auth = transportConfig.auth;
  if (auth) {
    app.use("/mcp", (req: Request, res: Response, next: NextFunction) => {
      if (!isAuthorized(req.headers.authorization, auth.token)) {
        res.status(401).json({ error: "Unauthorized" });
        return;
      }
      next();
    });
  }

  let cleanupInterval: ReturnType<typeof setInterval> | undefined;

  if (transportConfig.stateless) {
    setupStatelessRoutes(app, connector, config);
  } else {
    setupStatefulRoutes(app, connector, config, sessions);

    const sessionTimeout = transportConfig.sessionTimeout;
    cleanupInterval = setInterval(() => {
      const now = Date.now();
      for (const [sid, entry] of sessions) {
        if (now - entry.lastAccessedAt > sessionTimeout) {
          logger.info("Cleaning up expired session", { sessionId: sid });
          sessions.delete(sid);
          void closeSession(entry);
        }
      }
    }, 60_000);
    cleanupInterval.unref();
  }

  setupHealthEndpoint(app, connector, config, sessions);

  const httpServer = await new Promise<Server>((resolve) => {
    const server = app.listen(port, host, () => {
      resolve(server);
    });
  });

  logger.info(`HTTP server listening on http://${host}:${port}/mcp`);
  logger.info(`Health check: http://${host}:${port}/health`);
  logger.info(`Mode: ${transportConfig.stateless ? "stateless" : "stateful (session-based)"}`);

  return { httpServer, sessions, cleanupInterval };
}

function setupStatelessRoutes(app: App, connector: Connector, config: AppConfig) {
  app.all("/mcp", async (req: Request, res: Response) => {
    const server = createMcpServerInstance(connector, config);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);

    // No session survives the request
    await closeSession({ transport, server, lastAccessedAt: Date.now() });
  });
}

function setupStatefulRoutes(app: App, connector: Connector, config: AppConfig, sessions: Map<string, SessionEntry>) {
  app.all("/mcp", async (req: Request, res: Response) => {
    const header = req.headers["mcp-session-id"];
    const sessionId = typeof header === "string" ? header : undefined;

    if (sessionId) {
      const session = sessions.get(sessionId);
      if (!session) {
        res.status(404).json({ error: "Session not found" });
        return;
      }
      session.lastAccessedAt = Date.now();
      await session.transport.handleRequest(req, res, req.body);
      return;
    }

    const server = createMcpServerInstance(connector, config);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        sessions.set(newSessionId, { transport, server, lastAccessedAt: Date.now() });
      },
    });

    transport.onclose = () => {
      const sid = transport.sessionId;
      if (sid) {
        sessions.delete(sid);
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  });
}

function setupHealthEndpoint(app: App, connector: Connector, config: AppConfig, sessions: Map<string, SessionEntry>) {
  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      server: config.server.name,
      connector: connector.type,
      activeSessions: sessions.size,
    });
  });
}
