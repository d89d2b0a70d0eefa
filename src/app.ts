import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { Runtime } from "./services/createRuntime.js";
import { registerAskQuestionTool } from "./tools/askQuestion.js";
import { describeCorpus, registerCorpusStatsTool } from "./tools/corpusStats.js";
import { registerSearchContextTool } from "./tools/searchContext.js";
import { describeError, logger } from "./utils/logger.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

export const MCP_PATH = "/mcp";
const SERVER_NAME = "multimodal-corpus-qa";
const SERVER_VERSION = "0.1.0";

const askBodySchema = z.object({
  question: z.string(),
});

const searchBodySchema = z.object({
  query: z.string().min(2),
  top_k: z.number().int().min(1).max(20).optional(),
});

export interface HttpServerHandle {
  port: number;
  close: () => Promise<void>;
}

export function createAppServer(runtime: Runtime): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Reports whether the corpus is loaded and how much of it is embedded.",
      inputSchema: {},
    },
    async () => {
      const index = await runtime.summaryIndex.stats();
      const documents = await runtime.documentStore.size();
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({
              status: documents > 0 ? "ready" : "empty_corpus",
              documents,
              embedded_summaries: index.embedded,
            }),
          },
        ],
      };
    },
  );

  registerAskQuestionTool(server, runtime.service);
  registerSearchContextTool(server, runtime.service);
  registerCorpusStatsTool(server, runtime);

  return server;
}

export async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

export async function runHttpServer(
  host: string,
  port: number,
  runtime: Runtime,
  serverFactory: () => McpServer,
): Promise<HttpServerHandle> {
  const sessions: SessionMap = {};

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ ok: true }));
        return;
      }

      if (url.pathname.startsWith("/api/")) {
        await handleRestRequest(req, res, url.pathname, runtime);
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        const body = await readJsonBody(req);
        await handleMcpPost(req, res, body, sessions, serverFactory);
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await handleSessionRequest(req, res, sessions);
        return;
      }

      res.writeHead(405, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Method not allowed" }));
    } catch (error) {
      logger.error("HTTP request failed", { path: req.url, error: describeError(error) });
      if (!res.headersSent) {
        writeJson(res, 500, { error: describeError(error) });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(port, host, () => resolve());
    httpServer.once("error", reject);
  });

  const address = httpServer.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;

  const close = async () => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };

  return { port: boundPort, close };
}

async function handleRestRequest(
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string,
  runtime: Runtime,
) {
  if (pathname === "/api/corpus" && req.method === "GET") {
    writeJson(res, 200, await describeCorpus(runtime));
    return;
  }

  if (req.method !== "POST") {
    writeJson(res, 405, { error: "Method not allowed" });
    return;
  }

  if (pathname === "/api/ask") {
    const body = askBodySchema.safeParse(await readJsonBody(req));
    if (!body.success) {
      writeJson(res, 400, { error: "Body must be { question: string }." });
      return;
    }
    writeJson(res, 200, await runtime.service.handleQuery(body.data.question));
    return;
  }

  if (pathname === "/api/search") {
    const body = searchBodySchema.safeParse(await readJsonBody(req));
    if (!body.success) {
      writeJson(res, 400, { error: "Body must be { query: string, top_k?: number }." });
      return;
    }
    writeJson(res, 200, await runtime.service.searchContext(body.data.query, body.data.top_k));
    return;
  }

  writeJson(res, 404, { error: "Not found" });
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : null;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId && !existing) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    entry.server.close().catch((error: unknown) => {
      logger.warn("Failed to close MCP session", { error: describeError(error) });
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleSessionRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
) {
  const sessionId = getSessionId(req);
  if (!sessionId || !sessions[sessionId]) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing or invalid mcp-session-id");
    return;
  }

  await sessions[sessionId].transport.handleRequest(req, res);
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON body");
  }
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJson(res: ServerResponse, httpCode: number, body: unknown) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code, message },
      id: null,
    }),
  );
}

