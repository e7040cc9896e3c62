import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { z } from "zod/v4";

import { errorDocument, toMemoryError } from "./errors";
import type { ErrorKind } from "./errors";
import { AllowListPolicy, isMemoryToolName } from "./facade";
import type { MemoryFacade, ToolPolicy } from "./facade";
import { JournalPool } from "./journal/pool";
import { logger as rootLogger } from "./logger";
import type { Logger } from "./logger";
import { createMcpHandler } from "./mcp";
import { EVENT_TYPES } from "./types";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  invalid_input: 400,
  not_found: 404,
  backpressure_drop: 429,
  closed: 503,
  policy_denied: 403,
  transport_failure: 502,
  parse_failure: 502,
  storage_failure: 500,
  timeout: 504,
};

const eventBodySchema = z.object({
  id: z.string().optional(),
  type: z.enum(EVENT_TYPES),
  timestamp: z.iso.datetime({ offset: true }).optional(),
  text: z.string().optional(),
  session_id: z.string().optional(),
  run_id: z.string().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

const TOOL_ROUTE = /^\/agents\/([^/]+)\/tools\/([^/]+)$/;
const EVENTS_ROUTE = /^\/agents\/([^/]+)\/events$/;

function errorResponse(error: unknown): Response {
  const doc = errorDocument(error);
  return Response.json(doc, { status: STATUS_BY_KIND[doc.error.kind] });
}

async function parseJson(request: Request): Promise<unknown> {
  const raw = await request.text();
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw toMemoryError(error, "invalid_input");
  }
}

export interface AppOptions {
  facade: MemoryFacade;
  agentsDir: string;
  settingsPath: string;
  policy?: ToolPolicy;
  logger?: Logger;
}

export interface App {
  handle(request: Request): Promise<Response>;
  journals: JournalPool;
  close(): Promise<void>;
}

/** Request router over web-standard Request/Response, independent of the listening server. */
export function createApp(options: AppOptions): App {
  const log = (options.logger ?? rootLogger).child({ component: "server" });
  const policy = options.policy ?? new AllowListPolicy();
  const journals = new JournalPool(options.agentsDir, options.settingsPath, log);
  const mcp = createMcpHandler(options.facade, policy, log);

  async function ingest(agentId: string, request: Request): Promise<Response> {
    const parsed = eventBodySchema.safeParse(await parseJson(request));
    if (!parsed.success) {
      return Response.json(
        { error: { kind: "invalid_input", message: z.prettifyError(parsed.error) } },
        { status: 400 },
      );
    }
    const body = parsed.data;
    const journal = await journals.get(agentId);
    const outcome = journal.ingest({
      id: body.id,
      type: body.type,
      timestamp: body.timestamp,
      text: body.text,
      sessionId: body.session_id,
      runId: body.run_id,
      metadata: body.metadata,
    });
    if (outcome === "queue_full") {
      return Response.json(
        {
          error: { kind: "backpressure_drop", code: "queue_full", message: "journal queue is full" },
          dropped_events: journal.stats().droppedEvents,
        },
        { status: 429 },
      );
    }
    if (outcome === "closed") {
      return Response.json({ error: { kind: "closed", message: "journal is closed" } }, { status: 503 });
    }
    return Response.json({ accepted: true }, { status: 202 });
  }

  async function handle(request: Request): Promise<Response> {
    const url = new URL(request.url);
    try {
      if (url.pathname === "/health" && request.method === "GET") {
        const agents = Object.fromEntries(
          Object.entries(journals.stats()).map(([agentId, stats]) => [agentId, { dropped_events: stats.droppedEvents }]),
        );
        return Response.json({ ok: true, service: "agent-memory-engine", agents });
      }

      if (url.pathname === "/mcp") {
        return await mcp.handle(request);
      }

      const toolMatch = TOOL_ROUTE.exec(url.pathname);
      if (toolMatch && request.method === "POST") {
        const agentId = decodeURIComponent(toolMatch[1]);
        const tool = decodeURIComponent(toolMatch[2]);
        if (!isMemoryToolName(tool)) {
          return Response.json({ error: { kind: "not_found", message: `unknown tool: ${tool}` } }, { status: 404 });
        }
        const result = await options.facade.invoke(tool, {
          agentId,
          policy,
          args: await parseJson(request),
          signal: request.signal,
        });
        return Response.json(result);
      }

      const eventsMatch = EVENTS_ROUTE.exec(url.pathname);
      if (eventsMatch && request.method === "POST") {
        return await ingest(decodeURIComponent(eventsMatch[1]), request);
      }

      return Response.json({ error: { kind: "not_found", message: "not_found" } }, { status: 404 });
    } catch (error) {
      const normalized = toMemoryError(error);
      if (STATUS_BY_KIND[normalized.kind] >= 500) {
        log.error({ err: normalized, path: url.pathname }, "request failed");
      }
      return errorResponse(normalized);
    }
  }

  async function close(): Promise<void> {
    await mcp.close();
    await journals.closeAll();
  }

  return { handle, journals, close };
}

async function toWebRequest(req: IncomingMessage, origin: string, signal: AbortSignal): Promise<Request> {
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) value.forEach((entry) => headers.append(name, entry));
    else if (value !== undefined) headers.set(name, value);
  }

  const method = req.method ?? "GET";
  let body: Buffer | undefined;
  if (method !== "GET" && method !== "HEAD") {
    const chunks: Buffer[] = [];
    for await (const chunk of req) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    body = Buffer.concat(chunks);
  }
  return new Request(new URL(req.url ?? "/", origin), { method, headers, body, signal });
}

async function writeWebResponse(response: Response, res: ServerResponse): Promise<void> {
  res.writeHead(response.status, Object.fromEntries(response.headers));
  if (response.body) {
    const reader = response.body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      res.write(value);
    }
  }
  res.end();
}

export interface ListenOptions {
  host: string;
  port: number;
}

export function startServer(app: App, listen: ListenOptions, log: Logger = rootLogger): Promise<Server> {
  const origin = `http://${listen.host}:${listen.port}`;
  const server = createServer((req, res) => {
    const controller = new AbortController();
    res.on("close", () => controller.abort());
    toWebRequest(req, origin, controller.signal)
      .then((request) => app.handle(request))
      .then((response) => writeWebResponse(response, res))
      .catch((error: unknown) => {
        log.error({ err: error }, "failed to serve request");
        if (!res.headersSent) res.writeHead(500, { "content-type": "application/json" });
        res.end(JSON.stringify(errorDocument(error)));
      });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(listen.port, listen.host, () => {
      server.off("error", reject);
      log.info({ url: origin }, "server listening");
      resolve(server);
    });
  });
}
