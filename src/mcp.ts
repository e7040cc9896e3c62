import { randomUUID } from "node:crypto";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { WebStandardStreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod/v4";

import { errorDocument } from "./errors";
import { toolArgSchemas } from "./facade";
import type { MemoryFacade, ToolPolicy, ToolResult } from "./facade";
import type { Logger } from "./logger";
import type { MemoryToolName } from "./types";

const agentIdSchema = z.string().min(1).describe("Agent whose memory the call reads or writes");

interface McpSession {
  server: McpServer;
  transport: WebStandardStreamableHTTPServerTransport;
}

async function respond(run: () => Promise<ToolResult>): Promise<CallToolResult> {
  try {
    const result = await run();
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
      structuredContent: result,
    };
  } catch (error) {
    return {
      isError: true,
      content: [{ type: "text", text: JSON.stringify(errorDocument(error)) }],
    };
  }
}

export function buildMcpServer(facade: MemoryFacade, policy: ToolPolicy): McpServer {
  const server = new McpServer({
    name: "agent-memory-engine",
    version: "0.1.0",
  });

  const call = (tool: MemoryToolName, agentId: string, args: Record<string, unknown>, signal: AbortSignal) =>
    respond(() => facade.invoke(tool, { agentId, policy, args, signal }));

  server.registerTool(
    "memory.search",
    {
      title: "Search Memory",
      description: "Search working memory items by full-text query, falling back to importance order.",
      inputSchema: { agent_id: agentIdSchema, ...toolArgSchemas["memory.search"].shape },
    },
    async ({ agent_id, ...args }, extra) => call("memory.search", agent_id, args, extra.signal),
  );

  server.registerTool(
    "memory.write",
    {
      title: "Write Memory",
      description: "Write a working memory item.",
      inputSchema: { agent_id: agentIdSchema, ...toolArgSchemas["memory.write"].shape },
    },
    async ({ agent_id, ...args }, extra) => call("memory.write", agent_id, args, extra.signal),
  );

  server.registerTool(
    "memory.update",
    {
      title: "Update Memory",
      description: "Update fields of an existing memory item. Omitted fields keep their value.",
      inputSchema: { agent_id: agentIdSchema, ...toolArgSchemas["memory.update"].shape },
    },
    async ({ agent_id, ...args }, extra) => call("memory.update", agent_id, args, extra.signal),
  );

  server.registerTool(
    "memory.forget",
    {
      title: "Forget Memory",
      description: "Forget a memory item by id.",
      inputSchema: { agent_id: agentIdSchema, ...toolArgSchemas["memory.forget"].shape },
    },
    async ({ agent_id, ...args }, extra) => call("memory.forget", agent_id, args, extra.signal),
  );

  server.registerTool(
    "memory.health",
    {
      title: "Memory Health",
      description: "Item counts per status, database size and embedding statistics.",
      inputSchema: { agent_id: agentIdSchema },
    },
    async ({ agent_id }, extra) => call("memory.health", agent_id, {}, extra.signal),
  );

  server.registerTool(
    "decision.log",
    {
      title: "Log Decision",
      description: "Store a decision as a memory item and record it in the event journal.",
      inputSchema: { agent_id: agentIdSchema, ...toolArgSchemas["decision.log"].shape },
    },
    async ({ agent_id, ...args }, extra) => call("decision.log", agent_id, args, extra.signal),
  );

  server.registerTool(
    "memory.checkpoint",
    {
      title: "Checkpoint Memory",
      description: "Distill events recorded since the last checkpoint into memory items.",
      inputSchema: { agent_id: agentIdSchema, ...toolArgSchemas["memory.checkpoint"].shape },
    },
    async ({ agent_id, ...args }, extra) => call("memory.checkpoint", agent_id, args, extra.signal),
  );

  server.registerTool(
    "memory.maintenance",
    {
      title: "Memory Maintenance",
      description: "Archive duplicate and stale items, compact storage and report items needing review.",
      inputSchema: { agent_id: agentIdSchema, ...toolArgSchemas["memory.maintenance"].shape },
    },
    async ({ agent_id, ...args }, extra) => call("memory.maintenance", agent_id, args, extra.signal),
  );

  return server;
}

export interface McpHandler {
  handle(request: Request): Promise<Response>;
  close(): Promise<void>;
}

/** Streamable HTTP endpoint keeping one server and transport per MCP session. */
export function createMcpHandler(facade: MemoryFacade, policy: ToolPolicy, log: Logger): McpHandler {
  const sessions = new Map<string, McpSession>();

  async function closeSession(session: McpSession): Promise<void> {
    await session.server.close();
    await session.transport.close();
  }

  async function handle(request: Request): Promise<Response> {
    const incomingSessionId = request.headers.get("mcp-session-id");
    if (incomingSessionId) {
      const existing = sessions.get(incomingSessionId);
      if (!existing) {
        return Response.json(
          {
            jsonrpc: "2.0",
            error: { code: -32001, message: `Unknown MCP session: ${incomingSessionId}` },
            id: null,
          },
          { status: 404 },
        );
      }
      return existing.transport.handleRequest(request);
    }

    const server = buildMcpServer(facade, policy);
    const transport = new WebStandardStreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
      onsessioninitialized: (sessionId) => {
        sessions.set(sessionId, { server, transport });
        log.debug({ sessionId }, "mcp session opened");
      },
      onsessionclosed: async (sessionId) => {
        const current = sessions.get(sessionId);
        if (!current) return;
        sessions.delete(sessionId);
        await closeSession(current);
      },
    });

    await server.connect(transport);
    const response = await transport.handleRequest(request);
    if (!response.headers.get("mcp-session-id")) {
      await closeSession({ server, transport });
    }
    return response;
  }

  async function close(): Promise<void> {
    const open = [...sessions.values()];
    sessions.clear();
    await Promise.all(open.map(closeSession));
  }

  return { handle, close };
}
