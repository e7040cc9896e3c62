import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, describe, expect, it } from "vitest";

import { AllowListPolicy, MemoryFacade } from "../src/facade";
import type { ToolPolicy } from "../src/facade";
import { buildMcpServer } from "../src/mcp";
import { MEMORY_TOOL_NAMES } from "../src/types";
import { useTempDir } from "./helpers";

const tempDir = useTempDir("mcp-");
const connections: Array<{ client: Client; server: McpServer }> = [];

afterEach(async () => {
  for (const { client, server } of connections.splice(0)) {
    await client.close();
    await server.close();
  }
});

async function connect(policy: ToolPolicy = new AllowListPolicy()): Promise<Client> {
  const root = tempDir();
  const facade = new MemoryFacade({ agentsDir: join(root, "agents"), settingsPath: join(root, "config.json") });
  const server = buildMcpServer(facade, policy);
  const client = new Client({ name: "memory-test-client", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  connections.push({ client, server });
  return client;
}

async function call(client: Client, name: string, args: Record<string, unknown>): Promise<CallToolResult> {
  return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
}

function text(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === "text" ? first.text : "";
}

describe("MCP tools", () => {
  it("lists every memory tool", async () => {
    const client = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([...MEMORY_TOOL_NAMES].sort());
  });

  it("writes and searches through tool calls", async () => {
    const client = await connect();
    const written = await call(client, "memory.write", {
      agent_id: "agent-a",
      kind: "preference",
      title: "Tone",
      content: "Keep answers short",
    });
    expect(written.isError).toBeFalsy();
    expect(written.structuredContent).toMatchObject({ written: true, item: { title: "Tone", importance: 3 } });

    const found = await call(client, "memory.search", { agent_id: "agent-a", query: "short" });
    expect(found.structuredContent).toMatchObject({ count: 1, mode: "fts" });
    expect(JSON.parse(text(found))).toMatchObject({ count: 1 });
  });

  it("keeps agents apart", async () => {
    const client = await connect();
    await call(client, "memory.write", { agent_id: "agent-a", kind: "fact", title: "Secret", content: "alpha" });

    const other = await call(client, "memory.search", { agent_id: "agent-b", query: "alpha" });
    expect(other.structuredContent).toMatchObject({ count: 0 });
  });

  it("returns policy refusals as tool errors", async () => {
    const client = await connect(new AllowListPolicy(["memory.search"]));
    const result = await call(client, "memory.forget", { agent_id: "agent-a", id: "mem_1" });

    expect(result.isError).toBe(true);
    expect(JSON.parse(text(result))).toEqual({
      error: {
        kind: "policy_denied",
        code: "tool_not_allowed",
        message: "tool memory.forget is not allowed for agent agent-a",
      },
    });
  });
});
