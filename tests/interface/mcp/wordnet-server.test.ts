import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildExploreWordNetUseCase } from "../../../src/bootstrap/wordnet-service";
import { ConfigManager } from "../../../src/infrastructure/config/config-manager";
import { SilentLogger } from "../../../src/infrastructure/logging/logger";
import { Result } from "../../../src/infrastructure/result/result";
import {
  buildToolResponse,
  createWordNetServer,
} from "../../../src/interface/mcp/wordnet-server";
import { createFixtureStore } from "../../helpers/fixture-store";

async function callTool(client: Client, name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  return {
    isError: result.isError ?? false,
    text: first?.type === "text" ? first.text : "",
  };
}

describe("WordNet MCP server", () => {
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    const config = new ConfigManager();
    const useCase = buildExploreWordNetUseCase(config, new SilentLogger(), createFixtureStore());
    server = createWordNetServer(useCase, config.getServerConfig());
    client = new Client({ name: "test-client", version: "0.0.0" });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("lists every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "get_semfield",
      "get_synset",
      "lookup_lemma",
      "search_lemmas",
      "synset_closure",
      "synset_hierarchy",
    ]);
  });

  it("returns views as JSON text", async () => {
    const response = await callTool(client, "synset_hierarchy", { id: "n#02084071" });
    expect(response.isError).toBe(false);
    expect(JSON.parse(response.text)).toMatchObject({ maxDepth: 6, minDepth: 2 });
  });

  it("reports lookup failures as tool errors", async () => {
    const response = await callTool(client, "lookup_lemma", { form: "run" });
    expect(response).toEqual({
      isError: true,
      text: 'DisambiguationError: cannot disambiguate "run" between "n, v"',
    });
  });

  it("reports a miss as plain text", async () => {
    const response = await callTool(client, "get_synset", { id: "n#99999999" });
    expect(response).toEqual({ isError: false, text: "No synset n#99999999 found." });
  });

  it("searches lemmas in the requested language", async () => {
    const response = await callTool(client, "search_lemmas", { input: "ca", language: "italian" });
    const view: unknown = JSON.parse(response.text);
    expect(view).toMatchObject({ terms: ["ca"] });
    expect(response.text).toContain('"form": "cagnolino"');
  });
});

describe("buildToolResponse", () => {
  it("wraps data as text and structured content", () => {
    expect(buildToolResponse(Result.success({ id: "n#1" }), "missing")).toEqual({
      content: [{ type: "text", text: '{\n  "id": "n#1"\n}' }],
      structuredContent: { result: { id: "n#1" } },
    });
  });

  it("uses the fallback text for a miss", () => {
    expect(buildToolResponse(Result.success(undefined), "missing")).toEqual({
      content: [{ type: "text", text: "missing" }],
    });
  });

  it("flags failures", () => {
    expect(buildToolResponse(Result.failure(new Error("boom")), "missing")).toEqual({
      isError: true,
      content: [{ type: "text", text: "Error: boom" }],
    });
  });
});
