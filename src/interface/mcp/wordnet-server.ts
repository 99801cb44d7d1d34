import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { ExploreWordNetUseCase } from "../../application/use-cases/explore-wordnet.usecase";
import {
  buildExploreWordNetUseCase,
  createLogger,
} from "../../bootstrap/wordnet-service";
import { LANGUAGES } from "../../domain/constants/languages";
import { ConfigManager, type ServerConfig } from "../../infrastructure/config/config-manager";
import type { Result } from "../../infrastructure/result/result";

// Define input validation schemas once
const languageSchema = z
  .enum(LANGUAGES)
  .optional()
  .describe("WordNet language view (defaults to the configured language)");

const synsetIdSchema = z
  .string()
  .min(3)
  .max(32)
  .describe("Synset id such as 'n#02084071'");

const posSchema = z
  .enum(["n", "v", "a", "r", "*"])
  .optional()
  .describe("Part of speech: n, v, a, r, or * for any");

const limitSchema = z.number().int().min(1).max(100).optional();

type ToolResponse = {
  content: { type: "text"; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

/** Registers the WordNet tools on a new MCP server. */
export function createWordNetServer(
  useCase: ExploreWordNetUseCase,
  settings: ServerConfig,
): McpServer {
  const server = new McpServer({
    name: settings.name,
    version: settings.version,
  });

  server.registerTool(
    "lookup_lemma",
    {
      title: "Look up a lemma",
      description:
        "Resolve a word or phrase to its lemma, with synsets, synonyms, antonyms, derivates and (for Latin) morphology. Fails listing candidates when the form is ambiguous; pass pos, id or tag to disambiguate.",
      inputSchema: {
        form: z.string().min(1).max(100).describe("Surface form; spaces or underscores"),
        pos: posSchema,
        id: z.string().max(32).optional().describe("Morpho id (Latin)"),
        tag: z.string().max(16).optional().describe("Morphological tag (Latin)"),
        language: languageSchema,
      },
    },
    async (args) =>
      buildToolResponse(useCase.lookupLemma(args), `No lemma "${args.form}" found.`),
  );

  server.registerTool(
    "get_synset",
    {
      title: "Get a synset",
      description:
        "Fetch a synset by id with its lemmas, gloss, semantic fields and outgoing relations.",
      inputSchema: {
        id: synsetIdSchema,
        language: languageSchema,
      },
    },
    async (args) => buildToolResponse(useCase.getSynset(args), `No synset ${args.id} found.`),
  );

  server.registerTool(
    "synset_closure",
    {
      title: "Transitive closure of a synset",
      description:
        "Walk one relation type breadth first from a synset (e.g. '@' for hypernyms, '~' for hyponyms).",
      inputSchema: {
        id: synsetIdSchema,
        type: z.string().min(1).max(3).describe("Relation type code"),
        depth: z.number().int().min(0).optional().describe("Maximum depth; omit for unbounded"),
        limit: limitSchema,
        language: languageSchema,
      },
    },
    async (args) => buildToolResponse(useCase.closure(args), `No synset ${args.id} found.`),
  );

  server.registerTool(
    "synset_hierarchy",
    {
      title: "Hypernym hierarchy of a synset",
      description: "Roots, root paths and minimum/maximum depth of a synset in the hypernym hierarchy.",
      inputSchema: {
        id: synsetIdSchema,
        language: languageSchema,
      },
    },
    async (args) => buildToolResponse(useCase.hierarchy(args), `No synset ${args.id} found.`),
  );

  server.registerTool(
    "get_semfield",
    {
      title: "Get a semantic field",
      description:
        "Fetch a semantic field by English name, with its broader and narrower fields. Pass code when the name is shared by several fields.",
      inputSchema: {
        english: z.string().min(1).max(100),
        code: z.string().max(32).optional(),
        language: languageSchema,
      },
    },
    async (args) =>
      buildToolResponse(useCase.getSemfield(args), `No semantic field "${args.english}" found.`),
  );

  server.registerTool(
    "search_lemmas",
    {
      title: "Search lemmas by prefix",
      description: "Find lemmas whose words start with the given terms.",
      inputSchema: {
        input: z.string().min(1).max(200).describe("One or more words, comma or space separated"),
        limit: limitSchema,
        language: languageSchema,
      },
    },
    async (args) => buildToolResponse(await useCase.searchLemmas(args), "No lemmas found."),
  );

  return server;
}

export async function startMcpServer(): Promise<void> {
  const config = ConfigManager.fromEnvironment(process.env);
  const logger = createLogger(config);
  const settings = config.getServerConfig();

  const server = createWordNetServer(buildExploreWordNetUseCase(config, logger), settings);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("WordNet MCP server started", {
    name: settings.name,
    language: config.getDefaultsConfig().language,
  });
}

export function buildToolResponse<T>(result: Result<T | undefined>, notFound: string): ToolResponse {
  const error = result.error;
  if (error) {
    return {
      isError: true,
      content: [{ type: "text", text: `${error.name}: ${error.message}` }],
    };
  }

  const data = result.data;
  if (data === undefined) {
    return { content: [{ type: "text", text: notFound }] };
  }

  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
    structuredContent: { result: data },
  };
}
