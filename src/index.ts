/**
 * MCP server for natural-language schema questions.
 *
 * Exposes three tools:
 *   - ask_schema: answer a question about the scanned files
 *   - schema_help: example questions and the analysis catalog
 *   - schema_status: active strategy chain, capabilities and endpoint health
 *
 * `createApp` is the composition root used by the stdio entry point and the
 * debug script; `createServer` only wires an existing resolver to MCP.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import pg from "pg"
import { z } from "zod"
import { toSchemaQueryError, type Logger } from "./config.js"
import { connectionString, STRATEGY_SETTINGS, type AppConfig } from "./config/loadConfig.js"
import { OllamaClient } from "./ollama_client.js"
import { formatFailure, QueryResolver } from "./query_resolver.js"
import { PgSchemaStore, type SchemaStore } from "./schema_store.js"
import { registerSchemaTools } from "./schema_tools.js"
import { SemanticMatcher } from "./semantic_matcher.js"
import { ToolRegistry } from "./tool_registry.js"

export const SERVER_NAME = "schemascope"
export const SERVER_VERSION = "0.1.0"

// ============================================================================
// Launch options
// ============================================================================

/** Overrides accepted as a JSON argument on the command line. */
export const launchOptionsSchema = z
	.object({
		databaseUrl: z.string().min(1).optional(),
		model: z.string().min(1).optional(),
		strategy: z.enum(STRATEGY_SETTINGS).optional(),
	})
	.strict()

export type LaunchOptions = z.infer<typeof launchOptionsSchema>

export function applyLaunchOptions(config: AppConfig, options: LaunchOptions): AppConfig {
	return {
		...config,
		database: { ...config.database, url: options.databaseUrl ?? config.database.url },
		model: {
			...config.model,
			llm: options.model ?? config.model.llm,
			strategy: options.strategy ?? config.model.strategy,
		},
	}
}

// ============================================================================
// Tool handlers
// ============================================================================

export interface ServerContext {
	resolver: QueryResolver
	store: SchemaStore
	logger: Logger
}

export interface AskSchemaInput {
	question: string
	files?: string[]
}

/**
 * Answer one question. Without `files`, every scanned file is in scope; the
 * file list is read before any model call.
 */
export async function askSchema(ctx: ServerContext, input: AskSchemaInput, signal?: AbortSignal): Promise<string> {
	let files: string[]
	if (input.files && input.files.length > 0) {
		files = input.files
	} else {
		try {
			files = (await ctx.store.listAllFiles()).map((f) => f.file_name)
		} catch (error) {
			const err = toSchemaQueryError(error, "tool_execution")
			ctx.logger.error("Could not list scanned files", { error: err.message })
			return formatFailure(input.question, err)
		}
	}
	return ctx.resolver.resolveAndExecute(input.question, files, signal)
}

function text(value: string) {
	return { content: [{ type: "text" as const, text: value }] }
}

export function createServer(ctx: ServerContext): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"ask_schema",
		"Ask a natural-language question about the scanned files: schemas, shared columns, type mismatches, naming inconsistencies, concept groups.",
		{
			question: z.string().describe("The question, e.g. \"which files have a customer_id column?\""),
			files: z.array(z.string()).optional().describe("Limit the question to these files"),
		},
		async ({ question, files }, extra) => text(await askSchema(ctx, { question, files }, extra.signal)),
	)

	server.tool("schema_help", "Example questions and the analyses that can answer them.", async () =>
		text(ctx.resolver.getHelpText()),
	)

	server.tool("schema_status", "Active query strategies, model, inference endpoint health and semantic matching status.", async () =>
		text(JSON.stringify(ctx.resolver.getStatus(), null, 2)),
	)

	return server
}

export default createServer

// ============================================================================
// Composition root
// ============================================================================

export interface App {
	server: McpServer
	context: ServerContext
	close(): Promise<void>
}

export async function createApp(config: AppConfig, logger: Logger): Promise<App> {
	const pool = new pg.Pool({ connectionString: connectionString(config), max: 4 })
	pool.on("error", (error) => logger.error("Idle database client error", { error: error.message }))

	const store = new PgSchemaStore(pool, config.database.table, logger)
	const ollama = new OllamaClient({
		baseUrl: config.model.ollama_url,
		timeoutMs: config.model.timeout_ms,
		embeddingModel: config.model.embedding,
	})

	const matcher = new SemanticMatcher(ollama, { enabled: config.semantic.enabled, logger })
	await matcher.initialize()

	const registry = new ToolRegistry()
	registerSchemaTools(registry, { store, runner: store, matcher, config, logger })

	const resolver = await QueryResolver.create({
		config,
		registry,
		chat: ollama,
		logger,
		semantic: matcher,
		endpoint: ollama,
	})
	const context: ServerContext = { resolver, store, logger }

	return {
		server: createServer(context),
		context,
		close: async () => {
			await pool.end()
		},
	}
}
