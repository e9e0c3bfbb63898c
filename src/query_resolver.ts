/**
 * Query Resolver
 *
 * Single entry point for a question. Strategies are tried in priority order;
 * each produces a plan, the registry validates and executes it, and any
 * failure moves on to the next strategy (after repair attempts, for
 * strategies that support them). Pattern matching always closes the chain,
 * so every question gets an answer or a short explanation. Nothing here
 * throws to the caller.
 */

import { v4 as uuidv4 } from "uuid"
import {
	isFallbackError,
	SchemaQueryError,
	suggestionFor,
	toSchemaQueryError,
	type Logger,
} from "./config.js"
import type { AppConfig, StrategySetting } from "./config/loadConfig.js"
import type { ChatClient } from "./ollama_client.js"
import type { QueryStrategy, StrategyContext, StrategyTag, ValidatedPlan } from "./resolution_plan.js"
import { FunctionCallingStrategy } from "./strategies/function_calling.js"
import { PatternMatchingStrategy } from "./strategies/pattern_matching.js"
import { SqlGenerationStrategy } from "./strategies/sql_generation.js"
import { StructuredOutputStrategy } from "./strategies/structured_output.js"
import type { ToolRegistry } from "./tool_registry.js"

// ============================================================================
// Types
// ============================================================================

export type ResolverConfig = Pick<AppConfig, "model" | "sql" | "response" | "database">

export interface QueryResolverDeps {
	config: ResolverConfig
	registry: ToolRegistry
	/** null runs pattern matching only */
	chat: ChatClient | null
	logger: Logger
	semantic?: { readonly available: boolean }
	/** Inference endpoint whose health the status reports */
	endpoint?: { getStatus(): { healthy: boolean; baseUrl: string } }
}

export interface ResolverStatus {
	active_strategy: StrategyTag
	strategies: StrategyTag[]
	capabilities: Record<StrategyTag, boolean>
	semantic_available: boolean
	model: string
	endpoint: { healthy: boolean; base_url: string } | null
}

type AttemptOutcome = { ok: true; text: string } | { ok: false; error: SchemaQueryError }

export const EMPTY_QUERY_PROMPT =
	"Ask a question about the scanned files, for example \"which columns have type mismatches?\""

const EXAMPLE_QUESTIONS = [
	"list all files",
	"show the schema of orders.csv",
	"which files have a customer_id column",
	"detect type mismatches",
	"which columns are shared by 3 files",
	"compare orders.csv and users.csv",
	"are there naming inconsistencies?",
	"group columns by concept",
	"give me a database summary",
	"which columns have missing values",
	"what types does customer_id have",
]

function endpointStatus(endpoint: QueryResolverDeps["endpoint"]): ResolverStatus["endpoint"] {
	if (!endpoint) return null
	const { healthy, baseUrl } = endpoint.getStatus()
	return { healthy, base_url: baseUrl }
}

export function formatFailure(query: string, error: SchemaQueryError): string {
	return `Could not answer "${query}": ${error.message}\nSuggestion: ${suggestionFor(error.kind)}`
}

// ============================================================================
// Strategy selection
// ============================================================================

export function supportsFunctionCalling(model: string, markers: string[]): boolean {
	const id = model.toLowerCase()
	return markers.some((m) => m.length > 0 && id.includes(m.toLowerCase()))
}

function byPriority(strategies: QueryStrategy[]): QueryStrategy[] {
	return [...strategies].sort((a, b) => b.priority - a.priority)
}

/**
 * Strategy chain for the configured setting. An explicit setting runs that
 * strategy then pattern matching; `auto` adds function calling when the
 * model id carries a tool-calling marker and structured output when the
 * chat endpoint answers its health check.
 */
export async function selectStrategies(
	config: ResolverConfig,
	chat: ChatClient | null,
	logger: Logger,
): Promise<QueryStrategy[]> {
	const pattern = new PatternMatchingStrategy()
	const model = config.model.llm
	const options = { model, logger }
	const setting: StrategySetting = config.model.strategy

	if (setting === "pattern_matching") return [pattern]
	if (!chat) {
		if (setting !== "auto") logger.warn("No chat client; using pattern matching only", { strategy: setting })
		return [pattern]
	}

	switch (setting) {
		case "function_calling":
			return [new FunctionCallingStrategy(chat, options), pattern]
		case "structured_output":
			return [new StructuredOutputStrategy(chat, options), pattern]
		case "sql_generation":
			return [
				new SqlGenerationStrategy(chat, {
					...options,
					table: config.database.table,
					maxRetries: config.sql.max_retries,
				}),
				pattern,
			]
		case "auto":
			break
	}

	const chain: QueryStrategy[] = [pattern]
	if (supportsFunctionCalling(model, config.model.function_calling_markers)) {
		chain.push(new FunctionCallingStrategy(chat, options))
	}
	let healthy = false
	try {
		healthy = await chat.healthCheck()
	} catch (error) {
		logger.warn("Chat endpoint health check failed", { error: error instanceof Error ? error.message : String(error) })
	}
	if (healthy) chain.push(new StructuredOutputStrategy(chat, options))
	return byPriority(chain)
}

// ============================================================================
// Resolver
// ============================================================================

export class QueryResolver {
	private constructor(
		private readonly deps: QueryResolverDeps,
		private readonly strategies: QueryStrategy[],
	) {}

	static async create(deps: QueryResolverDeps, strategies?: QueryStrategy[]): Promise<QueryResolver> {
		const chain = strategies ?? (await selectStrategies(deps.config, deps.chat, deps.logger))
		const hasTerminal = chain.some((s) => s.tag === "pattern_matching")
		const resolved = hasTerminal ? byPriority(chain) : [...byPriority(chain), new PatternMatchingStrategy()]
		deps.logger.info("Query resolver ready", {
			strategies: resolved.map((s) => s.tag),
			model: deps.config.model.llm,
		})
		return new QueryResolver(deps, resolved)
	}

	get activeStrategy(): StrategyTag {
		return this.strategies[0].tag
	}

	/** Answer `query`; failures come back as text, never as a rejection. */
	async resolveAndExecute(query: string, availableFiles: string[], signal?: AbortSignal): Promise<string> {
		const trimmed = query.trim()
		if (trimmed.length === 0) return EMPTY_QUERY_PROMPT

		const queryId = uuidv4()
		const startTime = Date.now()
		const { logger } = this.deps
		logger.info("Query received", { query_id: queryId, query: trimmed, files: availableFiles.length })

		let lastError: SchemaQueryError | null = null
		for (const [index, strategy] of this.strategies.entries()) {
			const context: StrategyContext = {
				availableFiles,
				registry: this.deps.registry,
				signal,
				isFallback: index > 0,
			}
			const outcome = await this.attempt(strategy, trimmed, context, queryId)
			if (outcome.ok) {
				const text = await this.synthesizeResponse(trimmed, outcome.text, signal)
				logger.info("Query answered", {
					query_id: queryId,
					strategy: strategy.tag,
					latency_ms: Date.now() - startTime,
				})
				return text
			}
			lastError = outcome.error
		}

		const error = lastError ?? new SchemaQueryError("parse", "No strategy could answer the question")
		logger.error("Query failed", { query_id: queryId, kind: error.kind, error: error.message })
		return formatFailure(trimmed, error)
	}

	private async attempt(
		strategy: QueryStrategy,
		query: string,
		context: StrategyContext,
		queryId: string,
	): Promise<AttemptOutcome> {
		const { logger, registry } = this.deps
		const started = Date.now()
		const validation = { query, availableFiles: context.availableFiles }

		let plan: ValidatedPlan
		try {
			plan = registry.validate(await strategy.parse(query, context), validation)
		} catch (error) {
			const err = toSchemaQueryError(error, "parse")
			const meta = {
				query_id: queryId,
				strategy: strategy.tag,
				kind: err.kind,
				error: err.message,
				latency_ms: Date.now() - started,
			}
			if (isFallbackError(err)) logger.warn("Strategy produced no usable plan", meta)
			else logger.error("Strategy failed", meta)
			return { ok: false, error: err }
		}

		let repairs = 0
		for (;;) {
			try {
				const text = await registry.execute(plan, { queryId, signal: context.signal, files: context.availableFiles })
				logger.info("Tool executed", {
					query_id: queryId,
					strategy: strategy.tag,
					tool: plan.tool_name,
					repairs,
					latency_ms: Date.now() - started,
				})
				return { ok: true, text }
			} catch (error) {
				const err = toSchemaQueryError(error, "tool_execution")
				logger.warn("Tool execution failed", {
					query_id: queryId,
					strategy: strategy.tag,
					tool: plan.tool_name,
					error: err.message,
				})
				if (!strategy.repair || repairs >= (strategy.maxRepairs ?? 0)) return { ok: false, error: err }

				repairs++
				try {
					const repaired = await strategy.repair({ query, plan, error: err.message, attempt: repairs }, context)
					plan = registry.validate(repaired, validation)
				} catch (repairError) {
					const failed = toSchemaQueryError(repairError, "parse")
					logger.warn("Repair failed", {
						query_id: queryId,
						strategy: strategy.tag,
						attempt: repairs,
						error: failed.message,
					})
					return { ok: false, error: failed }
				}
			}
		}
	}

	/**
	 * Tool text is already readable. With response.llm_reformat the chat
	 * model tidies it; any failure returns the tool text unchanged.
	 */
	async synthesizeResponse(query: string, text: string, signal?: AbortSignal): Promise<string> {
		const { config, chat, logger } = this.deps
		if (!config.response.llm_reformat || !chat) return text
		try {
			const response = await chat.chat(
				config.model.llm,
				[
					{
						role: "system",
						content:
							"Rewrite the tool output as a short answer to the question. Keep every file and column name exactly as written. Do not add facts.",
					},
					{ role: "user", content: `Question: ${query}\n\nTool output:\n${text}` },
				],
				undefined,
				signal,
			)
			const content = response.content.trim()
			return content.length > 0 ? content : text
		} catch (error) {
			logger.warn("Response reformat failed; returning tool output", {
				error: error instanceof Error ? error.message : String(error),
			})
			return text
		}
	}

	getHelpText(): string {
		return [
			"Ask questions about the scanned files, for example:",
			...EXAMPLE_QUESTIONS.map((q) => `- ${q}`),
			"",
			"Available analyses:",
			this.deps.registry.describe(),
		].join("\n")
	}

	getStatus(): ResolverStatus {
		const tags = this.strategies.map((s) => s.tag)
		return {
			active_strategy: this.activeStrategy,
			strategies: tags,
			capabilities: {
				function_calling: tags.includes("function_calling"),
				structured_output: tags.includes("structured_output"),
				sql_generation: tags.includes("sql_generation"),
				pattern_matching: true,
			},
			semantic_available: this.deps.semantic?.available ?? false,
			model: this.deps.config.model.llm,
			endpoint: endpointStatus(this.deps.endpoint),
		}
	}
}
