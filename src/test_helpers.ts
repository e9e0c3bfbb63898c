/**
 * In-process stand-ins shared by the test suites.
 */

import { configFileSchema } from "./config/loadConfig.js"
import { silentLogger } from "./logger.js"
import type { ChatClient, ChatMessage, ChatResponse, ChatTool } from "./ollama_client.js"
import {
	descriptor,
	MemorySchemaStore,
	type ReadOnlyQueryOptions,
	type ReadOnlyQueryResult,
	type ReadOnlyQueryRunner,
} from "./schema_store.js"
import { registerSchemaTools, type SemanticEngine } from "./schema_tools.js"
import type { ColumnDescriptor } from "./schema_types.js"
import { SemanticMatcher, type EmbeddingProvider } from "./semantic_matcher.js"
import { ToolRegistry } from "./tool_registry.js"

/**
 * Bag-of-words embeddings: one dimension per distinct token, so cosine
 * similarity equals token-overlap cosine and can be worked out by hand.
 */
export class BagOfWordsEmbeddings implements EmbeddingProvider {
	readonly calls: string[][] = []
	readonly signals: Array<AbortSignal | undefined> = []
	private readonly vocabulary = new Map<string, number>()

	constructor(private readonly dimensions: number = 512) {}

	async encode(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		this.calls.push([...texts])
		this.signals.push(signal)
		return texts.map((text) => {
			const vector: number[] = new Array<number>(this.dimensions).fill(0)
			for (const token of text.split(/\s+/).filter((t) => t.length > 0)) {
				let index = this.vocabulary.get(token)
				if (index === undefined) {
					index = this.vocabulary.size % this.dimensions
					this.vocabulary.set(token, index)
				}
				vector[index] += 1
			}
			return vector
		})
	}
}

export class FailingEmbeddings implements EmbeddingProvider {
	async encode(): Promise<number[][]> {
		throw new TypeError("fetch failed")
	}
}

export interface RecordedChat {
	model: string
	messages: ChatMessage[]
	tools?: ChatTool[]
}

/** Chat client answering from a queue of canned responses (or errors). */
export class ScriptedChatClient implements ChatClient {
	readonly requests: RecordedChat[] = []
	healthy = true

	constructor(private readonly script: Array<ChatResponse | Error> = []) {}

	push(...steps: Array<ChatResponse | Error>): this {
		this.script.push(...steps)
		return this
	}

	async chat(model: string, messages: ChatMessage[], tools?: ChatTool[]): Promise<ChatResponse> {
		this.requests.push({ model, messages, tools })
		const next = this.script.shift()
		if (next === undefined) throw new Error("ScriptedChatClient: no response queued")
		if (next instanceof Error) throw next
		return next
	}

	async healthCheck(): Promise<boolean> {
		return this.healthy
	}
}

/** Four-file snapshot used across analyzer, tool and resolver tests. */
export function sampleColumns(): ColumnDescriptor[] {
	return [
		descriptor("orders.csv", "order_id", "integer", { total_rows: 100, unique_count: 100 }),
		descriptor("orders.csv", "customer_id", "integer", { total_rows: 100, unique_count: 40 }),
		descriptor("orders.csv", "price", "float", { total_rows: 100, null_count: 2 }),
		descriptor("legacy_users.csv", "customer_id", "string", { total_rows: 20 }),
		descriptor("legacy_users.csv", "is_active", "string", { total_rows: 20 }),
		descriptor("users.csv", "customer_id", "integer", { total_rows: 30 }),
		descriptor("users.csv", "is_active", "boolean", { total_rows: 30 }),
		descriptor("users.csv", "email", "string", { total_rows: 30 }),
		descriptor("products.csv", "product_id", "integer", { total_rows: 10 }),
		descriptor("products.csv", "title", "string", { total_rows: 10 }),
	]
}

/** Query runner answering from a queue of results (or errors); empty results once the queue runs out. */
export class ScriptedQueryRunner implements ReadOnlyQueryRunner {
	readonly calls: Array<{ sql: string; options: ReadOnlyQueryOptions }> = []

	constructor(private readonly script: Array<ReadOnlyQueryResult | Error> = []) {}

	async runReadOnly(sql: string, options: ReadOnlyQueryOptions): Promise<ReadOnlyQueryResult> {
		this.calls.push({ sql, options })
		const next = this.script.shift()
		if (next === undefined) return { columns: [], rows: [], truncated: false }
		if (next instanceof Error) throw next
		return next
	}
}

export interface CatalogOptions {
	columns?: ColumnDescriptor[]
	runner?: ReadOnlyQueryRunner
	matcher?: SemanticEngine
}

/** Registry holding the full tool catalog over an in-memory snapshot. */
export function catalogRegistry(options: CatalogOptions = {}): ToolRegistry {
	const registry = new ToolRegistry()
	registerSchemaTools(registry, {
		store: new MemorySchemaStore(options.columns ?? sampleColumns()),
		runner: options.runner,
		matcher: options.matcher ?? new SemanticMatcher(null, { logger: silentLogger }),
		config: configFileSchema.parse({}),
		logger: silentLogger,
	})
	return registry
}
