/**
 * Ollama HTTP Client
 *
 * Chat (with optional tool schemas) and embeddings against an
 * Ollama-compatible endpoint.
 *
 * - Every request has a bounded timeout and honours a caller AbortSignal
 * - Connection failures open a circuit breaker; calls fail fast until the
 *   cooldown passes or a health check succeeds
 * - Responses are validated with zod before use
 */

import { z } from "zod"
import { SchemaQueryError } from "./config.js"
import type { EmbeddingProvider } from "./semantic_matcher.js"
import type { ToolParametersSchema } from "./tool_registry.js"

// ============================================================================
// Types
// ============================================================================

export interface ChatMessage {
	role: "system" | "user" | "assistant" | "tool"
	content: string
}

export interface ChatTool {
	type: "function"
	function: {
		name: string
		description: string
		parameters: ToolParametersSchema
	}
}

export interface ToolCall {
	name: string
	/** Some models return an object, others a JSON string */
	arguments: Record<string, unknown> | string
}

export interface ChatResponse {
	content: string
	tool_calls: ToolCall[]
}

export interface ChatClient {
	chat(model: string, messages: ChatMessage[], tools?: ChatTool[], signal?: AbortSignal): Promise<ChatResponse>
	healthCheck(): Promise<boolean>
}

export interface OllamaClientOptions {
	baseUrl: string
	timeoutMs: number
	embeddingModel: string
	/** How long an open circuit stays open before a call is attempted again */
	cooldownMs?: number
	healthTimeoutMs?: number
}

const chatResponseSchema = z.object({
	message: z.object({
		content: z.string().nullish(),
		tool_calls: z
			.array(
				z.object({
					function: z.object({
						name: z.string(),
						arguments: z.union([z.record(z.unknown()), z.string()]).optional(),
					}),
				}),
			)
			.nullish(),
	}),
})

const embedResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
})

function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === "AbortError"
}

// ============================================================================
// Client
// ============================================================================

export class OllamaClient implements ChatClient, EmbeddingProvider {
	private readonly baseUrl: string
	private readonly timeout: number
	private readonly embeddingModel: string
	private readonly cooldownMs: number
	private readonly healthTimeoutMs: number
	private isHealthy: boolean = true
	private unhealthySince = 0

	constructor(options: OllamaClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.timeout = options.timeoutMs
		this.embeddingModel = options.embeddingModel
		this.cooldownMs = options.cooldownMs ?? 30000
		this.healthTimeoutMs = options.healthTimeoutMs ?? 5000
	}

	/**
	 * Single non-streaming chat completion. Tool calls are returned as-is;
	 * validation against the registry is the caller's job.
	 */
	async chat(model: string, messages: ChatMessage[], tools?: ChatTool[], signal?: AbortSignal): Promise<ChatResponse> {
		const body: Record<string, unknown> = { model, messages, stream: false }
		if (tools && tools.length > 0) body.tools = tools

		const raw = await this.post("/api/chat", body, signal)
		const parsed = chatResponseSchema.safeParse(raw)
		if (!parsed.success) {
			throw new SchemaQueryError("parse", "Unexpected chat response from inference endpoint", true, {
				issues: parsed.error.issues.map((i) => i.message),
			})
		}
		const message = parsed.data.message
		return {
			content: message.content ?? "",
			tool_calls: (message.tool_calls ?? []).map((call) => ({
				name: call.function.name,
				arguments: call.function.arguments ?? {},
			})),
		}
	}

	async encode(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		if (texts.length === 0) return []
		const raw = await this.post("/api/embed", { model: this.embeddingModel, input: texts }, signal)
		const parsed = embedResponseSchema.safeParse(raw)
		if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
			throw new SchemaQueryError("embedding_unavailable", "Unexpected embedding response", true, {
				expected: texts.length,
			})
		}
		return parsed.data.embeddings
	}

	/** Check the endpoint answers; closes the circuit when it does. */
	async healthCheck(): Promise<boolean> {
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.healthTimeoutMs)
		try {
			const response = await fetch(`${this.baseUrl}/api/tags`, { signal: controller.signal })
			this.isHealthy = response.ok
		} catch {
			this.isHealthy = false
		} finally {
			clearTimeout(timeoutId)
		}
		if (!this.isHealthy) this.unhealthySince = Date.now()
		return this.isHealthy
	}

	getStatus(): { healthy: boolean; baseUrl: string } {
		return { healthy: this.isHealthy, baseUrl: this.baseUrl }
	}

	private async post(path: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
		// Circuit breaker: fail fast while the endpoint is known to be down
		if (!this.isHealthy && Date.now() - this.unhealthySince < this.cooldownMs) {
			throw new SchemaQueryError(
				"endpoint_unavailable",
				"Inference endpoint is unavailable. Please try again later.",
				true,
				{ baseUrl: this.baseUrl },
			)
		}

		const url = `${this.baseUrl}${path}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)
		const onAbort = () => controller.abort()
		if (signal?.aborted) controller.abort()
		signal?.addEventListener("abort", onAbort, { once: true })

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify(body),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new SchemaQueryError(
					"endpoint_unavailable",
					`Inference endpoint returned error: ${response.status} ${errorText}`,
					response.status >= 500,
					{ statusCode: response.status, url },
				)
			}

			this.isHealthy = true
			return await response.json()
		} catch (error) {
			if (isAbortError(error)) {
				const cancelled = signal?.aborted ?? false
				throw new SchemaQueryError(
					"timeout",
					cancelled ? "Inference request was cancelled" : `Inference request timed out after ${this.timeout}ms`,
					true,
					{ timeout: this.timeout, url },
				)
			}

			if (error instanceof TypeError) {
				this.isHealthy = false
				this.unhealthySince = Date.now()
				throw new SchemaQueryError(
					"endpoint_unavailable",
					`Cannot connect to inference endpoint at ${this.baseUrl}. Is it running?`,
					true,
					{ baseUrl: this.baseUrl, originalError: error.message },
				)
			}

			if (error instanceof SchemaQueryError) throw error

			throw new SchemaQueryError(
				"endpoint_unavailable",
				`Unexpected error communicating with inference endpoint: ${String(error)}`,
				false,
				{ originalError: String(error) },
			)
		} finally {
			clearTimeout(timeoutId)
			signal?.removeEventListener("abort", onAbort)
		}
	}
}
