/**
 * Function calling strategy
 *
 * Advertises the registry's tool schemas to a chat model that supports
 * native tool calls and takes the first call it makes.
 */

import { SchemaQueryError, type Logger } from "../config.js"
import { parseJsonObject } from "../json_repair.js"
import type { ChatClient, ChatMessage, ToolCall } from "../ollama_client.js"
import { normalizeFileArguments } from "../query_hints.js"
import {
	STRATEGY_PRIORITY,
	type QueryStrategy,
	type ResolutionPlan,
	type StrategyContext,
	type StrategyTag,
} from "../resolution_plan.js"

export interface ModelStrategyOptions {
	model: string
	logger: Logger
}

export function scannedFilesLine(files: string[]): string {
	return files.length > 0 ? `Scanned files: ${files.join(", ")}` : "No files have been scanned yet."
}

function buildMessages(query: string, files: string[]): ChatMessage[] {
	return [
		{
			role: "system",
			content: [
				"You answer questions about the structure of scanned data files by calling exactly one tool.",
				scannedFilesLine(files),
				"Use file names exactly as listed.",
			].join("\n"),
		},
		{ role: "user", content: query },
	]
}

function toolArguments(call: ToolCall): Record<string, unknown> {
	if (typeof call.arguments !== "string") return call.arguments
	if (call.arguments.trim() === "") return {}
	const parsed = parseJsonObject(call.arguments)
	if (!parsed) {
		throw new SchemaQueryError("parse", `Could not parse arguments for tool "${call.name}"`, true, {
			arguments: call.arguments,
		})
	}
	return parsed
}

export class FunctionCallingStrategy implements QueryStrategy {
	readonly tag: StrategyTag = "function_calling"
	readonly priority = STRATEGY_PRIORITY.function_calling

	constructor(
		private readonly chat: ChatClient,
		private readonly options: ModelStrategyOptions,
	) {}

	async parse(query: string, context: StrategyContext): Promise<ResolutionPlan> {
		const response = await this.chat.chat(
			this.options.model,
			buildMessages(query, context.availableFiles),
			context.registry.chatTools(),
			context.signal,
		)

		const call = response.tool_calls[0]
		if (!call) {
			throw new SchemaQueryError("parse", "Model did not call a tool", true, {
				content: response.content.slice(0, 200),
			})
		}
		if (!context.registry.names().includes(call.name)) {
			throw new SchemaQueryError("unknown_tool", `Model called unknown tool "${call.name}"`, true, { tool: call.name })
		}

		const parameters = normalizeFileArguments(toolArguments(call))
		this.options.logger.debug("Tool call selected", { tool: call.name, parameters })

		return {
			intent: call.name,
			tool_name: call.name,
			parameters,
			confidence: 0.9,
			strategy_tag: this.tag,
			is_fallback: context.isFallback,
		}
	}
}
