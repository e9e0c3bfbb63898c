/**
 * Structured output strategy
 *
 * For chat models without native tool calls: the tool list goes into the
 * prompt and the model answers with one JSON object. Replies are run
 * through JSON repair; when no object survives, a reply that names exactly
 * one tool is still accepted at low confidence.
 */

import { SchemaQueryError } from "../config.js"
import { parseJsonObject } from "../json_repair.js"
import type { ChatClient, ChatMessage } from "../ollama_client.js"
import { normalizeFileArguments } from "../query_hints.js"
import {
	clampConfidence,
	STRATEGY_PRIORITY,
	type QueryStrategy,
	type ResolutionPlan,
	type StrategyContext,
	type StrategyTag,
} from "../resolution_plan.js"
import type { ToolRegistry } from "../tool_registry.js"
import { scannedFilesLine, type ModelStrategyOptions } from "./function_calling.js"

const CONTENT_MATCH_CONFIDENCE = 0.4
const DEFAULT_CONFIDENCE = 0.7

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function buildMessages(query: string, files: string[], registry: ToolRegistry): ChatMessage[] {
	return [
		{
			role: "system",
			content: [
				"You choose one tool to answer a question about the structure of scanned data files.",
				"",
				"Tools:",
				registry.describe(),
				"",
				scannedFilesLine(files),
				"",
				'Reply with exactly one JSON object and nothing else: {"tool": "<tool name>", "parameters": {...}, "confidence": <0 to 1>}',
			].join("\n"),
		},
		{ role: "user", content: query },
	]
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/** Tool names that appear as whole words in `content`. */
function mentionedTools(content: string, names: string[]): string[] {
	return names.filter((name) => new RegExp(`\\b${escapeRegExp(name)}\\b`).test(content))
}

export class StructuredOutputStrategy implements QueryStrategy {
	readonly tag: StrategyTag = "structured_output"
	readonly priority = STRATEGY_PRIORITY.structured_output

	constructor(
		private readonly chat: ChatClient,
		private readonly options: ModelStrategyOptions,
	) {}

	async parse(query: string, context: StrategyContext): Promise<ResolutionPlan> {
		const { registry } = context
		const response = await this.chat.chat(
			this.options.model,
			buildMessages(query, context.availableFiles, registry),
			undefined,
			context.signal,
		)
		const visible = registry.names()

		const parsed = parseJsonObject(response.content)
		const named = parsed ? parsed.tool ?? parsed.tool_name ?? parsed.name : undefined
		if (parsed && typeof named === "string") {
			if (!visible.includes(named)) {
				throw new SchemaQueryError("unknown_tool", `Model chose unknown tool "${named}"`, true, { tool: named })
			}
			const raw = isRecord(parsed.parameters) ? parsed.parameters : isRecord(parsed.arguments) ? parsed.arguments : {}
			return {
				intent: named,
				tool_name: named,
				parameters: normalizeFileArguments(raw),
				confidence: clampConfidence(parsed.confidence, DEFAULT_CONFIDENCE),
				strategy_tag: this.tag,
				is_fallback: context.isFallback,
			}
		}

		const mentioned = mentionedTools(response.content, visible)
		if (mentioned.length === 1) {
			this.options.logger.debug("Tool taken from reply text", { tool: mentioned[0] })
			return {
				intent: mentioned[0],
				tool_name: mentioned[0],
				parameters: {},
				confidence: CONTENT_MATCH_CONFIDENCE,
				strategy_tag: this.tag,
				is_fallback: context.isFallback,
			}
		}

		throw new SchemaQueryError("parse", "Could not read a tool choice from the model reply", true, {
			content: response.content.slice(0, 200),
			mentioned,
		})
	}
}
