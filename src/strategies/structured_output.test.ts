import { describe, it, expect } from "vitest"
import { silentLogger } from "../logger.js"
import type { StrategyContext } from "../resolution_plan.js"
import { catalogRegistry, ScriptedChatClient } from "../test_helpers.js"
import { StructuredOutputStrategy } from "./structured_output.js"

const FILES = ["legacy_users.csv", "orders.csv", "products.csv", "users.csv"]

function context(): StrategyContext {
	return { availableFiles: FILES, registry: catalogRegistry(), isFallback: true }
}

function reply(content: string): ScriptedChatClient {
	return new ScriptedChatClient([{ content, tool_calls: [] }])
}

function strategy(chat: ScriptedChatClient): StructuredOutputStrategy {
	return new StructuredOutputStrategy(chat, { model: "llama3", logger: silentLogger })
}

describe("StructuredOutputStrategy", () => {
	it("should read a fenced JSON reply", async () => {
		const chat = reply(
			'```json\n{"tool": "compare_schemas", "parameters": {"file1": "orders", "file2": "users"}, "confidence": 0.85}\n```',
		)
		expect(await strategy(chat).parse("compare orders and users", context())).toEqual({
			intent: "compare_schemas",
			tool_name: "compare_schemas",
			parameters: { file1: "orders.csv", file2: "users.csv" },
			confidence: 0.85,
			strategy_tag: "structured_output",
			is_fallback: true,
		})
	})

	it("should put the tool list in the prompt and send no tool schemas", async () => {
		const chat = reply('{"tool": "database_summary"}')
		await strategy(chat).parse("summary", context())
		const [request] = chat.requests
		expect(request.tools).toBeUndefined()
		expect(request.messages[0].content.split("\n")).toContain(
			"- compare_schemas(file1: string, file2: string): Compare two files: shared, missing and differently typed columns",
		)
	})

	it("should keep the first of duplicated keys", async () => {
		const plan = await strategy(reply('{"tool": "detect_type_mismatches", "tool": "list_files", "parameters": {}}')).parse(
			"types",
			context(),
		)
		expect(plan.tool_name).toBe("detect_type_mismatches")
		expect(plan.confidence).toBe(0.7)
	})

	it("should accept tool_name and arguments aliases", async () => {
		const plan = await strategy(reply('{"tool_name": "find_columns", "arguments": {"column_name": "email"}}')).parse(
			"email",
			context(),
		)
		expect(plan.parameters).toEqual({ column_name: "email" })
	})

	it("should fall back to a single tool named in the text", async () => {
		const plan = await strategy(reply("I would use find_common_columns for this.")).parse("shared", context())
		expect(plan).toMatchObject({ tool_name: "find_common_columns", parameters: {}, confidence: 0.4 })
	})

	it("should not mistake a cut-off reply's parameters for the tool choice", async () => {
		const plan = await strategy(reply('{"tool": "get_file_schema", "parameters": {"name": "orders"}')).parse(
			"what is in orders",
			context(),
		)
		expect(plan).toMatchObject({ tool_name: "get_file_schema", parameters: {}, confidence: 0.4 })
	})

	it("should fail when the text names several tools", async () => {
		await expect(strategy(reply("Either list_files or database_summary.")).parse("x", context())).rejects.toMatchObject({
			kind: "parse",
			message: "Could not read a tool choice from the model reply",
		})
	})

	it("should reject an unknown tool", async () => {
		await expect(strategy(reply('{"tool": "delete_all"}')).parse("x", context())).rejects.toMatchObject({
			kind: "unknown_tool",
			message: 'Model chose unknown tool "delete_all"',
		})
	})
})
