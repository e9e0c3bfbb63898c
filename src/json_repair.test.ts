import { describe, it, expect } from "vitest"
import {
	repairJson,
	parseJsonObject,
	stripComments,
	normalizeNumbers,
	dropDuplicateKeys,
} from "./json_repair.js"

describe("repairJson", () => {
	it("should return valid JSON unchanged", () => {
		const valid = '{"tool":"list_files","parameters":{"pattern":"orders"}}'
		expect(repairJson(valid)).toBe(valid)
	})

	it("should be idempotent on its own output", () => {
		const once = repairJson('```json\n{"tool": "x", "tool": "y", "n": 00.5,}\n```')
		expect(once).toBe('{"tool": "x","n": 0.5}')
		expect(repairJson(once ?? "")).toBe(once)
	})

	it("should strip code fences and surrounding prose", () => {
		const text = 'Sure!\n```json\n{"tool": "get_file_schema", "parameters": {"file_name": "orders.csv"}}\n```\nHope that helps {x}'
		expect(repairJson(text)).toBe('{"tool": "get_file_schema", "parameters": {"file_name": "orders.csv"}}')
	})

	it("should find the balanced object under nesting and braces in strings", () => {
		const text = 'plan: {"a": {"b": {"c": 1}}, "d": "}"} and then }'
		expect(repairJson(text)).toBe('{"a": {"b": {"c": 1}}, "d": "}"}')
	})

	it("should strip line and block comments", () => {
		const text = '{"tool": "list_files", // pick this\n "parameters": {} /* none */}'
		expect(JSON.parse(repairJson(text) ?? "null")).toEqual({ tool: "list_files", parameters: {} })
	})

	it("should keep the first of duplicated top-level keys", () => {
		const text = '{"tool": "list_files", "tool": "database_summary", "parameters": {}}'
		expect(repairJson(text)).toBe('{"tool": "list_files","parameters": {}}')
	})

	it("should normalize leading-zero numbers", () => {
		const repaired = repairJson('{"confidence": 00.95, "limit": 007, "neg": -00.5, "s": "007"}')
		expect(JSON.parse(repaired ?? "null")).toEqual({ confidence: 0.95, limit: 7, neg: -0.5, s: "007" })
	})

	it("should drop trailing commas", () => {
		expect(repairJson('{"a": [1, 2,], "b": 1,}')).toBe('{"a": [1, 2], "b": 1}')
	})

	it("should return null for unbalanced input", () => {
		expect(repairJson('{"tool": "list_files"')).toBeNull()
	})

	it("should return null when there is no object", () => {
		expect(repairJson("I cannot help with that.")).toBeNull()
	})

	it("should not read a nested object out of an unclosed outer brace", () => {
		expect(repairJson('{ "x": {"a": 1}')).toBeNull()
		expect(repairJson('{"tool": "get_file_schema", "parameters": {"name": "orders"}')).toBeNull()
	})

	it("should look past a placeholder only when it is balanced", () => {
		expect(repairJson('Use {tool then {"tool": "x"}')).toBeNull()
	})

	it("should skip a placeholder that is not JSON", () => {
		expect(repairJson('Use {tool} like {"tool": "x"}')).toBe('{"tool": "x"}')
	})
})

describe("stripComments", () => {
	it("should leave comment markers inside strings alone", () => {
		expect(stripComments('{"url": "http://x/*y*/"}')).toBe('{"url": "http://x/*y*/"}')
	})
})

describe("normalizeNumbers", () => {
	it("should not touch ordinary numbers", () => {
		expect(normalizeNumbers('{"a": 100, "b": 0.05, "c": 0}')).toBe('{"a": 100, "b": 0.05, "c": 0}')
	})

	it("should add a zero before a bare decimal point", () => {
		expect(normalizeNumbers('{"t": .8}')).toBe('{"t": 0.8}')
	})
})

describe("dropDuplicateKeys", () => {
	it("should ignore duplicates in nested objects", () => {
		const text = '{"p": {"a": 1, "a": 2}}'
		expect(dropDuplicateKeys(text)).toBe(text)
	})
})

describe("parseJsonObject", () => {
	it("should parse repaired output into an object", () => {
		expect(parseJsonObject('noise {"tool": "list_files",} noise')).toEqual({ tool: "list_files" })
	})

	it("should return null when nothing is recoverable", () => {
		expect(parseJsonObject("[1, 2]")).toBeNull()
	})
})
