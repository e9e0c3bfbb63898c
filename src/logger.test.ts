import { describe, it, expect } from "vitest"
import { createLogger, isLogLevel } from "./logger.js"

describe("createLogger", () => {
	it("should write level-prefixed lines with JSON meta", () => {
		const lines: string[] = []
		const logger = createLogger("debug", (line) => lines.push(line))
		logger.info("Query resolved", { tool: "list_files", latency_ms: 12 })
		expect(lines).toEqual(['[INFO] Query resolved {"tool":"list_files","latency_ms":12}'])
	})

	it("should drop lines below the configured level", () => {
		const lines: string[] = []
		const logger = createLogger("warn", (line) => lines.push(line))
		logger.debug("hidden")
		logger.info("hidden")
		logger.warn("shown")
		logger.error("shown too")
		expect(lines).toEqual(["[WARN] shown", "[ERROR] shown too"])
	})

	it("should serialize errors in meta by name and message", () => {
		const lines: string[] = []
		const logger = createLogger("info", (line) => lines.push(line))
		logger.error("Failed", { error: new TypeError("boom") })
		expect(lines[0]).toBe('[ERROR] Failed {"error":{"name":"TypeError","message":"boom"}}')
	})

	it("should emit nothing when silent", () => {
		const lines: string[] = []
		const logger = createLogger("silent", (line) => lines.push(line))
		logger.error("nope")
		expect(lines).toEqual([])
	})
})

describe("isLogLevel", () => {
	it("should accept known levels only", () => {
		expect(isLogLevel("debug")).toBe(true)
		expect(isLogLevel("DEBUG")).toBe(false)
		expect(isLogLevel("trace")).toBe(false)
	})

	it("should not accept inherited object keys", () => {
		expect(isLogLevel("toString")).toBe(false)
		expect(isLogLevel("constructor")).toBe(false)
		expect(isLogLevel("__proto__")).toBe(false)
	})
})
