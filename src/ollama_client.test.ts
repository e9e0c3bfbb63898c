import { describe, it, expect, vi, afterEach } from "vitest"
import { OllamaClient } from "./ollama_client.js"

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

function client(timeoutMs = 1000): OllamaClient {
	return new OllamaClient({ baseUrl: "http://ollama.test:11434/", timeoutMs, embeddingModel: "test-embed" })
}

function requestBody(init: RequestInit | undefined): unknown {
	return typeof init?.body === "string" ? JSON.parse(init.body) : undefined
}

afterEach(() => {
	vi.unstubAllGlobals()
})

describe("OllamaClient.chat", () => {
	it("should post a non-streaming chat request with tools", async () => {
		const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
			jsonResponse({
				message: {
					content: "",
					tool_calls: [{ function: { name: "list_files", arguments: { pattern: "orders" } } }],
				},
			}),
		)
		vi.stubGlobal("fetch", fetchMock)

		const tools = [{
			type: "function" as const,
			function: { name: "list_files", description: "List files", parameters: { type: "object" as const, properties: {}, required: [] } },
		}]
		const result = await client().chat("model-fc", [{ role: "user", content: "list files" }], tools)

		expect(result).toEqual({ content: "", tool_calls: [{ name: "list_files", arguments: { pattern: "orders" } }] })
		expect(fetchMock).toHaveBeenCalledTimes(1)
		const [url, init] = fetchMock.mock.calls[0]
		expect(url).toBe("http://ollama.test:11434/api/chat")
		expect(requestBody(init)).toEqual({
			model: "model-fc",
			messages: [{ role: "user", content: "list files" }],
			stream: false,
			tools,
		})
	})

	it("should keep string arguments and default missing ones", async () => {
		vi.stubGlobal("fetch", vi.fn(async () =>
			jsonResponse({
				message: {
					content: null,
					tool_calls: [
						{ function: { name: "get_file_schema", arguments: "{\"file_name\":\"orders\"}" } },
						{ function: { name: "database_summary" } },
					],
				},
			}),
		))
		const result = await client().chat("m", [{ role: "user", content: "q" }])
		expect(result.content).toBe("")
		expect(result.tool_calls).toEqual([
			{ name: "get_file_schema", arguments: "{\"file_name\":\"orders\"}" },
			{ name: "database_summary", arguments: {} },
		])
	})

	it("should report a malformed response as a parse error", async () => {
		vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [] })))
		await expect(client().chat("m", [])).rejects.toMatchObject({ kind: "parse" })
	})

	it("should report HTTP errors as endpoint_unavailable", async () => {
		vi.stubGlobal("fetch", vi.fn(async () => new Response("model not found", { status: 404 })))
		await expect(client().chat("m", [])).rejects.toMatchObject({
			kind: "endpoint_unavailable",
			recoverable: false,
		})
	})

	it("should time out slow requests", async () => {
		vi.stubGlobal("fetch", vi.fn((_url: string, init?: RequestInit) =>
			new Promise<Response>((_resolve, reject) => {
				init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")))
			}),
		))
		await expect(client(20).chat("m", [])).rejects.toMatchObject({
			kind: "timeout",
			message: "Inference request timed out after 20ms",
		})
	})

	it("should stop when the caller aborts", async () => {
		vi.stubGlobal("fetch", vi.fn((_url: string, init?: RequestInit) =>
			new Promise<Response>((_resolve, reject) => {
				init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")))
			}),
		))
		const controller = new AbortController()
		const pending = client(5000).chat("m", [], undefined, controller.signal)
		controller.abort()
		await expect(pending).rejects.toMatchObject({ kind: "timeout", message: "Inference request was cancelled" })
	})

	it("should fail fast after a connection failure", async () => {
		const fetchMock = vi.fn(async () => {
			throw new TypeError("fetch failed")
		})
		vi.stubGlobal("fetch", fetchMock)
		const c = client()
		await expect(c.chat("m", [])).rejects.toMatchObject({ kind: "endpoint_unavailable" })
		await expect(c.chat("m", [])).rejects.toMatchObject({
			kind: "endpoint_unavailable",
			message: "Inference endpoint is unavailable. Please try again later.",
		})
		expect(fetchMock).toHaveBeenCalledTimes(1)
		expect(c.getStatus().healthy).toBe(false)
	})
})

describe("OllamaClient.encode", () => {
	it("should post texts to the embed endpoint", async () => {
		const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ embeddings: [[1, 0], [0, 1]] }))
		vi.stubGlobal("fetch", fetchMock)
		expect(await client().encode(["a", "b"])).toEqual([[1, 0], [0, 1]])
		const [url, init] = fetchMock.mock.calls[0]
		expect(url).toBe("http://ollama.test:11434/api/embed")
		expect(requestBody(init)).toEqual({ model: "test-embed", input: ["a", "b"] })
	})

	it("should reject a vector count mismatch", async () => {
		vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ embeddings: [[1, 0]] })))
		await expect(client().encode(["a", "b"])).rejects.toMatchObject({ kind: "embedding_unavailable" })
	})

	it("should skip the request for no texts", async () => {
		const fetchMock = vi.fn()
		vi.stubGlobal("fetch", fetchMock)
		expect(await client().encode([])).toEqual([])
		expect(fetchMock).not.toHaveBeenCalled()
	})
})

describe("OllamaClient.healthCheck", () => {
	it("should reopen the circuit when the endpoint answers", async () => {
		const c = client()
		vi.stubGlobal("fetch", vi.fn(async () => {
			throw new TypeError("fetch failed")
		}))
		await expect(c.chat("m", [])).rejects.toMatchObject({ kind: "endpoint_unavailable" })

		vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ models: [] })))
		expect(await c.healthCheck()).toBe(true)
		expect(c.getStatus().healthy).toBe(true)
	})

	it("should report false when the endpoint is down", async () => {
		vi.stubGlobal("fetch", vi.fn(async () => {
			throw new TypeError("fetch failed")
		}))
		expect(await client().healthCheck()).toBe(false)
	})
})
