import { describe, it, expect } from "vitest"
import {
	SemanticMatcher,
	enhanceColumnName,
	inferConcept,
	l2Normalize,
	cosineSimilarity,
	tokenizeColumnName,
} from "./semantic_matcher.js"
import { EmbeddingCache } from "./embedding_cache.js"
import { SchemaQueryError } from "./config.js"
import { silentLogger } from "./logger.js"
import { descriptor } from "./schema_store.js"
import { BagOfWordsEmbeddings, FailingEmbeddings } from "./test_helpers.js"
import type { EmbeddingProvider } from "./semantic_matcher.js"

async function readyMatcher(provider: EmbeddingProvider = new BagOfWordsEmbeddings(), cache?: EmbeddingCache) {
	const matcher = new SemanticMatcher(provider, { logger: silentLogger, cache })
	await matcher.initialize()
	return matcher
}

describe("tokenizeColumnName", () => {
	it("should split snake, kebab and camel case", () => {
		expect(tokenizeColumnName("order_date")).toEqual(["order", "date"])
		expect(tokenizeColumnName("order-date")).toEqual(["order", "date"])
		expect(tokenizeColumnName("CustomerID")).toEqual(["customer", "id"])
	})
})

describe("enhanceColumnName", () => {
	it("should add identifier and person hints for customer_id", () => {
		expect(enhanceColumnName("customer_id")).toBe("customer id identifier key person account")
	})

	it("should add timestamp hint for created_at", () => {
		expect(enhanceColumnName("created_at")).toBe("created at timestamp datetime")
	})

	it("should add label and person hints for CustomerName", () => {
		expect(enhanceColumnName("CustomerName")).toBe("customer name text label person account")
	})

	it("should add money hint for prices", () => {
		expect(enhanceColumnName("unit_price")).toBe("unit price money amount")
	})

	it("should leave plain names alone", () => {
		expect(enhanceColumnName("notes")).toBe("notes")
	})
})

describe("inferConcept", () => {
	it("should prefer identifier for id columns", () => {
		expect(inferConcept("customer_id")).toBe("identifier")
	})

	it("should detect timestamps, contact and status", () => {
		expect(inferConcept("created_at")).toBe("timestamp")
		expect(inferConcept("customer_email")).toBe("contact")
		expect(inferConcept("is_active")).toBe("status")
	})

	it("should rank name above user", () => {
		expect(inferConcept("user_name")).toBe("name")
	})

	it("should return null when nothing applies", () => {
		expect(inferConcept("notes")).toBeNull()
	})
})

describe("vector helpers", () => {
	it("should normalize to unit length", () => {
		expect(l2Normalize([3, 4])).toEqual([0.6, 0.8])
	})

	it("should leave a zero vector at zero", () => {
		expect(l2Normalize([0, 0])).toEqual([0, 0])
	})

	it("should clamp negative similarity to zero", () => {
		expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0)
	})
})

describe("SemanticMatcher.initialize", () => {
	it("should be available after a successful startup check", async () => {
		const matcher = await readyMatcher()
		expect(matcher.available).toBe(true)
	})

	it("should stay unavailable when the provider fails", async () => {
		const matcher = await readyMatcher(new FailingEmbeddings())
		expect(matcher.available).toBe(false)
	})

	it("should stay unavailable without a provider or when disabled", async () => {
		const none = new SemanticMatcher(null, { logger: silentLogger })
		expect(await none.initialize()).toBe(false)
		const disabled = new SemanticMatcher(new BagOfWordsEmbeddings(), { logger: silentLogger, enabled: false })
		expect(await disabled.initialize()).toBe(false)
	})
})

describe("SemanticMatcher.findSimilar", () => {
	it("should return the literal name first with similarity 1", async () => {
		const matcher = await readyMatcher()
		const matches = await matcher.findSimilar(
			"customer_id",
			[
				{ column_name: "cust_id", file_name: "a.csv" },
				{ column_name: "customer_id", file_name: "b.csv" },
				{ column_name: "order_date", file_name: "b.csv" },
			],
			0.99,
		)
		expect(matches).toEqual([
			{ column_name: "customer_id", file_name: "b.csv", similarity: 1, match_type: "exact" },
		])
	})

	it("should sort by similarity and filter by threshold", async () => {
		const matcher = await readyMatcher()
		const matches = await matcher.findSimilar(
			"customer_id",
			[
				{ column_name: "cust_id", file_name: "a.csv" },
				{ column_name: "client_id", file_name: "a.csv" },
				{ column_name: "customer_id", file_name: "b.csv" },
				{ column_name: "order_date", file_name: "b.csv" },
			],
			0.5,
		)
		expect(matches.map((m) => m.column_name)).toEqual(["customer_id", "client_id", "cust_id"])
		// client id identifier key person account vs customer ...: 5 shared of 6
		expect(matches[1].similarity).toBeCloseTo(5 / 6, 6)
		expect(matches[1].match_type).toBe("semantic")
		// cust id identifier key: 3 shared, norms 2 and sqrt(6)
		expect(matches[2].similarity).toBeCloseTo(3 / (2 * Math.sqrt(6)), 6)
	})

	it("should keep candidate order on ties", async () => {
		const matcher = await readyMatcher()
		const matches = await matcher.findSimilar(
			"user_id",
			[
				{ column_name: "client_id", file_name: "z.csv" },
				{ column_name: "client_id", file_name: "a.csv" },
			],
			0,
		)
		expect(matches.map((m) => m.file_name)).toEqual(["z.csv", "a.csv"])
	})

	it("should return nothing for no candidates", async () => {
		const matcher = await readyMatcher()
		expect(await matcher.findSimilar("x", [], 0.5)).toEqual([])
	})

	it("should throw embedding_unavailable when not initialized", async () => {
		const matcher = new SemanticMatcher(new BagOfWordsEmbeddings(), { logger: silentLogger })
		await expect(matcher.findSimilar("a", [{ column_name: "b", file_name: "f.csv" }], 0.5)).rejects.toMatchObject({
			kind: "embedding_unavailable",
		})
	})

	it("should map a provider failure after startup to embedding_unavailable", async () => {
		let calls = 0
		const flaky: EmbeddingProvider = {
			async encode(texts) {
				calls++
				if (calls > 1) throw new TypeError("fetch failed")
				return texts.map(() => [1])
			},
		}
		const cache = new EmbeddingCache()
		const matcher = await readyMatcher(flaky, cache)
		const error = await matcher.findSimilar("a", [{ column_name: "b", file_name: "f.csv" }], 0.5).catch((e: unknown) => e)
		expect(error).toBeInstanceOf(SchemaQueryError)
		expect(error).toMatchObject({ kind: "embedding_unavailable" })
		expect(cache.has("a")).toBe(false)
		expect(cache.has("b")).toBe(false)
	})

	it("should pass the signal to the provider and report cancellation as a timeout", async () => {
		const seen: Array<AbortSignal | undefined> = []
		const provider: EmbeddingProvider = {
			async encode(texts, signal) {
				seen.push(signal)
				if (signal?.aborted) throw new Error("This operation was aborted")
				return texts.map(() => [1])
			},
		}
		const matcher = await readyMatcher(provider)
		const controller = new AbortController()
		controller.abort()
		await expect(
			matcher.findSimilar("a", [{ column_name: "b", file_name: "f.csv" }], 0.5, controller.signal),
		).rejects.toMatchObject({ kind: "timeout", message: "Request was cancelled" })
		expect(seen[1]).toBe(controller.signal)
	})

	it("should reuse cached vectors", async () => {
		const provider = new BagOfWordsEmbeddings()
		const matcher = await readyMatcher(provider)
		const candidates = [{ column_name: "order_id", file_name: "o.csv" }]
		await matcher.findSimilar("customer_id", candidates, 0.1)
		await matcher.findSimilar("customer_id", candidates, 0.1)
		// startup check + one batch
		expect(provider.calls).toHaveLength(2)
	})
})

describe("SemanticMatcher.similarityMatrix", () => {
	it("should put 1 on the diagonal and be symmetric", async () => {
		const matcher = await readyMatcher()
		const m = await matcher.similarityMatrix(["customer_id", "client_id", "notes"])
		expect(m[0][0]).toBe(1)
		expect(m[0][1]).toBeCloseTo(5 / 6, 6)
		expect(m[1][0]).toBeCloseTo(5 / 6, 6)
		expect(m[0][2]).toBe(0)
	})

	it("should treat case variants as identical", async () => {
		const matcher = await readyMatcher()
		const m = await matcher.similarityMatrix(["Email", "email"])
		expect(m[0][1]).toBe(1)
	})
})

describe("SemanticMatcher.getConceptGroups", () => {
	const columns = [
		descriptor("orders.csv", "customer_id", "integer"),
		descriptor("orders.csv", "price", "float"),
		descriptor("users.csv", "email", "string"),
	]

	it("should group columns under matching concepts", async () => {
		const matcher = await readyMatcher()
		const groups = await matcher.getConceptGroups(columns, 0.5)
		expect(Object.keys(groups)).toEqual(["identifier", "user", "financial", "contact"])
		expect(groups.contact).toEqual([
			{ column_name: "email", file_name: "users.csv", similarity: 1, match_type: "exact" },
		])
		expect(groups.financial[0]).toMatchObject({ column_name: "price", similarity: 1 })
	})

	it("should list each column once per concept", async () => {
		const matcher = await readyMatcher()
		const groups = await matcher.getConceptGroups(columns, 0.5)
		expect(groups.identifier.map((m) => m.column_name)).toEqual(["customer_id"])
	})

	it("should return no groups for no columns", async () => {
		const matcher = await readyMatcher()
		expect(await matcher.getConceptGroups([], 0.5)).toEqual({})
	})
})
