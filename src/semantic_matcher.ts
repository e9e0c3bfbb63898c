/**
 * Semantic Matching Engine
 *
 * Embedding similarity between column names. Names are rewritten into short
 * descriptive phrases first (enhanceColumnName), embedded through the
 * injected provider, L2-normalized and compared by dot product.
 *
 * When the provider is missing or fails its startup check, `available` is false and
 * every semantic call throws `embedding_unavailable`; callers fall back to
 * exact/substring analysis.
 */

import { SchemaQueryError, type Logger } from "./config.js"
import { EmbeddingCache } from "./embedding_cache.js"
import type { ColumnDescriptor, ConceptGroups, SemanticMatch } from "./schema_types.js"

// ============================================================================
// Types
// ============================================================================

export interface EmbeddingProvider {
	encode(texts: string[], signal?: AbortSignal): Promise<number[][]>
}

export interface NameCandidate {
	column_name: string
	file_name: string
}

/** The part of the engine the analyzer depends on. */
export interface NameMatcher {
	readonly available: boolean
	findSimilar(term: string, candidates: NameCandidate[], threshold: number, signal?: AbortSignal): Promise<SemanticMatch[]>
	similarityMatrix(names: string[], signal?: AbortSignal): Promise<number[][]>
}

export interface SemanticMatcherOptions {
	enabled?: boolean
	logger: Logger
	cache?: EmbeddingCache
}

// ============================================================================
// Name enhancement
// ============================================================================

interface HintRule {
	tokens: ReadonlySet<string>
	hint: string
}

const HINT_RULES: HintRule[] = [
	{ tokens: new Set(["id", "uuid", "guid", "key", "pk", "identifier"]), hint: "identifier key" },
	{
		tokens: new Set(["date", "time", "datetime", "timestamp", "created", "updated", "modified", "at", "ts", "dt"]),
		hint: "timestamp datetime",
	},
	{ tokens: new Set(["name", "title", "label"]), hint: "text label" },
	{ tokens: new Set(["customer", "user", "client", "member", "person", "account"]), hint: "person account" },
	{ tokens: new Set(["price", "amount", "cost", "total", "revenue", "salary", "fee"]), hint: "money amount" },
]

export function tokenizeColumnName(name: string): string[] {
	return name
		.replace(/([a-z0-9])([A-Z])/g, "$1 $2")
		.toLowerCase()
		.split(/[^a-z0-9]+/)
		.filter((t) => t.length > 0)
}

/**
 * Rewrite a raw column name into the phrase that gets embedded:
 * `customer_id` → `customer id identifier key person account`.
 */
export function enhanceColumnName(name: string): string {
	const tokens = tokenizeColumnName(name)
	const parts = [tokens.join(" ")]
	for (const rule of HINT_RULES) {
		if (tokens.some((t) => rule.tokens.has(t))) parts.push(rule.hint)
	}
	return parts.filter((p) => p.length > 0).join(" ")
}

// ============================================================================
// Concepts
// ============================================================================

export const CONCEPT_CATALOG: Record<string, string[]> = {
	identifier: ["id", "identifier", "primary key", "unique key"],
	timestamp: ["created date", "updated time", "timestamp"],
	name: ["name", "title", "full name"],
	user: ["customer", "user", "client account"],
	financial: ["price", "amount", "cost", "revenue"],
	quantity: ["quantity", "count", "number of items"],
	status: ["status", "state", "is active flag"],
	rating: ["rating", "score", "review stars"],
	contact: ["email", "phone number", "address"],
}

const CONCEPT_KEYWORDS: Array<[string, ReadonlySet<string>]> = [
	["identifier", new Set(["id", "uuid", "guid", "key", "pk", "identifier"])],
	["timestamp", new Set(["date", "time", "datetime", "timestamp", "created", "updated", "modified", "at", "ts", "dt"])],
	["financial", new Set(["price", "amount", "cost", "total", "revenue", "salary", "fee", "balance"])],
	["quantity", new Set(["qty", "quantity", "count", "num", "number", "units"])],
	["status", new Set(["status", "state", "flag", "active", "enabled", "is"])],
	["rating", new Set(["rating", "score", "stars", "rank"])],
	["contact", new Set(["email", "phone", "mobile", "address", "zip", "postcode"])],
	["name", new Set(["name", "title", "label"])],
	["user", new Set(["customer", "user", "client", "member", "person", "account"])],
]

/** Keyword concept for a column name, or null when none applies. */
export function inferConcept(name: string): string | null {
	const tokens = tokenizeColumnName(name)
	for (const [concept, keywords] of CONCEPT_KEYWORDS) {
		if (tokens.some((t) => keywords.has(t))) return concept
	}
	return null
}

// ============================================================================
// Vector math
// ============================================================================

export function l2Normalize(vector: number[]): number[] {
	let sum = 0
	for (const v of vector) sum += v * v
	const norm = Math.sqrt(sum)
	if (norm === 0) return vector.map(() => 0)
	return vector.map((v) => v / norm)
}

/** Dot product of two normalized vectors, clamped to [0, 1]. */
export function cosineSimilarity(a: number[], b: number[]): number {
	const n = Math.min(a.length, b.length)
	let dot = 0
	for (let i = 0; i < n; i++) dot += a[i] * b[i]
	return Math.min(1, Math.max(0, dot))
}

function sameName(a: string, b: string): boolean {
	return a.toLowerCase() === b.toLowerCase()
}

// ============================================================================
// Engine
// ============================================================================

export class SemanticMatcher implements NameMatcher {
	private _available = false
	private readonly cache: EmbeddingCache
	private readonly logger: Logger
	private readonly enabled: boolean

	constructor(
		private readonly provider: EmbeddingProvider | null,
		options: SemanticMatcherOptions,
	) {
		this.cache = options.cache ?? new EmbeddingCache()
		this.logger = options.logger
		this.enabled = options.enabled ?? true
	}

	get available(): boolean {
		return this._available
	}

	/** Check the provider once with a single embedding; never throws. */
	async initialize(): Promise<boolean> {
		if (!this.enabled || !this.provider) {
			this._available = false
			return false
		}
		try {
			const [vector] = await this.provider.encode(["identifier"])
			this._available = Array.isArray(vector) && vector.length > 0
			if (!this._available) this.logger.warn("Embedding provider returned an empty vector; semantic features disabled")
		} catch (error) {
			this._available = false
			this.logger.warn("Embedding provider unavailable; semantic features disabled", {
				error: error instanceof Error ? error.message : String(error),
			})
		}
		return this._available
	}

	private async embed(names: string[], signal?: AbortSignal): Promise<number[][]> {
		const provider = this.provider
		if (!this._available || !provider) {
			throw new SchemaQueryError("embedding_unavailable", "Semantic matching is unavailable", true)
		}
		const texts = names.map(enhanceColumnName)
		try {
			return await this.cache.getMany(texts, async (missing) => {
				const vectors = await provider.encode(missing, signal)
				return vectors.map(l2Normalize)
			})
		} catch (error) {
			if (signal?.aborted) throw new SchemaQueryError("timeout", "Request was cancelled", true)
			if (error instanceof SchemaQueryError && error.kind === "embedding_unavailable") throw error
			throw new SchemaQueryError(
				"embedding_unavailable",
				`Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
				true,
			)
		}
	}

	/**
	 * Candidates whose similarity to `term` is at least `threshold`, most
	 * similar first; equal similarities keep candidate order.
	 */
	async findSimilar(
		term: string,
		candidates: NameCandidate[],
		threshold: number,
		signal?: AbortSignal,
	): Promise<SemanticMatch[]> {
		if (candidates.length === 0) return []
		const vectors = await this.embed([term, ...candidates.map((c) => c.column_name)], signal)
		const termVector = vectors[0]
		return rankMatches(term, termVector, candidates, vectors.slice(1), threshold)
	}

	async similarityMatrix(names: string[], signal?: AbortSignal): Promise<number[][]> {
		if (names.length === 0) return []
		const vectors = await this.embed(names, signal)
		return names.map((a, i) =>
			names.map((b, j) => (i === j || sameName(a, b) ? 1 : cosineSimilarity(vectors[i], vectors[j]))),
		)
	}

	/**
	 * Columns grouped under each catalog concept. A column may appear in
	 * several concepts; within a concept it appears once, with its best score.
	 */
	async getConceptGroups(columns: ColumnDescriptor[], threshold: number, signal?: AbortSignal): Promise<ConceptGroups> {
		const candidates = uniqueCandidates(columns)
		if (candidates.length === 0) return {}

		const phrases = Object.values(CONCEPT_CATALOG).flat()
		const vectors = await this.embed([...phrases, ...candidates.map((c) => c.column_name)], signal)
		const phraseVectors = new Map(phrases.map((p, i) => [p, vectors[i]]))
		const candidateVectors = vectors.slice(phrases.length)

		const groups: ConceptGroups = {}
		for (const [concept, examples] of Object.entries(CONCEPT_CATALOG)) {
			const best = new Map<string, SemanticMatch>()
			for (const phrase of examples) {
				const phraseVector = phraseVectors.get(phrase)
				if (!phraseVector) continue
				for (const match of rankMatches(phrase, phraseVector, candidates, candidateVectors, threshold)) {
					const key = `${match.file_name}\u0000${match.column_name}`
					const existing = best.get(key)
					if (!existing || match.similarity > existing.similarity) best.set(key, match)
				}
			}
			const matches = [...best.values()].sort((a, b) => b.similarity - a.similarity)
			if (matches.length > 0) groups[concept] = matches
		}
		return groups
	}
}

function rankMatches(
	term: string,
	termVector: number[],
	candidates: NameCandidate[],
	candidateVectors: number[][],
	threshold: number,
): SemanticMatch[] {
	const matches: SemanticMatch[] = []
	candidates.forEach((candidate, i) => {
		const exact = sameName(term, candidate.column_name)
		const similarity = exact ? 1 : cosineSimilarity(termVector, candidateVectors[i])
		if (similarity >= threshold) {
			matches.push({
				column_name: candidate.column_name,
				file_name: candidate.file_name,
				similarity,
				match_type: exact ? "exact" : "semantic",
			})
		}
	})
	return matches.sort((a, b) => b.similarity - a.similarity)
}

export function uniqueCandidates(columns: NameCandidate[]): NameCandidate[] {
	const seen = new Set<string>()
	const out: NameCandidate[] = []
	for (const c of columns) {
		const key = `${c.file_name}\u0000${c.column_name}`
		if (seen.has(key)) continue
		seen.add(key)
		out.push({ column_name: c.column_name, file_name: c.file_name })
	}
	return out
}
