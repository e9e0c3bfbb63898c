/**
 * Embedding Cache
 *
 * Process-lifetime memo of text → vector. Entries are promises, so two
 * callers asking for the same text while a request is in flight share it.
 * Entries are only ever added; a failed fetch removes its own entries so
 * the next caller retries.
 */

import { SchemaQueryError } from "./config.js"

export type VectorFetcher = (texts: string[]) => Promise<number[][]>

export class EmbeddingCache {
	private readonly entries = new Map<string, Promise<number[]>>()

	has(text: string): boolean {
		return this.entries.has(text)
	}

	/**
	 * Resolve vectors for `texts` in order, fetching only the ones not cached
	 * (in a single batch).
	 */
	async getMany(texts: string[], fetch: VectorFetcher): Promise<number[][]> {
		const missing = [...new Set(texts.filter((t) => !this.entries.has(t)))]

		if (missing.length > 0) {
			const batch = fetch(missing)
			missing.forEach((text, i) => {
				const entry = batch.then((vectors) => {
					const vector = vectors[i]
					if (!vector) {
						throw new SchemaQueryError(
							"embedding_unavailable",
							`Embedding provider returned ${vectors.length} vectors for ${missing.length} inputs`,
						)
					}
					return vector
				})
				this.entries.set(text, entry)
				entry.catch(() => {
					if (this.entries.get(text) === entry) this.entries.delete(text)
				})
			})
		}

		return Promise.all(
			texts.map((text) => {
				const entry = this.entries.get(text)
				if (!entry) {
					return Promise.reject(new SchemaQueryError("embedding_unavailable", `No embedding for "${text}"`))
				}
				return entry
			}),
		)
	}
}
