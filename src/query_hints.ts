/**
 * Query hints
 *
 * File and column references pulled out of a natural-language question.
 * Used by pattern matching and by plan validation to fill required
 * parameters the model left out.
 *
 * File names: a bare stem gets `.csv` appended (orders → orders.csv). A stem
 * also matches its singular/plural (order ↔ orders) when resolving against
 * the scanned file list.
 */

import { DEFAULT_FILE_EXTENSION, KNOWN_FILE_EXTENSIONS } from "./config.js"

// ============================================================================
// File names
// ============================================================================

export function hasKnownExtension(name: string): boolean {
	const lower = name.toLowerCase()
	return KNOWN_FILE_EXTENSIONS.some((ext) => lower.endsWith(ext))
}

/** Trim quotes and whitespace; append `.csv` when no known extension is present. */
export function normalizeFileName(name: string): string {
	const trimmed = name.trim().replace(/^["'`]+|["'`]+$/g, "").trim()
	if (trimmed.length === 0) return trimmed
	return hasKnownExtension(trimmed) ? trimmed : `${trimmed}${DEFAULT_FILE_EXTENSION}`
}

export function fileStem(name: string): string {
	const lower = name.toLowerCase()
	const ext = KNOWN_FILE_EXTENSIONS.find((e) => lower.endsWith(e))
	return ext ? name.substring(0, name.length - ext.length) : name
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

function stemVariants(stem: string): string[] {
	const base = stem.toLowerCase()
	const variants = new Set([base, base.replace(/[_-]+/g, " ")])
	for (const v of [...variants]) {
		if (v.endsWith("ies")) variants.add(`${v.slice(0, -3)}y`)
		else if (v.endsWith("s")) variants.add(v.slice(0, -1))
		else if (v.endsWith("y")) variants.add(`${v.slice(0, -1)}ies`)
		else variants.add(`${v}s`)
	}
	return [...variants].filter((v) => v.length > 1)
}

/**
 * Match `name` against the scanned files: exact (case-insensitive), then by
 * stem, then singular/plural. Returns the name unchanged (normalized) when
 * nothing matches.
 */
export function resolveFileName(name: string, availableFiles: string[]): string {
	const normalized = normalizeFileName(name)
	const lower = normalized.toLowerCase()
	const exact = availableFiles.find((f) => f.toLowerCase() === lower)
	if (exact) return exact

	const wanted = stemVariants(fileStem(normalized))
	const byStem = availableFiles.find((f) => wanted.includes(fileStem(f).toLowerCase()))
	return byStem ?? normalized
}

/** Tool arguments that carry a file name */
export const FILE_ARGUMENTS = ["file_name", "file1", "file2"] as const

/** Model-produced arguments with `.csv` appended to extension-less file names. */
export function normalizeFileArguments(args: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = { ...args }
	for (const key of FILE_ARGUMENTS) {
		const value = out[key]
		if (typeof value === "string" && value.trim() !== "") out[key] = normalizeFileName(value)
	}
	return out
}

const EXPLICIT_FILE = new RegExp(
	`[\\w./-]+(?:${KNOWN_FILE_EXTENSIONS.map((e) => escapeRegExp(e)).join("|")})\\b`,
	"gi",
)

/**
 * Files mentioned in `query`, in order of first mention. Explicit names with
 * an extension are kept even when they were not scanned.
 */
export function extractFileReferences(query: string, availableFiles: string[]): string[] {
	const hits: Array<{ file: string; index: number }> = []

	for (const match of query.matchAll(EXPLICIT_FILE)) {
		const base = match[0].split("/").pop() ?? match[0]
		hits.push({ file: resolveFileName(base, availableFiles), index: match.index ?? 0 })
	}

	const lowerQuery = query.toLowerCase()
	for (const file of availableFiles) {
		for (const variant of stemVariants(fileStem(file))) {
			const m = new RegExp(`\\b${escapeRegExp(variant)}\\b`).exec(lowerQuery)
			if (m) hits.push({ file, index: m.index })
		}
	}

	const seen = new Set<string>()
	const files: string[] = []
	for (const hit of hits.sort((a, b) => a.index - b.index)) {
		if (seen.has(hit.file)) continue
		seen.add(hit.file)
		files.push(hit.file)
	}
	return files
}

// ============================================================================
// Column names
// ============================================================================

const STOPWORDS = new Set([
	"a", "an", "the", "all", "any", "my", "our", "this", "that", "these", "those", "some",
	"in", "on", "of", "for", "to", "from", "with", "across", "between", "and", "or",
	"column", "columns", "field", "fields", "named", "called", "file", "files", "table", "tables",
	"which", "what", "where", "does", "do", "is", "are", "have", "has", "contain", "contains",
	"similar", "like", "same", "data", "type", "types", "schema", "schemas",
])

function usable(token: string | undefined): token is string {
	return token !== undefined && token.length > 1 && !STOPWORDS.has(token.toLowerCase()) && !hasKnownExtension(token)
}

const COLUMN_PATTERNS: RegExp[] = [
	/["'`]([A-Za-z_][\w ]*?)["'`]/,
	/\b(?:column|field)s?\s+(?:named\s+|called\s+)?([A-Za-z_]\w*)/i,
	/\b(?:named|called)\s+([A-Za-z_]\w*)/i,
	/\b([A-Za-z][A-Za-z0-9]*_[A-Za-z0-9_]+)\b/,
	/\btypes?\s+(?:of|for)\s+(?:the\s+)?(?:columns?\s+)?["'`]?([A-Za-z_]\w*)/i,
	/\b(?:similar\s+to|like|related\s+to)\s+["'`]?([A-Za-z_]\w*)/i,
	/\b(?:find|search\s+for|search|locate|contain(?:s|ing)?|with|ha(?:ve|s))\s+(?:an?\s+|the\s+)?([A-Za-z_]\w*)/i,
]

/** The column a question is about, or null when none can be told apart. */
export function extractColumnReference(query: string): string | null {
	const withoutFiles = query.replace(EXPLICIT_FILE, " ")
	for (const pattern of COLUMN_PATTERNS) {
		const candidate = pattern.exec(withoutFiles)?.[1]?.trim()
		if (usable(candidate)) return candidate
	}
	return null
}
