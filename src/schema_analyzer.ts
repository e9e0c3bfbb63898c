/**
 * Consistency / Relationship Analyzer
 *
 * Pure functions over a descriptor snapshot. Nothing here touches the store
 * or the network except through an injected NameMatcher, and every function
 * returns an empty result for an empty snapshot.
 */

import { SchemaQueryError } from "./config.js"
import { inferConcept, tokenizeColumnName, type NameMatcher } from "./semantic_matcher.js"
import {
	DATA_TYPES,
	type AffectedColumn,
	type ColumnDescriptor,
	type ColumnQuality,
	type ColumnTypeDifference,
	type ColumnTypeGroup,
	type CommonColumn,
	type ConsistencyIssue,
	type DataQualityReport,
	type DataType,
	type DatabaseSummary,
	type SchemaDiff,
	type SchemaSimilarity,
	type SemanticEquivalent,
	type SemanticMatch,
	type TypeMismatch,
} from "./schema_types.js"

// ============================================================================
// Helpers
// ============================================================================

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
	const groups = new Map<string, T[]>()
	for (const item of items) {
		const k = key(item)
		const list = groups.get(k)
		if (list) list.push(item)
		else groups.set(k, [item])
	}
	return groups
}

function uniqueSorted(values: string[]): string[] {
	return [...new Set(values)].sort()
}

function typesInOrder(types: Iterable<DataType>): DataType[] {
	const present = new Set(types)
	return DATA_TYPES.filter((t) => present.has(t))
}

/** Most frequent type; ties go to the earlier canonical type. */
export function dominantType(types: DataType[]): DataType {
	const counts = new Map<DataType, number>()
	for (const t of types) counts.set(t, (counts.get(t) ?? 0) + 1)
	let best: DataType = "string"
	let bestCount = -1
	for (const t of DATA_TYPES) {
		const c = counts.get(t) ?? 0
		if (c > bestCount) {
			best = t
			bestCount = c
		}
	}
	return best
}

function affected(col: ColumnDescriptor): AffectedColumn {
	return { column_name: col.column_name, file_name: col.file_name, data_type: col.data_type }
}

export function columnsOfFile(columns: ColumnDescriptor[], fileName: string): ColumnDescriptor[] {
	return columns.filter((c) => c.file_name === fileName)
}

export function fileNames(columns: ColumnDescriptor[]): string[] {
	return uniqueSorted(columns.map((c) => c.file_name))
}

// ============================================================================
// Type mismatches
// ============================================================================

/** Column names that carry more than one data type across files. */
export function detectTypeMismatches(columns: ColumnDescriptor[]): TypeMismatch[] {
	const results: TypeMismatch[] = []
	for (const [name, group] of groupBy(columns, (c) => c.column_name)) {
		const types = typesInOrder(group.map((c) => c.data_type))
		if (types.length < 2) continue
		const type_variations: TypeMismatch["type_variations"] = {}
		for (const t of types) {
			type_variations[t] = uniqueSorted(group.filter((c) => c.data_type === t).map((c) => c.file_name))
		}
		results.push({
			column_name: name,
			type_variations,
			total_files: new Set(group.map((c) => c.file_name)).size,
		})
	}
	return results.sort((a, b) => b.total_files - a.total_files || a.column_name.localeCompare(b.column_name))
}

export function typeMismatchIssue(mismatch: TypeMismatch, columns: ColumnDescriptor[]): ConsistencyIssue {
	const group = columns.filter((c) => c.column_name === mismatch.column_name)
	const target = dominantType(group.map((c) => c.data_type))
	return {
		kind: "type_mismatch",
		columns: group.map(affected),
		suggestion: `Standardize ${mismatch.column_name} as ${target}`,
	}
}

// ============================================================================
// Common columns
// ============================================================================

export function findCommonColumns(columns: ColumnDescriptor[], threshold: number = 2): CommonColumn[] {
	const results: CommonColumn[] = []
	for (const [name, group] of groupBy(columns, (c) => c.column_name)) {
		const files = uniqueSorted(group.map((c) => c.file_name))
		if (files.length < threshold) continue
		results.push({
			column_name: name,
			file_count: files.length,
			files,
			data_types: typesInOrder(group.map((c) => c.data_type)),
		})
	}
	return results.sort((a, b) => b.file_count - a.file_count || a.column_name.localeCompare(b.column_name))
}

// ============================================================================
// Schema similarity
// ============================================================================

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
	if (a.size === 0 && b.size === 0) return 0
	let intersection = 0
	for (const v of a) if (b.has(v)) intersection++
	return intersection / (a.size + b.size - intersection)
}

/** File pairs whose column-name sets have Jaccard similarity above `threshold`. */
export function findSimilarSchemas(columns: ColumnDescriptor[], threshold: number): SchemaSimilarity[] {
	const sets = new Map<string, Set<string>>()
	for (const [file, group] of groupBy(columns, (c) => c.file_name)) {
		sets.set(file, new Set(group.map((c) => c.column_name)))
	}
	const files = [...sets.keys()].sort()
	const results: SchemaSimilarity[] = []
	for (let i = 0; i < files.length; i++) {
		for (let j = i + 1; j < files.length; j++) {
			const a = sets.get(files[i]) ?? new Set<string>()
			const b = sets.get(files[j]) ?? new Set<string>()
			const similarity = jaccardSimilarity(a, b)
			if (similarity <= threshold) continue
			results.push({
				file1: files[i],
				file2: files[j],
				similarity,
				shared_columns: [...a].filter((c) => b.has(c)).sort(),
			})
		}
	}
	return results.sort((x, y) => y.similarity - x.similarity)
}

// ============================================================================
// Schema diff
// ============================================================================

export interface DiffOptions {
	matcher?: NameMatcher | null
	threshold: number
	signal?: AbortSignal
}

/**
 * Compare two files. Columns unique to one side are first matched
 * semantically against the other side's unique columns (best unused match at
 * or above threshold); only the leftovers are reported as missing.
 */
export async function diffSchemas(
	columns: ColumnDescriptor[],
	file1: string,
	file2: string,
	options: DiffOptions,
): Promise<SchemaDiff> {
	const left = new Map(columnsOfFile(columns, file1).map((c) => [c.column_name, c]))
	const right = new Map(columnsOfFile(columns, file2).map((c) => [c.column_name, c]))

	const common = [...left.keys()].filter((n) => right.has(n)).sort()
	const unique1 = [...left.keys()].filter((n) => !right.has(n)).sort()
	const unique2 = [...right.keys()].filter((n) => !left.has(n)).sort()

	const type_mismatches: ColumnTypeDifference[] = []
	for (const name of common) {
		const a = left.get(name)
		const b = right.get(name)
		if (a && b && a.data_type !== b.data_type) {
			type_mismatches.push({ column_name: name, file1_type: a.data_type, file2_type: b.data_type })
		}
	}

	const matcher = options.matcher
	let semantic_checked = Boolean(matcher?.available)
	let equivalents: SemanticEquivalent[] = []
	if (matcher && matcher.available && unique1.length > 0 && unique2.length > 0) {
		try {
			equivalents = await matchEquivalents(unique1, unique2, matcher, options.threshold, options.signal)
		} catch (error) {
			if (!(error instanceof SchemaQueryError && error.kind === "embedding_unavailable")) throw error
			semantic_checked = false
		}
	}

	const matched1 = new Set(equivalents.map((e) => e.file1_column))
	const matched2 = new Set(equivalents.map((e) => e.file2_column))
	const unionSize = common.length + unique1.length + unique2.length

	return {
		file1,
		file2,
		common,
		only_in_file1: unique1.filter((n) => !matched1.has(n)),
		only_in_file2: unique2.filter((n) => !matched2.has(n)),
		type_mismatches,
		semantic_equivalents: equivalents,
		similarity: unionSize === 0 ? 0 : (common.length + equivalents.length) / unionSize,
		semantic_checked,
	}
}

async function matchEquivalents(
	unique1: string[],
	unique2: string[],
	matcher: NameMatcher,
	threshold: number,
	signal?: AbortSignal,
): Promise<SemanticEquivalent[]> {
	const matrix = await matcher.similarityMatrix([...unique1, ...unique2], signal)
	const used = new Set<number>()
	const equivalents: SemanticEquivalent[] = []
	unique1.forEach((name, i) => {
		let bestJ = -1
		let bestScore = -1
		unique2.forEach((_other, j) => {
			if (used.has(j)) return
			const score = matrix[i][unique1.length + j]
			if (score >= threshold && score > bestScore) {
				bestJ = j
				bestScore = score
			}
		})
		if (bestJ >= 0) {
			used.add(bestJ)
			equivalents.push({ file1_column: name, file2_column: unique2[bestJ], similarity: bestScore })
		}
	})
	return equivalents
}

// ============================================================================
// Naming
// ============================================================================

const ENTITY_TOKENS = ["customer", "user", "order", "product", "account", "client"]

function isIdLike(name: string): boolean {
	return tokenizeColumnName(name).some((t) => t === "id" || t === "uuid" || t === "key")
}

/**
 * Canonical name for a cluster: `<entity>_id` when every member is an id
 * column naming a known entity, otherwise the shortest member.
 */
export function suggestCanonicalName(names: string[]): string {
	if (names.length > 0 && names.every(isIdLike)) {
		const tokens = new Set(names.flatMap(tokenizeColumnName))
		const entity = ENTITY_TOKENS.find((e) => tokens.has(e))
		if (entity) return `${entity}_id`
	}
	return [...names].sort((a, b) => a.length - b.length || a.localeCompare(b))[0] ?? ""
}

/**
 * Greedy clustering of distinct column names at `threshold`. Every cluster
 * with more than one literal spelling is an inconsistency.
 */
export async function detectNamingInconsistencies(
	columns: ColumnDescriptor[],
	matcher: NameMatcher,
	threshold: number = 0.8,
	signal?: AbortSignal,
): Promise<ConsistencyIssue[]> {
	const names = uniqueSorted(columns.map((c) => c.column_name))
	if (names.length < 2) return []
	const matrix = await matcher.similarityMatrix(names, signal)

	const assigned = new Set<number>()
	const issues: ConsistencyIssue[] = []
	for (let i = 0; i < names.length; i++) {
		if (assigned.has(i)) continue
		assigned.add(i)
		const members = [i]
		let minScore = 1
		for (let j = i + 1; j < names.length; j++) {
			if (assigned.has(j) || matrix[i][j] < threshold) continue
			assigned.add(j)
			members.push(j)
			minScore = Math.min(minScore, matrix[i][j])
		}
		if (members.length < 2) continue
		const clusterNames = members.map((m) => names[m])
		const inCluster = new Set(clusterNames)
		issues.push({
			kind: "naming_inconsistency",
			columns: columns.filter((c) => inCluster.has(c.column_name)).map(affected),
			similarity: minScore,
			suggestion: `Use ${suggestCanonicalName(clusterNames)} for ${clusterNames.join(", ")}`,
		})
	}
	return issues
}

/** Similar name pairs where one spelling is at least 3 characters shorter. */
export async function detectAbbreviations(
	columns: ColumnDescriptor[],
	matcher: NameMatcher,
	threshold: number,
	signal?: AbortSignal,
): Promise<ConsistencyIssue[]> {
	const names = uniqueSorted(columns.map((c) => c.column_name))
	if (names.length < 2) return []
	const matrix = await matcher.similarityMatrix(names, signal)

	const issues: ConsistencyIssue[] = []
	for (let i = 0; i < names.length; i++) {
		for (let j = i + 1; j < names.length; j++) {
			const score = matrix[i][j]
			if (score < threshold || Math.abs(names[i].length - names[j].length) < 3) continue
			const [short, long] = names[i].length < names[j].length ? [names[i], names[j]] : [names[j], names[i]]
			issues.push({
				kind: "abbreviation",
				columns: columns.filter((c) => c.column_name === short || c.column_name === long).map(affected),
				similarity: score,
				suggestion: `Expand ${short} to ${long}`,
			})
		}
	}
	return issues.sort((a, b) => (b.similarity ?? 0) - (a.similarity ?? 0))
}

// ============================================================================
// Concepts
// ============================================================================

/** Keyword concepts whose columns use more than one data type. */
export function detectConceptTypeMismatches(columns: ColumnDescriptor[]): ConsistencyIssue[] {
	const byConcept = new Map<string, ColumnDescriptor[]>()
	for (const col of columns) {
		const concept = inferConcept(col.column_name)
		if (!concept) continue
		const list = byConcept.get(concept)
		if (list) list.push(col)
		else byConcept.set(concept, [col])
	}

	const issues: ConsistencyIssue[] = []
	for (const [concept, group] of byConcept) {
		if (typesInOrder(group.map((c) => c.data_type)).length < 2) continue
		const target = dominantType(group.map((c) => c.data_type))
		issues.push({
			kind: "concept_type_mismatch",
			concept,
			columns: group.map(affected),
			suggestion: `Use ${target} for ${concept} columns`,
		})
	}
	return issues
}

// ============================================================================
// Data quality
// ============================================================================

function quality(col: ColumnDescriptor): ColumnQuality {
	return {
		file_name: col.file_name,
		column_name: col.column_name,
		data_type: col.data_type,
		null_count: col.null_count,
		total_rows: col.total_rows,
		null_ratio: col.total_rows > 0 ? Math.min(1, col.null_count / col.total_rows) : 0,
	}
}

function byFileThenColumn(a: ColumnQuality, b: ColumnQuality): number {
	return a.file_name.localeCompare(b.file_name) || a.column_name.localeCompare(b.column_name)
}

/**
 * Null and uniqueness findings from the scanned counts: columns with nulls,
 * columns that are entirely null, and columns that could serve as a key.
 */
export function analyzeDataQuality(columns: ColumnDescriptor[]): DataQualityReport {
	const all = columns.map(quality)
	const columns_with_nulls = all
		.filter((q) => q.null_count > 0 && q.total_rows > 0)
		.sort((a, b) => b.null_ratio - a.null_ratio || byFileThenColumn(a, b))
	const all_null = all.filter((q) => q.total_rows > 0 && q.null_count >= q.total_rows).sort(byFileThenColumn)
	const candidate_keys = columns
		.filter((c) => c.total_rows > 0 && c.null_count === 0 && c.unique_count === c.total_rows)
		.map(quality)
		.sort(byFileThenColumn)

	const rowsByFile = new Map<string, number>()
	for (const c of columns) rowsByFile.set(c.file_name, Math.max(rowsByFile.get(c.file_name) ?? 0, c.total_rows))
	const empty_files = [...rowsByFile].filter(([, rows]) => rows === 0).map(([file]) => file).sort()

	return {
		file_count: rowsByFile.size,
		column_count: columns.length,
		columns_with_nulls,
		all_null,
		candidate_keys,
		empty_files,
	}
}

/** Data types of every column whose name contains `term`, grouped by type. */
export function columnTypes(columns: ColumnDescriptor[], term: string): ColumnTypeGroup[] {
	const needle = term.trim().toLowerCase()
	if (needle.length === 0) return []
	const hits = columns.filter((c) => c.column_name.toLowerCase().includes(needle))
	return typesInOrder(hits.map((c) => c.data_type)).map((data_type) => ({
		data_type,
		columns: hits
			.filter((c) => c.data_type === data_type)
			.map((c) => `${c.file_name}.${c.column_name}`)
			.sort(),
	}))
}

// ============================================================================
// Summary & search
// ============================================================================

export function summarizeDatabase(columns: ColumnDescriptor[]): DatabaseSummary {
	const files = groupBy(columns, (c) => c.file_name)
	let total_rows = 0
	let total_size_mb = 0
	for (const group of files.values()) {
		total_rows += Math.max(...group.map((c) => c.total_rows))
		total_size_mb += Math.max(...group.map((c) => c.file_size_mb))
	}
	const type_counts: DatabaseSummary["type_counts"] = {}
	for (const col of columns) type_counts[col.data_type] = (type_counts[col.data_type] ?? 0) + 1

	let last_scanned: string | null = null
	for (const col of columns) {
		if (col.last_scanned && (last_scanned === null || col.last_scanned > last_scanned)) last_scanned = col.last_scanned
	}

	return {
		file_count: files.size,
		column_count: columns.length,
		distinct_column_names: new Set(columns.map((c) => c.column_name)).size,
		total_rows,
		total_size_mb,
		type_counts,
		last_scanned,
	}
}

/**
 * Case-insensitive substring search on column names. Exact names score 1;
 * partial hits score by how much of the name the term covers.
 */
export function searchColumns(columns: ColumnDescriptor[], term: string): SemanticMatch[] {
	const needle = term.trim().toLowerCase()
	if (needle.length === 0) return []
	const matches: SemanticMatch[] = []
	for (const col of columns) {
		const name = col.column_name.toLowerCase()
		if (!name.includes(needle)) continue
		const exact = name === needle
		matches.push({
			column_name: col.column_name,
			file_name: col.file_name,
			similarity: exact ? 1 : needle.length / name.length,
			match_type: exact ? "exact" : "pattern",
		})
	}
	return matches.sort(
		(a, b) => b.similarity - a.similarity || a.file_name.localeCompare(b.file_name),
	)
}
