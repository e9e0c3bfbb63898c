/**
 * Schema metadata types
 *
 * Shapes shared by the store, the analyzer, the semantic engine and the
 * tool layer. Field names follow the persisted descriptor table.
 */

// ============================================================================
// Column descriptors
// ============================================================================

export const DATA_TYPES = ["integer", "float", "boolean", "datetime", "string"] as const
export type DataType = (typeof DATA_TYPES)[number]

/** One column of one scanned file. (file_name, column_name) is unique per snapshot. */
export interface ColumnDescriptor {
	file_name: string
	file_path: string
	column_name: string
	data_type: DataType
	null_count: number
	unique_count: number
	total_rows: number
	file_size_mb: number
	last_scanned: string | null
}

export interface FileSummary {
	file_name: string
	file_path: string
	column_count: number
	total_rows: number
	file_size_mb: number
	last_scanned: string | null
}

const RAW_TYPE_PATTERNS: Array<[RegExp, DataType]> = [
	[/^(bool|boolean|bit)$/, "boolean"],
	[/^(tinyint|smallint|int|integer|bigint|hugeint|int2|int4|int8|int16|int32|int64|uint\d*|long|short|serial|bigserial)$/, "integer"],
	[/^(float|float4|float8|float32|float64|double|double precision|real|decimal|numeric|number)(\(.*\))?$/, "float"],
	[/^(date|datetime|time|timestamp|timestamptz|interval)(\b.*)?$/, "datetime"],
]

/**
 * Map a scanner/storage type name (`BIGINT`, `VARCHAR`, `DOUBLE`,
 * `TIMESTAMP WITH TIME ZONE`, ...) to one of the five canonical types.
 * Anything unrecognized is a string.
 */
export function normalizeDataType(raw: string): DataType {
	const t = raw.trim().toLowerCase()
	for (const [pattern, type] of RAW_TYPE_PATTERNS) {
		if (pattern.test(t)) return type
	}
	return "string"
}

export function summarizeFiles(columns: ColumnDescriptor[]): FileSummary[] {
	const byFile = new Map<string, FileSummary>()
	for (const col of columns) {
		const existing = byFile.get(col.file_name)
		if (existing) {
			existing.column_count++
			existing.total_rows = Math.max(existing.total_rows, col.total_rows)
			continue
		}
		byFile.set(col.file_name, {
			file_name: col.file_name,
			file_path: col.file_path,
			column_count: 1,
			total_rows: col.total_rows,
			file_size_mb: col.file_size_mb,
			last_scanned: col.last_scanned,
		})
	}
	return [...byFile.values()].sort((a, b) => a.file_name.localeCompare(b.file_name))
}

// ============================================================================
// Analysis results
// ============================================================================

export type MatchType = "semantic" | "exact" | "pattern"

export interface SemanticMatch {
	column_name: string
	file_name: string
	similarity: number
	match_type: MatchType
}

/** concept label → matches, omitted when empty */
export type ConceptGroups = Record<string, SemanticMatch[]>

export interface TypeMismatch {
	column_name: string
	type_variations: Partial<Record<DataType, string[]>>
	total_files: number
}

export interface CommonColumn {
	column_name: string
	file_count: number
	files: string[]
	data_types: DataType[]
}

export interface SchemaSimilarity {
	file1: string
	file2: string
	similarity: number
	shared_columns: string[]
}

export interface ColumnTypeDifference {
	column_name: string
	file1_type: DataType
	file2_type: DataType
}

export interface SemanticEquivalent {
	file1_column: string
	file2_column: string
	similarity: number
}

export interface SchemaDiff {
	file1: string
	file2: string
	common: string[]
	only_in_file1: string[]
	only_in_file2: string[]
	type_mismatches: ColumnTypeDifference[]
	semantic_equivalents: SemanticEquivalent[]
	similarity: number
	/** false when the embedding engine was unavailable and only exact names were compared */
	semantic_checked: boolean
}

export type ConsistencyIssueKind =
	| "type_mismatch"
	| "naming_inconsistency"
	| "abbreviation"
	| "concept_type_mismatch"

export interface AffectedColumn {
	column_name: string
	file_name: string
	data_type?: DataType
}

export interface ConsistencyIssue {
	kind: ConsistencyIssueKind
	concept?: string
	columns: AffectedColumn[]
	similarity?: number
	suggestion: string
}

export interface DatabaseSummary {
	file_count: number
	column_count: number
	distinct_column_names: number
	total_rows: number
	total_size_mb: number
	type_counts: Partial<Record<DataType, number>>
	last_scanned: string | null
}

export interface ColumnQuality {
	file_name: string
	column_name: string
	data_type: DataType
	null_count: number
	total_rows: number
	/** null_count / total_rows, 0 for an empty file */
	null_ratio: number
}

export interface DataQualityReport {
	file_count: number
	column_count: number
	/** most nulls (by ratio) first */
	columns_with_nulls: ColumnQuality[]
	all_null: ColumnQuality[]
	/** columns with no nulls and one distinct value per row */
	candidate_keys: ColumnQuality[]
	/** files scanned with zero rows */
	empty_files: string[]
}

export interface ColumnTypeGroup {
	data_type: DataType
	/** `file.column` references */
	columns: string[]
}
