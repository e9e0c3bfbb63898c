/**
 * Result formatting
 *
 * Every tool answers with text. These render analyzer results as short
 * markdown-ish blocks; empty results get a sentence instead of an empty list
 * so "nothing scanned" and "scanned, nothing found" read differently.
 */

import type { ReadOnlyQueryResult } from "./schema_store.js"
import {
	DATA_TYPES,
	type ColumnDescriptor,
	type ColumnTypeGroup,
	type CommonColumn,
	type ConceptGroups,
	type ConsistencyIssue,
	type ConsistencyIssueKind,
	type DataQualityReport,
	type DatabaseSummary,
	type FileSummary,
	type SchemaDiff,
	type SchemaSimilarity,
	type SemanticMatch,
	type TypeMismatch,
} from "./schema_types.js"

export const NO_FILES_SCANNED = "No files have been scanned yet."

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`
}

export function percent(value: number): string {
	return `${Math.round(value * 100)}%`
}

function formatSize(mb: number): string {
	return `${mb.toFixed(2)} MB`
}

function listOrNone(values: string[]): string {
	return values.length > 0 ? values.join(", ") : "none"
}

function withNote(text: string, note?: string): string {
	return note ? `${text}\n\nNote: ${note}` : text
}

// ============================================================================
// Files
// ============================================================================

export function formatFileList(files: FileSummary[], pattern?: string): string {
	if (files.length === 0) return pattern ? `No scanned files match "${pattern}".` : NO_FILES_SCANNED
	const lines = [`**${plural(files.length, "file")}:**`]
	for (const f of files) {
		lines.push(`- ${f.file_name}: ${plural(f.column_count, "column")}, ${plural(f.total_rows, "row")}, ${formatSize(f.file_size_mb)}`)
	}
	return lines.join("\n")
}

export function formatFileSchema(fileName: string, columns: ColumnDescriptor[], availableFiles: string[]): string {
	if (columns.length === 0) {
		if (availableFiles.length === 0) return NO_FILES_SCANNED
		return `No scanned file named "${fileName}". Scanned files: ${availableFiles.join(", ")}`
	}
	const rows = Math.max(...columns.map((c) => c.total_rows))
	const lines = [`**${fileName}** (${plural(columns.length, "column")}, ${plural(rows, "row")})`]
	for (const c of columns) {
		lines.push(`- ${c.column_name}: ${c.data_type} (${c.null_count} null, ${c.unique_count} unique)`)
	}
	return lines.join("\n")
}

// ============================================================================
// Search
// ============================================================================

export function formatColumnMatches(term: string, matches: SemanticMatch[], note?: string): string {
	if (matches.length === 0) return withNote(`No columns matching "${term}".`, note)
	const lines = [`**Columns matching "${term}":**`]
	for (const m of matches) {
		const how = m.match_type === "exact" ? "exact" : `${m.match_type} ${m.similarity.toFixed(2)}`
		lines.push(`- ${m.file_name}: ${m.column_name} (${how})`)
	}
	return withNote(lines.join("\n"), note)
}

export function formatConceptGroups(groups: ConceptGroups, note?: string): string {
	const entries = Object.entries(groups)
	if (entries.length === 0) return withNote("No columns matched any concept.", note)
	const blocks = entries.map(([concept, matches]) => {
		const lines = [`**${concept}** (${matches.length})`]
		for (const m of matches) lines.push(`- ${m.file_name}: ${m.column_name} (${m.similarity.toFixed(2)})`)
		return lines.join("\n")
	})
	return withNote(blocks.join("\n\n"), note)
}

// ============================================================================
// Relationships
// ============================================================================

export function formatTypeMismatches(mismatches: TypeMismatch[]): string {
	if (mismatches.length === 0) return "No type mismatches found."
	const lines = [`**Type mismatches (${mismatches.length}):**`]
	for (const m of mismatches) {
		const variants = DATA_TYPES.flatMap((t) => {
			const files = m.type_variations[t]
			return files ? [`${t} in ${files.join(", ")}`] : []
		})
		lines.push(`- ${m.column_name} (${plural(m.total_files, "file")}): ${variants.join("; ")}`)
	}
	return lines.join("\n")
}

export function formatCommonColumns(common: CommonColumn[], threshold: number): string {
	if (common.length === 0) return `No columns appear in ${threshold} or more files.`
	const lines = [`**Columns shared by ${threshold}+ files:**`]
	for (const c of common) {
		lines.push(`- ${c.column_name}: ${plural(c.file_count, "file")} (${c.files.join(", ")}) [${c.data_types.join(", ")}]`)
	}
	return lines.join("\n")
}

export function formatSimilarSchemas(pairs: SchemaSimilarity[], threshold: number): string {
	if (pairs.length === 0) return `No file pairs share more than ${percent(threshold)} of their columns.`
	const lines = [`**Similar schemas (above ${percent(threshold)}):**`]
	for (const p of pairs) {
		lines.push(`- ${p.file1} and ${p.file2}: ${percent(p.similarity)} (${listOrNone(p.shared_columns)})`)
	}
	return lines.join("\n")
}

export function formatSchemaDiff(diff: SchemaDiff, note?: string): string {
	const lines = [
		`**${diff.file1} vs ${diff.file2}** (similarity ${percent(diff.similarity)})`,
		`Common: ${listOrNone(diff.common)}`,
		`Only in ${diff.file1}: ${listOrNone(diff.only_in_file1)}`,
		`Only in ${diff.file2}: ${listOrNone(diff.only_in_file2)}`,
		`Type differences: ${listOrNone(diff.type_mismatches.map((t) => `${t.column_name} (${t.file1_type} vs ${t.file2_type})`))}`,
	]
	if (diff.semantic_checked) {
		lines.push(
			`Semantic equivalents: ${listOrNone(
				diff.semantic_equivalents.map((e) => `${e.file1_column} ~ ${e.file2_column} (${e.similarity.toFixed(2)})`),
			)}`,
		)
	}
	return withNote(lines.join("\n"), note)
}

// ============================================================================
// Consistency
// ============================================================================

const ISSUE_LABELS: Record<ConsistencyIssueKind, string> = {
	type_mismatch: "Type mismatch",
	naming_inconsistency: "Naming inconsistency",
	abbreviation: "Abbreviation",
	concept_type_mismatch: "Concept type mismatch",
}

export function formatIssues(issues: ConsistencyIssue[], emptyText: string, note?: string): string {
	if (issues.length === 0) return withNote(emptyText, note)
	const lines = [`**Found ${plural(issues.length, "issue")}:**`]
	issues.forEach((issue, i) => {
		const concept = issue.concept ? ` (${issue.concept})` : ""
		const score = issue.similarity !== undefined ? ` [${issue.similarity.toFixed(2)}]` : ""
		const columns = issue.columns
			.map((c) => `${c.file_name}:${c.column_name}${c.data_type ? ` (${c.data_type})` : ""}`)
			.join(", ")
		lines.push(`${i + 1}. ${ISSUE_LABELS[issue.kind]}${concept}${score}: ${columns}`)
		lines.push(`   Suggestion: ${issue.suggestion}`)
	})
	return withNote(lines.join("\n"), note)
}

// ============================================================================
// Data quality
// ============================================================================

export function formatDataQuality(report: DataQualityReport, limit: number): string {
	if (report.column_count === 0) return NO_FILES_SCANNED
	const lines = [`**Data quality (${plural(report.column_count, "column")} in ${plural(report.file_count, "file")}):**`]

	if (report.columns_with_nulls.length === 0) {
		lines.push("Columns with nulls: none")
	} else {
		lines.push(`Columns with nulls (${report.columns_with_nulls.length}):`)
		for (const q of report.columns_with_nulls.slice(0, limit)) {
			lines.push(`- ${q.file_name}.${q.column_name}: ${percent(q.null_ratio)} null (${q.null_count} of ${plural(q.total_rows, "row")})`)
		}
		const hidden = report.columns_with_nulls.length - limit
		if (hidden > 0) lines.push(`- and ${hidden} more`)
	}

	lines.push(`All-null columns: ${listOrNone(report.all_null.map((q) => `${q.file_name}.${q.column_name}`))}`)
	lines.push(`Candidate keys: ${listOrNone(report.candidate_keys.map((q) => `${q.file_name}.${q.column_name}`))}`)
	if (report.empty_files.length > 0) lines.push(`Empty files: ${report.empty_files.join(", ")}`)
	return lines.join("\n")
}

export function formatColumnTypes(term: string, groups: ColumnTypeGroup[]): string {
	if (groups.length === 0) return `No columns containing "${term}".`
	const lines = [`**Data types for columns containing "${term}":**`]
	for (const g of groups) lines.push(`- ${g.data_type}: ${g.columns.join(", ")}`)
	return lines.join("\n")
}

// ============================================================================
// Summary
// ============================================================================

export function formatSummary(summary: DatabaseSummary): string {
	if (summary.file_count === 0) return NO_FILES_SCANNED
	const types = DATA_TYPES.flatMap((t) => {
		const n = summary.type_counts[t]
		return n ? [`${t} ${n}`] : []
	})
	return [
		"**Database summary**",
		`Files: ${summary.file_count}`,
		`Columns: ${summary.column_count} (${summary.distinct_column_names} distinct names)`,
		`Rows: ${summary.total_rows}`,
		`Size: ${formatSize(summary.total_size_mb)}`,
		`Types: ${types.join(", ")}`,
		`Last scanned: ${summary.last_scanned ?? "unknown"}`,
	].join("\n")
}

// ============================================================================
// Metadata queries
// ============================================================================

function formatCell(value: unknown): string {
	if (value === null || value === undefined) return "NULL"
	if (value instanceof Date) return value.toISOString()
	if (typeof value === "object") return JSON.stringify(value)
	return String(value)
}

export function formatQueryResult(result: ReadOnlyQueryResult): string {
	if (result.rows.length === 0) return "Query returned no rows."
	const lines = [result.columns.join(" | ")]
	for (const row of result.rows) lines.push(result.columns.map((c) => formatCell(row[c])).join(" | "))
	if (result.truncated) lines.push(`(showing first ${plural(result.rows.length, "row")})`)
	return lines.join("\n")
}
