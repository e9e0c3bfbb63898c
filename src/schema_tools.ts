/**
 * Schema tool catalog
 *
 * The analyses a question can resolve to. Each tool reads what it needs from
 * the store first and only then does semantic (network) work, so no store
 * read is held open across an embedding call.
 *
 * Semantic tools degrade when the embedding engine is unavailable: they fall
 * back to exact or keyword analysis and say so in a note.
 */

import { SchemaQueryError, type Logger } from "./config.js"
import type { AppConfig } from "./config/loadConfig.js"
import {
	formatColumnMatches,
	formatCommonColumns,
	formatColumnTypes,
	formatConceptGroups,
	formatDataQuality,
	formatFileList,
	formatFileSchema,
	formatIssues,
	formatQueryResult,
	formatSchemaDiff,
	formatSimilarSchemas,
	formatSummary,
	formatTypeMismatches,
	NO_FILES_SCANNED,
} from "./formatters.js"
import {
	analyzeDataQuality,
	columnsOfFile,
	columnTypes,
	detectAbbreviations,
	detectConceptTypeMismatches,
	detectNamingInconsistencies,
	detectTypeMismatches,
	diffSchemas,
	fileNames,
	findCommonColumns,
	findSimilarSchemas,
	searchColumns,
	summarizeDatabase,
	typeMismatchIssue,
} from "./schema_analyzer.js"
import type { ReadOnlyQueryRunner, SchemaStore } from "./schema_store.js"
import type { ColumnDescriptor, ConceptGroups, SemanticMatch } from "./schema_types.js"
import { inferConcept, uniqueCandidates, type NameMatcher } from "./semantic_matcher.js"
import { assertReadOnly } from "./sql_guard.js"
import type { ToolDefinition, ToolExecutionContext, ToolParams, ToolRegistry } from "./tool_registry.js"

// ============================================================================
// Dependencies
// ============================================================================

export interface SemanticEngine extends NameMatcher {
	getConceptGroups(columns: ColumnDescriptor[], threshold: number, signal?: AbortSignal): Promise<ConceptGroups>
}

export interface SchemaToolDeps {
	store: SchemaStore
	runner?: ReadOnlyQueryRunner
	matcher: SemanticEngine
	config: Pick<AppConfig, "database" | "semantic" | "analysis" | "sql">
	logger: Logger
}

export const CHECK_TYPES = ["data_types", "naming", "abbreviations", "concept_types"] as const

export const SEMANTIC_UNAVAILABLE_NOTE = "semantic matching is unavailable, so only exact names were compared."

export const METADATA_QUERY_TOOL = "run_metadata_query"

// ============================================================================
// Parameter readers
// ============================================================================

function str(params: ToolParams, name: string): string {
	const value = params[name]
	return typeof value === "string" ? value : ""
}

function num(params: ToolParams, name: string, fallback: number): number {
	const value = params[name]
	return typeof value === "number" ? value : fallback
}

function bool(params: ToolParams, name: string): boolean {
	return params[name] === true
}

/** Items in the files the request is limited to; all items when it names none. */
function inScope<T extends { file_name: string }>(items: T[], context: ToolExecutionContext): T[] {
	const files = context.files
	if (!files || files.length === 0) return items
	const allowed = new Set(files)
	return items.filter((item) => allowed.has(item.file_name))
}

// ============================================================================
// Registration
// ============================================================================

export function registerSchemaTools(registry: ToolRegistry, deps: SchemaToolDeps): void {
	for (const tool of createSchemaTools(deps)) registry.register(tool)
}

export function createSchemaTools(deps: SchemaToolDeps): ToolDefinition[] {
	const { store, matcher, config, logger } = deps

	/** Run semantic work; null when the engine is unavailable or fails. */
	async function trySemantic<T>(tool: string, work: () => Promise<T>): Promise<T | null> {
		if (!matcher.available) return null
		try {
			return await work()
		} catch (error) {
			if (error instanceof SchemaQueryError && error.kind === "embedding_unavailable") {
				logger.warn("Semantic step skipped", { tool, error: error.message })
				return null
			}
			throw error
		}
	}

	const listFiles: ToolDefinition = {
		name: "list_files",
		description: "List scanned files with column and row counts; optional name filter",
		parameters: {
			pattern: { type: "string", description: "Substring the file name must contain" },
		},
		async execute(params, context) {
			const pattern = str(params, "pattern")
			const files = inScope(await store.listAllFiles(), context)
			const needle = pattern.toLowerCase()
			const matching = needle ? files.filter((f) => f.file_name.toLowerCase().includes(needle)) : files
			return formatFileList(matching, pattern || undefined)
		},
	}

	const getFileSchema: ToolDefinition = {
		name: "get_file_schema",
		description: "Show the columns of one file with type, null and unique counts",
		parameters: {
			file_name: { type: "string", description: "File name, e.g. orders.csv", required: true, derive: "file" },
		},
		async execute(params, context) {
			const fileName = str(params, "file_name")
			const columns = inScope(await store.getFileSchema(fileName), context)
			if (columns.length > 0) return formatFileSchema(fileName, columns, [])
			const files = inScope(await store.listAllFiles(), context)
			return formatFileSchema(
				fileName,
				columns,
				files.map((f) => f.file_name),
			)
		},
	}

	const findColumns: ToolDefinition = {
		name: "find_columns",
		description: "Find columns by name across all files; semantic search finds similar names",
		parameters: {
			column_name: { type: "string", description: "Column name or part of one", required: true, derive: "column" },
			semantic: { type: "boolean", description: "Also match similar names by meaning", default: false },
		},
		async execute(params, context) {
			const term = str(params, "column_name")
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED
			const substring = searchColumns(columns, term)
			if (!bool(params, "semantic") && substring.length > 0) return formatColumnMatches(term, substring)

			const semantic = await trySemantic("find_columns", () =>
				matcher.findSimilar(term, uniqueCandidates(columns), config.semantic.search_threshold, context.signal),
			)
			if (semantic === null) {
				return formatColumnMatches(term, substring, "semantic search is unavailable; showing name matches only.")
			}
			return formatColumnMatches(term, mergeMatches(semantic, substring))
		},
	}

	const detectMismatches: ToolDefinition = {
		name: "detect_type_mismatches",
		description: "Columns that have different data types in different files",
		parameters: {},
		async execute(_params, context) {
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED
			return formatTypeMismatches(detectTypeMismatches(columns))
		},
	}

	const findCommon: ToolDefinition = {
		name: "find_common_columns",
		description: "Column names that appear in at least `threshold` files",
		parameters: {
			threshold: {
				type: "integer",
				description: "Minimum number of files",
				default: config.analysis.common_column_threshold,
				minimum: 1,
			},
		},
		async execute(params, context) {
			const threshold = num(params, "threshold", config.analysis.common_column_threshold)
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED
			return formatCommonColumns(findCommonColumns(columns, threshold), threshold)
		},
	}

	const findSimilar: ToolDefinition = {
		name: "find_similar_schemas",
		description: "File pairs with overlapping column sets (Jaccard similarity)",
		parameters: {
			threshold: {
				type: "number",
				description: "Similarity a pair must exceed, 0 to 1",
				default: config.analysis.schema_similarity_threshold,
				minimum: 0,
				maximum: 1,
			},
		},
		async execute(params, context) {
			const threshold = num(params, "threshold", config.analysis.schema_similarity_threshold)
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED
			return formatSimilarSchemas(findSimilarSchemas(columns, threshold), threshold)
		},
	}

	const compareSchemas: ToolDefinition = {
		name: "compare_schemas",
		description: "Compare two files: shared, missing and differently typed columns",
		parameters: {
			file1: { type: "string", description: "First file", required: true, derive: "file" },
			file2: { type: "string", description: "Second file", required: true, derive: "file" },
		},
		async execute(params, context) {
			const file1 = str(params, "file1")
			const file2 = str(params, "file2")
			const columns = inScope(await store.getAllColumns(), context)
			const scanned = fileNames(columns)
			const unknown = [file1, file2].filter((f) => !scanned.includes(f))
			if (unknown.length > 0) {
				return formatFileSchema(unknown[0], [], scanned)
			}
			const diff = await diffSchemas(columns, file1, file2, {
				matcher,
				threshold: config.semantic.equivalence_threshold,
				signal: context.signal,
			})
			return formatSchemaDiff(diff, diff.semantic_checked ? undefined : SEMANTIC_UNAVAILABLE_NOTE)
		},
	}

	const detectInconsistencies: ToolDefinition = {
		name: "detect_inconsistencies",
		description:
			"Consistency checks: data_types (same name, different types), naming (similar names spelled differently), abbreviations, concept_types (same kind of column, different types)",
		parameters: {
			check_type: { type: "string", description: "Which check to run", enum: CHECK_TYPES, default: "data_types" },
			threshold: {
				type: "number",
				description: "Name similarity threshold for naming checks, 0 to 1",
				default: config.semantic.naming_threshold,
				minimum: 0,
				maximum: 1,
			},
		},
		async execute(params, context) {
			const checkType = str(params, "check_type") || "data_types"
			const threshold = num(params, "threshold", config.semantic.naming_threshold)
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED

			switch (checkType) {
				case "naming":
				case "abbreviations": {
					const issues = await trySemantic("detect_inconsistencies", () =>
						checkType === "naming"
							? detectNamingInconsistencies(columns, matcher, threshold, context.signal)
							: detectAbbreviations(columns, matcher, threshold, context.signal),
					)
					if (issues === null) {
						return "Semantic matching is unavailable, so naming checks cannot run. Type mismatch and common column checks still work."
					}
					return formatIssues(
						issues,
						checkType === "naming" ? "No naming inconsistencies found." : "No abbreviations found.",
					)
				}
				case "concept_types":
					return formatIssues(detectConceptTypeMismatches(columns), "No concept type mismatches found.")
				default: {
					const issues = detectTypeMismatches(columns).map((m) => typeMismatchIssue(m, columns))
					return formatIssues(issues, "No data type inconsistencies found.")
				}
			}
		},
	}

	const conceptGroups: ToolDefinition = {
		name: "find_concept_groups",
		description: "Group columns by what they represent (identifiers, timestamps, money, contact details...)",
		parameters: {
			threshold: {
				type: "number",
				description: "Similarity threshold, 0 to 1",
				default: config.semantic.concept_threshold,
				minimum: 0,
				maximum: 1,
			},
		},
		async execute(params, context) {
			const threshold = num(params, "threshold", config.semantic.concept_threshold)
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED
			const groups = await trySemantic("find_concept_groups", () =>
				matcher.getConceptGroups(columns, threshold, context.signal),
			)
			if (groups === null) {
				return formatConceptGroups(keywordConceptGroups(columns), "semantic matching is unavailable; grouped by keyword.")
			}
			return formatConceptGroups(groups)
		},
	}

	const databaseSummary: ToolDefinition = {
		name: "database_summary",
		description: "Totals across all scanned files: files, columns, rows, types, last scan",
		parameters: {},
		async execute(_params, context) {
			return formatSummary(summarizeDatabase(inScope(await store.getAllColumns(), context)))
		},
	}

	const dataQuality: ToolDefinition = {
		name: "data_quality",
		description: "Null counts, all-null columns and candidate key columns; optionally for one file",
		parameters: {
			file_name: { type: "string", description: "Only check this file", derive: "file" },
			limit: { type: "integer", description: "Most columns with nulls to list", default: 10, minimum: 1 },
		},
		async execute(params, context) {
			const fileName = str(params, "file_name")
			const limit = num(params, "limit", 10)
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED
			if (!fileName) return formatDataQuality(analyzeDataQuality(columns), limit)
			const scanned = fileNames(columns)
			if (!scanned.includes(fileName)) return formatFileSchema(fileName, [], scanned)
			return formatDataQuality(analyzeDataQuality(columnsOfFile(columns, fileName)), limit)
		},
	}

	const columnTypesTool: ToolDefinition = {
		name: "column_types",
		description: "Data types of every column whose name contains a term, grouped by type",
		parameters: {
			column_name: { type: "string", description: "Column name or part of one", required: true, derive: "column" },
		},
		async execute(params, context) {
			const term = str(params, "column_name")
			const columns = inScope(await store.getAllColumns(), context)
			if (columns.length === 0) return NO_FILES_SCANNED
			return formatColumnTypes(term, columnTypes(columns, term))
		},
	}

	const tools = [
		listFiles,
		getFileSchema,
		findColumns,
		detectMismatches,
		findCommon,
		findSimilar,
		compareSchemas,
		detectInconsistencies,
		conceptGroups,
		databaseSummary,
		dataQuality,
		columnTypesTool,
	]

	const runner = deps.runner
	if (runner) {
		tools.push({
			name: METADATA_QUERY_TOOL,
			description: "Run one read-only SELECT against the schema_info table",
			hidden: true,
			parameters: {
				sql: { type: "string", description: "A single SELECT or WITH statement", required: true },
			},
			async execute(params) {
				const sql = str(params, "sql")
				assertReadOnly(sql, config.database.table)
				const result = await runner.runReadOnly(sql, {
					maxRows: config.sql.max_rows,
					timeoutMs: config.sql.statement_timeout_ms,
				})
				return formatQueryResult(result)
			},
		})
	}

	return tools
}

// ============================================================================
// Helpers
// ============================================================================

/** Semantic matches first, then name matches the semantic pass did not return. */
function mergeMatches(semantic: SemanticMatch[], substring: SemanticMatch[]): SemanticMatch[] {
	const seen = new Set(semantic.map((m) => `${m.file_name}\u0000${m.column_name}`))
	return [...semantic, ...substring.filter((m) => !seen.has(`${m.file_name}\u0000${m.column_name}`))]
}

/** Concept groups from name keywords alone. */
export function keywordConceptGroups(columns: ColumnDescriptor[]): ConceptGroups {
	const groups: ConceptGroups = {}
	for (const col of columns) {
		const concept = inferConcept(col.column_name)
		if (!concept) continue
		const match: SemanticMatch = {
			column_name: col.column_name,
			file_name: col.file_name,
			similarity: 1,
			match_type: "pattern",
		}
		const list = groups[concept]
		if (list) list.push(match)
		else groups[concept] = [match]
	}
	return groups
}
