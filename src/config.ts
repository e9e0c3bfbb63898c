/**
 * Shared constants, error taxonomy and request/response shapes.
 *
 * Runtime settings (endpoints, thresholds, retries) live in
 * config/loadConfig.ts; this module only holds what is fixed at build time.
 */

// ============================================================================
// Known file extensions
// ============================================================================

/** Extensions the scanner produces descriptors for. */
export const KNOWN_FILE_EXTENSIONS = [".csv", ".tsv", ".parquet", ".json", ".xlsx"] as const

/** Suffix applied to file arguments that arrive without an extension. */
export const DEFAULT_FILE_EXTENSION = ".csv"

// ============================================================================
// Metadata table
// ============================================================================

/** Columns of the flat descriptor table, in storage order. */
export const SCHEMA_INFO_COLUMNS = [
	"file_name",
	"file_path",
	"column_name",
	"data_type",
	"null_count",
	"unique_count",
	"total_rows",
	"file_size_mb",
	"last_scanned",
] as const

// ============================================================================
// Errors
// ============================================================================

export type SchemaQueryErrorKind =
	| "parse"
	| "unknown_tool"
	| "invalid_parameters"
	| "tool_execution"
	| "timeout"
	| "embedding_unavailable"
	| "endpoint_unavailable"

/**
 * Error raised anywhere in the resolution pipeline.
 *
 * `recoverable` marks errors the orchestrator answers with the next strategy
 * rather than a repair attempt or a failure message.
 */
export class SchemaQueryError extends Error {
	constructor(
		public kind: SchemaQueryErrorKind,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "SchemaQueryError"
	}
}

/** Kinds that move resolution on to the next strategy in the chain. */
const FALLBACK_KINDS: ReadonlySet<SchemaQueryErrorKind> = new Set([
	"parse",
	"unknown_tool",
	"invalid_parameters",
	"timeout",
	"endpoint_unavailable",
])

export function isFallbackError(error: unknown): boolean {
	return error instanceof SchemaQueryError && FALLBACK_KINDS.has(error.kind)
}

/** Wrap any thrown value as a SchemaQueryError of the given kind. */
export function toSchemaQueryError(
	error: unknown,
	kind: SchemaQueryErrorKind,
	context?: Record<string, unknown>,
): SchemaQueryError {
	if (error instanceof SchemaQueryError) return error
	const message = error instanceof Error ? error.message : String(error)
	return new SchemaQueryError(kind, message, false, context)
}

const ERROR_SUGGESTIONS: Record<SchemaQueryErrorKind, string> = {
	parse: "Try rephrasing the question, for example \"show the columns of orders.csv\".",
	unknown_tool: "Ask for one of the supported analyses; run schema_help to list them.",
	invalid_parameters: "Name the file or column the question is about.",
	tool_execution: "Check that the files have been scanned and the metadata store is reachable.",
	timeout: "Check the inference endpoint is reachable, or try a simpler question.",
	embedding_unavailable: "Semantic features need the embedding model; check it is pulled and the endpoint is reachable.",
	endpoint_unavailable: "Check the inference endpoint is reachable.",
}

export function suggestionFor(kind: SchemaQueryErrorKind): string {
	return ERROR_SUGGESTIONS[kind]
}

// ============================================================================
// Logger
// ============================================================================

export interface Logger {
	info(message: string, meta?: Record<string, unknown>): void
	warn(message: string, meta?: Record<string, unknown>): void
	error(message: string, meta?: Record<string, unknown>): void
	debug(message: string, meta?: Record<string, unknown>): void
}
