/**
 * Schema Store
 *
 * Read-only access to the flat descriptor table written by the scanner.
 * Every method completes its round-trip before returning; nothing holds a
 * connection or transaction open while the caller talks to a model.
 */

import pg from "pg"
import {
	normalizeDataType,
	summarizeFiles,
	type ColumnDescriptor,
	type FileSummary,
} from "./schema_types.js"
import { SCHEMA_INFO_COLUMNS, SchemaQueryError, type Logger } from "./config.js"

// ============================================================================
// Interfaces
// ============================================================================

export interface SchemaStore {
	listAllFiles(): Promise<FileSummary[]>
	getFileSchema(fileName: string): Promise<ColumnDescriptor[]>
	getAllColumns(): Promise<ColumnDescriptor[]>
}

export interface ReadOnlyQueryOptions {
	maxRows: number
	timeoutMs: number
}

export interface ReadOnlyQueryResult {
	columns: string[]
	rows: Array<Record<string, unknown>>
	truncated: boolean
}

/** Executes already-guarded SELECT/WITH statements against the descriptor table. */
export interface ReadOnlyQueryRunner {
	runReadOnly(sql: string, options: ReadOnlyQueryOptions): Promise<ReadOnlyQueryResult>
}

// ============================================================================
// Postgres
// ============================================================================

interface SchemaInfoRow {
	file_name: string
	file_path: string | null
	column_name: string
	data_type: string
	null_count: string | number | null
	unique_count: string | number | null
	total_rows: string | number | null
	file_size_mb: string | number | null
	last_scanned: Date | string | null
}

function toNumber(value: string | number | null): number {
	if (value === null) return 0
	const n = typeof value === "number" ? value : Number(value)
	return Number.isFinite(n) ? n : 0
}

function toTimestamp(value: Date | string | null): string | null {
	if (value === null) return null
	return value instanceof Date ? value.toISOString() : value
}

export function rowToDescriptor(row: SchemaInfoRow): ColumnDescriptor {
	return {
		file_name: row.file_name,
		file_path: row.file_path ?? "",
		column_name: row.column_name,
		data_type: normalizeDataType(row.data_type),
		null_count: toNumber(row.null_count),
		unique_count: toNumber(row.unique_count),
		total_rows: toNumber(row.total_rows),
		file_size_mb: toNumber(row.file_size_mb),
		last_scanned: toTimestamp(row.last_scanned),
	}
}

export class PgSchemaStore implements SchemaStore, ReadOnlyQueryRunner {
	private readonly selectList: string

	constructor(
		private readonly pool: pg.Pool,
		private readonly table: string,
		private readonly logger: Logger,
	) {
		this.selectList = SCHEMA_INFO_COLUMNS.join(", ")
	}

	async getAllColumns(): Promise<ColumnDescriptor[]> {
		const result = await this.pool.query<SchemaInfoRow>(
			`SELECT ${this.selectList} FROM ${this.table} ORDER BY file_name, column_name`,
		)
		return result.rows.map(rowToDescriptor)
	}

	async getFileSchema(fileName: string): Promise<ColumnDescriptor[]> {
		const result = await this.pool.query<SchemaInfoRow>(
			`SELECT ${this.selectList} FROM ${this.table} WHERE file_name = $1 ORDER BY column_name`,
			[fileName],
		)
		return result.rows.map(rowToDescriptor)
	}

	async listAllFiles(): Promise<FileSummary[]> {
		return summarizeFiles(await this.getAllColumns())
	}

	async runReadOnly(sql: string, options: ReadOnlyQueryOptions): Promise<ReadOnlyQueryResult> {
		const limit = Math.max(1, Math.floor(options.maxRows))
		const timeout = Math.max(1, Math.floor(options.timeoutMs))
		let client: pg.PoolClient | null = null
		try {
			client = await this.pool.connect()
			await client.query("BEGIN READ ONLY")
			await client.query(`SET LOCAL statement_timeout = ${timeout}`)
			const result = await client.query<Record<string, unknown>>(
				`SELECT * FROM (${sql}) AS metadata_query LIMIT ${limit + 1}`,
			)
			return {
				columns: result.fields.map((f) => f.name),
				rows: result.rows.slice(0, limit),
				truncated: result.rows.length > limit,
			}
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error)
			this.logger.warn("Metadata query failed", { sql, error: message })
			throw new SchemaQueryError("tool_execution", message, false, { sql })
		} finally {
			if (client) {
				try {
					await client.query("ROLLBACK")
				} catch (rollbackError) {
					this.logger.debug("Rollback after metadata query failed", { error: String(rollbackError) })
				}
				client.release()
			}
		}
	}
}

// ============================================================================
// In-memory
// ============================================================================

/** Store over a fixed descriptor snapshot. */
export class MemorySchemaStore implements SchemaStore {
	private readonly columns: ColumnDescriptor[]

	constructor(columns: ColumnDescriptor[]) {
		this.columns = [...columns].sort(
			(a, b) => a.file_name.localeCompare(b.file_name) || a.column_name.localeCompare(b.column_name),
		)
	}

	async getAllColumns(): Promise<ColumnDescriptor[]> {
		return [...this.columns]
	}

	async getFileSchema(fileName: string): Promise<ColumnDescriptor[]> {
		return this.columns.filter((c) => c.file_name === fileName)
	}

	async listAllFiles(): Promise<FileSummary[]> {
		return summarizeFiles(this.columns)
	}
}

/** Build a descriptor with zeroed statistics; used for snapshots assembled in code. */
export function descriptor(
	file_name: string,
	column_name: string,
	data_type: ColumnDescriptor["data_type"],
	stats: Partial<Omit<ColumnDescriptor, "file_name" | "column_name" | "data_type">> = {},
): ColumnDescriptor {
	return {
		file_name,
		file_path: stats.file_path ?? `/data/${file_name}`,
		column_name,
		data_type,
		null_count: stats.null_count ?? 0,
		unique_count: stats.unique_count ?? 0,
		total_rows: stats.total_rows ?? 0,
		file_size_mb: stats.file_size_mb ?? 0,
		last_scanned: stats.last_scanned ?? null,
	}
}
