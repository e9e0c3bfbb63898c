/**
 * SQL generation strategy
 *
 * Asks the model for one read-only statement against the descriptor table
 * and plans it onto the hidden run_metadata_query tool. Statements are
 * cleaned and checked before a plan is returned, so a write never reaches
 * the runner. After an execution error the orchestrator calls repair(),
 * one attempt at a time, up to maxRepairs.
 */

import { SchemaQueryError } from "../config.js"
import type { ChatClient, ChatMessage } from "../ollama_client.js"
import {
	STRATEGY_PRIORITY,
	type QueryStrategy,
	type RepairRequest,
	type ResolutionPlan,
	type StrategyContext,
	type StrategyTag,
} from "../resolution_plan.js"
import { METADATA_QUERY_TOOL } from "../schema_tools.js"
import { assertReadOnly, cleanGeneratedSql } from "../sql_guard.js"
import type { ModelStrategyOptions } from "./function_calling.js"

export interface SqlGenerationOptions extends ModelStrategyOptions {
	table: string
	maxRetries: number
}

function tableDescription(table: string): string {
	return [
		`${table}(file_name text, file_path text, column_name text, data_type text, null_count bigint, unique_count bigint, total_rows bigint, file_size_mb double precision, last_scanned timestamp)`,
		"One row per column per scanned file.",
	].join("\n")
}

export class SqlGenerationStrategy implements QueryStrategy {
	readonly tag: StrategyTag = "sql_generation"
	readonly priority = STRATEGY_PRIORITY.sql_generation
	readonly maxRepairs: number

	constructor(
		private readonly chat: ChatClient,
		private readonly options: SqlGenerationOptions,
	) {
		this.maxRepairs = options.maxRetries
	}

	async parse(query: string, context: StrategyContext): Promise<ResolutionPlan> {
		this.requireTool(context)
		const messages: ChatMessage[] = [
			{
				role: "system",
				content: [
					"You write one read-only PostgreSQL query against this table:",
					tableDescription(this.options.table),
					"",
					"Use SELECT or WITH only. Reply with the SQL and nothing else.",
				].join("\n"),
			},
			{ role: "user", content: query },
		]
		return this.planFrom(await this.generate(messages, context), "metadata_query", context)
	}

	async repair(request: RepairRequest, context: StrategyContext): Promise<ResolutionPlan> {
		this.requireTool(context)
		const failed = typeof request.plan.parameters.sql === "string" ? request.plan.parameters.sql : ""
		const messages: ChatMessage[] = [
			{
				role: "system",
				content: [
					`Table: ${tableDescription(this.options.table)}`,
					"",
					"This query failed:",
					failed,
					`Error: ${request.error}`,
					"",
					"Write a simpler query that answers the question. SELECT only. Reply with the SQL and nothing else.",
				].join("\n"),
			},
			{ role: "user", content: request.query },
		]
		this.options.logger.debug("Regenerating SQL", { attempt: request.attempt, error: request.error })
		return this.planFrom(await this.generate(messages, context), "metadata_query_repair", context)
	}

	private requireTool(context: StrategyContext): void {
		if (!context.registry.has(METADATA_QUERY_TOOL)) {
			throw new SchemaQueryError("unknown_tool", "Metadata queries are not available", true, {
				tool: METADATA_QUERY_TOOL,
			})
		}
	}

	private async generate(messages: ChatMessage[], context: StrategyContext): Promise<string> {
		const response = await this.chat.chat(this.options.model, messages, undefined, context.signal)
		const sql = cleanGeneratedSql(response.content)
		if (!sql) throw new SchemaQueryError("parse", "Model returned no SQL", true)
		assertReadOnly(sql, this.options.table)
		return sql
	}

	private planFrom(sql: string, intent: string, context: StrategyContext): ResolutionPlan {
		return {
			intent,
			tool_name: METADATA_QUERY_TOOL,
			parameters: { sql },
			confidence: 0.7,
			strategy_tag: this.tag,
			is_fallback: context.isFallback,
		}
	}
}
