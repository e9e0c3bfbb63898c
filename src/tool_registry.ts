/**
 * Tool Registry
 *
 * Catalog of named analyses the strategies can target. Each tool declares a
 * parameter schema; validate() checks a plan against it (types, enums,
 * required values) and fills gaps from the question before anything runs.
 */

import { SchemaQueryError } from "./config.js"
import type { ChatTool } from "./ollama_client.js"
import { extractColumnReference, extractFileReferences, resolveFileName } from "./query_hints.js"
import type { ResolutionPlan, ValidatedPlan } from "./resolution_plan.js"

// ============================================================================
// Types
// ============================================================================

export type ParamType = "string" | "number" | "integer" | "boolean"
export type ParamValue = string | number | boolean
export type ToolParams = Record<string, ParamValue>

export interface ToolParameter {
	type: ParamType
	description: string
	required?: boolean
	enum?: readonly string[]
	default?: ParamValue
	/** Inclusive bounds for number and integer parameters */
	minimum?: number
	maximum?: number
	/** How to recover the value from the question when the plan omits it */
	derive?: "file" | "column"
}

export interface ToolExecutionContext {
	queryId?: string
	signal?: AbortSignal
	/** When non-empty, tools only look at these files */
	files?: readonly string[]
}

export interface ToolDefinition {
	name: string
	description: string
	parameters: Record<string, ToolParameter>
	/** Hidden tools are not advertised to models but can be planned directly */
	hidden?: boolean
	execute(params: ToolParams, context: ToolExecutionContext): Promise<string>
}

export interface JsonSchemaProperty {
	type: ParamType
	description: string
	enum?: string[]
	default?: ParamValue
	minimum?: number
	maximum?: number
}

export interface ToolParametersSchema {
	type: "object"
	properties: Record<string, JsonSchemaProperty>
	required: string[]
}

export interface ToolSchema {
	name: string
	description: string
	parameters: ToolParametersSchema
}

export interface ValidationContext {
	query: string
	availableFiles: string[]
}

// ============================================================================
// Coercion
// ============================================================================

function isBlank(value: unknown): boolean {
	return value === undefined || value === null || (typeof value === "string" && value.trim() === "")
}

function coerce(name: string, spec: ToolParameter, raw: unknown): ParamValue {
	const value = Array.isArray(raw) ? raw[0] : raw
	switch (spec.type) {
		case "string": {
			if (typeof value === "string") return value.trim()
			if (typeof value === "number" || typeof value === "boolean") return String(value)
			break
		}
		case "number":
		case "integer": {
			const n = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN
			if (Number.isFinite(n) && (spec.type === "number" || Number.isSafeInteger(n))) return n
			break
		}
		case "boolean": {
			if (typeof value === "boolean") return value
			if (value === "true" || value === "yes" || value === 1 || value === "1") return true
			if (value === "false" || value === "no" || value === 0 || value === "0") return false
			break
		}
	}
	throw new SchemaQueryError(
		"invalid_parameters",
		`Parameter "${name}" must be ${spec.type === "integer" ? "an integer" : `a ${spec.type}`}`,
		true,
		{ parameter: name, value: String(value) },
	)
}

function checkBounds(name: string, spec: ToolParameter, value: ParamValue): void {
	if (typeof value !== "number") return
	let message: string | null = null
	if (spec.minimum !== undefined && value < spec.minimum) message = `Parameter "${name}" must be at least ${spec.minimum}`
	else if (spec.maximum !== undefined && value > spec.maximum) message = `Parameter "${name}" must be at most ${spec.maximum}`
	if (message !== null) {
		throw new SchemaQueryError("invalid_parameters", message, true, { parameter: name, value: String(value) })
	}
}

// ============================================================================
// Registry
// ============================================================================

export class ToolRegistry {
	private readonly tools = new Map<string, ToolDefinition>()

	/** Idempotent for the same definition; a different one under a taken name is an error. */
	register(tool: ToolDefinition): void {
		const existing = this.tools.get(tool.name)
		if (existing) {
			if (existing === tool || sameShape(existing, tool)) return
			throw new Error(`Tool "${tool.name}" is already registered with a different definition`)
		}
		this.tools.set(tool.name, tool)
	}

	has(name: string): boolean {
		return this.tools.has(name)
	}

	get(name: string): ToolDefinition | undefined {
		return this.tools.get(name)
	}

	names(includeHidden = false): string[] {
		return [...this.tools.values()].filter((t) => includeHidden || !t.hidden).map((t) => t.name)
	}

	schemas(): ToolSchema[] {
		return [...this.tools.values()].filter((t) => !t.hidden).map(toSchema)
	}

	chatTools(): ChatTool[] {
		return this.schemas().map((schema) => ({ type: "function", function: schema }))
	}

	/** One line per advertised tool, for prompts that cannot take tool schemas. */
	describe(): string {
		return this.schemas()
			.map((s) => {
				const params = Object.entries(s.parameters.properties)
					.map(([name, p]) => {
						const optional = s.parameters.required.includes(name) ? "" : "?"
						const values = p.enum ? `: ${p.enum.join("|")}` : `: ${p.type}`
						return `${name}${optional}${values}`
					})
					.join(", ")
				return `- ${s.name}(${params}): ${s.description}`
			})
			.join("\n")
	}

	/**
	 * Check a plan against its tool's schema.
	 *
	 * Blank parameters are recovered from the question where the schema says
	 * how (file or column references), then from schema defaults. Unknown
	 * parameters are dropped.
	 */
	validate(plan: ResolutionPlan, context: ValidationContext): ValidatedPlan {
		const tool = this.tools.get(plan.tool_name)
		if (!tool) {
			throw new SchemaQueryError("unknown_tool", `Unknown tool "${plan.tool_name}"`, true, {
				tool: plan.tool_name,
				available: this.names(),
			})
		}

		const fileRefs = extractFileReferences(context.query, context.availableFiles)
		// blank file parameters take references the plan did not already name, in order of mention
		const claimed = new Set<string>()
		for (const [name, spec] of Object.entries(tool.parameters)) {
			const given = plan.parameters[name]
			if (spec.derive === "file" && typeof given === "string" && !isBlank(given)) {
				claimed.add(resolveFileName(given, context.availableFiles))
			}
		}
		const params: ToolParams = {}
		const missing: string[] = []

		for (const [name, spec] of Object.entries(tool.parameters)) {
			let raw: unknown = plan.parameters[name]

			if (isBlank(raw) && spec.derive === "file") {
				const next = fileRefs.find((f) => !claimed.has(f))
				if (next !== undefined) {
					claimed.add(next)
					raw = next
				}
			} else if (isBlank(raw) && spec.derive === "column") {
				raw = extractColumnReference(context.query) ?? undefined
			}
			if (isBlank(raw)) raw = spec.default

			if (isBlank(raw)) {
				if (spec.required) missing.push(name)
				continue
			}

			let value = coerce(name, spec, raw)
			if (spec.derive === "file" && typeof value === "string") {
				value = resolveFileName(value, context.availableFiles)
			}
			if (spec.enum && !spec.enum.includes(String(value))) {
				throw new SchemaQueryError(
					"invalid_parameters",
					`Parameter "${name}" must be one of ${spec.enum.join(", ")}`,
					true,
					{ parameter: name, value: String(value) },
				)
			}
			checkBounds(name, spec, value)
			params[name] = value
		}

		if (missing.length > 0) {
			throw new SchemaQueryError(
				"invalid_parameters",
				`Missing required parameter${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
				true,
				{ tool: tool.name, missing },
			)
		}

		return {
			validated: true,
			intent: plan.intent,
			tool_name: tool.name,
			parameters: params,
			confidence: plan.confidence,
			strategy_tag: plan.strategy_tag,
			is_fallback: plan.is_fallback,
		}
	}

	async execute(plan: ValidatedPlan, context: ToolExecutionContext = {}): Promise<string> {
		const tool = this.tools.get(plan.tool_name)
		if (!tool) {
			throw new SchemaQueryError("unknown_tool", `Unknown tool "${plan.tool_name}"`, true, { tool: plan.tool_name })
		}
		try {
			return await tool.execute(plan.parameters, context)
		} catch (error) {
			if (error instanceof SchemaQueryError && error.kind === "tool_execution") throw error
			const message = error instanceof Error ? error.message : String(error)
			throw new SchemaQueryError("tool_execution", message, false, {
				tool: plan.tool_name,
				cause_kind: error instanceof SchemaQueryError ? error.kind : undefined,
			})
		}
	}
}

function toSchema(tool: ToolDefinition): ToolSchema {
	const properties: Record<string, JsonSchemaProperty> = {}
	const required: string[] = []
	for (const [name, p] of Object.entries(tool.parameters)) {
		properties[name] = {
			type: p.type,
			description: p.description,
			...(p.enum ? { enum: [...p.enum] } : {}),
			...(p.default !== undefined ? { default: p.default } : {}),
			...(p.minimum !== undefined ? { minimum: p.minimum } : {}),
			...(p.maximum !== undefined ? { maximum: p.maximum } : {}),
		}
		if (p.required) required.push(name)
	}
	return { name: tool.name, description: tool.description, parameters: { type: "object", properties, required } }
}

function sameShape(a: ToolDefinition, b: ToolDefinition): boolean {
	return JSON.stringify(toSchema(a)) === JSON.stringify(toSchema(b)) && Boolean(a.hidden) === Boolean(b.hidden)
}
