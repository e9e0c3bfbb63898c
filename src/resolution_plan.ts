/**
 * Resolution plans and the strategy contract
 *
 * A strategy turns a question into a ResolutionPlan. Plans only execute after
 * ToolRegistry.validate has produced a ValidatedPlan from them.
 */

import type { ToolParams, ToolRegistry } from "./tool_registry.js"

export type StrategyTag = "function_calling" | "structured_output" | "pattern_matching" | "sql_generation"

export interface ResolutionPlan {
	intent: string
	tool_name: string
	parameters: Record<string, unknown>
	confidence?: number
	strategy_tag: StrategyTag
	is_fallback: boolean
}

export interface ValidatedPlan {
	readonly validated: true
	intent: string
	tool_name: string
	parameters: ToolParams
	confidence?: number
	strategy_tag: StrategyTag
	is_fallback: boolean
}

export interface StrategyContext {
	availableFiles: string[]
	registry: ToolRegistry
	signal?: AbortSignal
	/** true when an earlier strategy in the chain already failed */
	isFallback: boolean
}

export interface RepairRequest {
	query: string
	plan: ValidatedPlan
	error: string
	attempt: number
}

export interface QueryStrategy {
	readonly tag: StrategyTag
	readonly priority: number
	parse(query: string, context: StrategyContext): Promise<ResolutionPlan>
	/** Strategies that can regenerate after an execution failure */
	readonly maxRepairs?: number
	repair?(request: RepairRequest, context: StrategyContext): Promise<ResolutionPlan>
}

export const STRATEGY_PRIORITY: Record<StrategyTag, number> = {
	function_calling: 100,
	sql_generation: 75,
	structured_output: 50,
	pattern_matching: 0,
}

export function clampConfidence(value: unknown, fallback: number): number {
	const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN
	if (!Number.isFinite(n)) return fallback
	return Math.min(1, Math.max(0, n))
}
