/**
 * Pattern matching strategy
 *
 * Deterministic keyword table, first match wins. Never fails: a question
 * nothing matches becomes list_files, so this is always the last strategy
 * in the chain.
 */

import { SchemaQueryError } from "../config.js"
import { extractColumnReference, extractFileReferences } from "../query_hints.js"
import {
	STRATEGY_PRIORITY,
	type QueryStrategy,
	type ResolutionPlan,
	type StrategyContext,
	type StrategyTag,
} from "../resolution_plan.js"

export interface PatternMatch {
	intent: string
	tool_name: string
	parameters: Record<string, unknown>
	confidence: number
}

interface QueryFacts {
	/** lowercased question */
	text: string
	original: string
	files: string[]
	column: string | null
}

interface PatternRule {
	intent: string
	tool: string
	matches(facts: QueryFacts): boolean
	parameters?(facts: QueryFacts): Record<string, unknown>
}

const RULE_CONFIDENCE = 0.6
const DEFAULT_CONFIDENCE = 0.3
const DEFAULT_TOOL = "list_files"

const SEMANTIC_WORDS = /\b(similar|like|related|semantic|meaning)\b/

function fileCountThreshold(text: string): number | undefined {
	const m = /\b(\d+)\s+(?:or more\s+)?files\b/.exec(text)
	if (!m) return undefined
	const n = Number(m[1])
	return Number.isSafeInteger(n) && n >= 1 ? n : undefined
}

function listPattern(text: string): string | undefined {
	return /\b(?:matching|containing|named|called|like)\s+["'`]?([\w.-]+)/.exec(text)?.[1]
}

// ============================================================================
// Keyword table
// ============================================================================

export const PATTERN_RULES: PatternRule[] = [
	{
		intent: "compare_files",
		tool: "compare_schemas",
		matches: (f) => /\b(compare|comparison|diff|difference|differences|versus|vs)\b/.test(f.text) && f.files.length >= 2,
		parameters: (f) => ({ file1: f.files[0], file2: f.files[1] }),
	},
	{
		intent: "data_quality",
		tool: "data_quality",
		matches: (f) => /\b(quality|nulls?|missing values|completeness|(?:candidate|primary) keys?)\b/.test(f.text),
		parameters: (f) => (f.files.length > 0 ? { file_name: f.files[0] } : {}),
	},
	{
		intent: "abbreviations",
		tool: "detect_inconsistencies",
		matches: (f) => /abbreviat/.test(f.text),
		parameters: () => ({ check_type: "abbreviations" }),
	},
	{
		intent: "naming_inconsistencies",
		tool: "detect_inconsistencies",
		matches: (f) => /\bnaming\b|\bspell|\bnames?\b.*(inconsisten|differ|vary|varies)/.test(f.text),
		parameters: () => ({ check_type: "naming" }),
	},
	{
		intent: "concept_type_mismatches",
		tool: "detect_inconsistencies",
		matches: (f) => /\bconcepts?\b/.test(f.text) && /\btypes?\b/.test(f.text),
		parameters: () => ({ check_type: "concept_types" }),
	},
	{
		intent: "type_mismatches",
		tool: "detect_type_mismatches",
		matches: (f) => /\b(types?|typed|typing)\b/.test(f.text) && /(mismatch|inconsisten|conflict|differ)/.test(f.text),
	},
	{
		intent: "inconsistencies",
		tool: "detect_inconsistencies",
		matches: (f) => /inconsisten|consistency/.test(f.text),
	},
	{
		intent: "column_types",
		tool: "column_types",
		matches: (f) => f.column !== null && /\b(types?|typed|dtypes?)\b/.test(f.text),
		parameters: (f) => ({ column_name: f.column }),
	},
	{
		intent: "concept_groups",
		tool: "find_concept_groups",
		matches: (f) => /\bconcepts?\b|\bgroup/.test(f.text),
	},
	{
		intent: "similar_schemas",
		tool: "find_similar_schemas",
		matches: (f) => /\bsimilar\b/.test(f.text) && /\b(schemas?|structures?)\b|\bsimilar (files|tables)\b/.test(f.text),
	},
	{
		intent: "common_columns",
		tool: "find_common_columns",
		matches: (f) => /\b(common|shared|overlap|overlapping)\b|\bappear in (several|multiple|many)\b/.test(f.text),
		parameters: (f) => {
			const threshold = fileCountThreshold(f.text)
			return threshold === undefined ? {} : { threshold }
		},
	},
	{
		intent: "summary",
		tool: "database_summary",
		matches: (f) => /\b(summary|summarize|overview|statistics|stats)\b|\bhow many\b/.test(f.text),
	},
	{
		intent: "list_files",
		tool: "list_files",
		matches: (f) => /\b(list|show)\b/.test(f.text) && /\bfiles\b/.test(f.text) && !/\bcolumns?\b/.test(f.text),
		parameters: (f) => {
			const pattern = listPattern(f.original)
			return pattern === undefined ? {} : { pattern }
		},
	},
	{
		intent: "find_columns",
		tool: "find_columns",
		matches: (f) => f.column !== null && /\b(find|search|locate|where|which files)\b/.test(f.text),
		parameters: (f) => ({ column_name: f.column, semantic: SEMANTIC_WORDS.test(f.text) }),
	},
	{
		intent: "file_schema",
		tool: "get_file_schema",
		matches: (f) => f.files.length > 0,
		parameters: (f) => ({ file_name: f.files[0] }),
	},
	{
		intent: "find_columns",
		tool: "find_columns",
		matches: (f) => f.column !== null,
		parameters: (f) => ({ column_name: f.column, semantic: SEMANTIC_WORDS.test(f.text) }),
	},
]

/**
 * First rule that matches `query` and whose tool is available, or
 * list_files.
 */
export function matchPattern(
	query: string,
	availableFiles: string[],
	isAvailable: (tool: string) => boolean = () => true,
): PatternMatch {
	const facts: QueryFacts = {
		text: query.toLowerCase(),
		original: query,
		files: extractFileReferences(query, availableFiles),
		column: extractColumnReference(query),
	}
	for (const rule of PATTERN_RULES) {
		if (!isAvailable(rule.tool) || !rule.matches(facts)) continue
		return {
			intent: rule.intent,
			tool_name: rule.tool,
			parameters: rule.parameters?.(facts) ?? {},
			confidence: RULE_CONFIDENCE,
		}
	}
	return { intent: "list_files", tool_name: DEFAULT_TOOL, parameters: {}, confidence: DEFAULT_CONFIDENCE }
}

// ============================================================================
// Strategy
// ============================================================================

export class PatternMatchingStrategy implements QueryStrategy {
	readonly tag: StrategyTag = "pattern_matching"
	readonly priority = STRATEGY_PRIORITY.pattern_matching

	async parse(query: string, context: StrategyContext): Promise<ResolutionPlan> {
		const { registry } = context
		const match = matchPattern(query, context.availableFiles, (tool) => registry.has(tool))
		if (!registry.has(match.tool_name)) {
			throw new SchemaQueryError("unknown_tool", `Tool "${match.tool_name}" is not registered`, false)
		}
		return { ...match, strategy_tag: this.tag, is_fallback: context.isFallback }
	}
}
