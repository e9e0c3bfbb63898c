/**
 * SQL Guard
 *
 * Cleanup and read-only enforcement for model-generated metadata queries.
 * Keyword checks run on code outside strings, quoted identifiers and
 * comments, so `WHERE column_name = 'delete_flag'` is fine while
 * `SELECT 1; DROP TABLE x` is not. Queries may also be held to a single
 * table: every FROM/JOIN target must be that table or a CTE.
 */

import { SchemaQueryError } from "./config.js"

/** Never allowed outside strings/comments */
const FORBIDDEN_KEYWORDS = [
	// DDL
	"DROP", "CREATE", "ALTER", "TRUNCATE", "RENAME", "COMMENT",
	// DML
	"INSERT", "UPDATE", "DELETE", "MERGE", "UPSERT", "INTO",
	// DCL
	"GRANT", "REVOKE",
	// TCL
	"BEGIN", "COMMIT", "ROLLBACK", "SAVEPOINT",
	// Other
	"COPY", "EXECUTE", "PREPARE", "CALL", "VACUUM", "LOCK", "REINDEX", "REFRESH", "LISTEN", "NOTIFY",
]

const FORBIDDEN_FUNCTIONS = [
	"pg_read_file", "pg_read_binary_file", "pg_ls_dir", "lo_export", "lo_import",
	"pg_sleep", "pg_terminate_backend", "pg_cancel_backend",
	"dblink", "dblink_connect", "dblink_exec",
	"pg_reload_conf", "set_config",
]

// ============================================================================
// Tokenizer
// ============================================================================

enum TokenType {
	NORMAL = "NORMAL",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

interface Token {
	type: TokenType
	value: string
}

/** Index just past a quoted run opened at `start`, with doubled-quote escaping. */
function skipQuoted(sql: string, start: number, quote: string): number {
	let i = start + 1
	while (i < sql.length) {
		if (sql[i] === quote) {
			if (sql[i + 1] === quote) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return sql.length
}

function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	let normalStart = 0
	let i = 0

	const flushNormal = (end: number) => {
		if (end > normalStart) tokens.push({ type: TokenType.NORMAL, value: sql.substring(normalStart, end) })
	}
	const push = (type: TokenType, start: number, end: number) => {
		flushNormal(start)
		tokens.push({ type, value: sql.substring(start, end) })
		normalStart = end
		i = end
	}

	while (i < sql.length) {
		const char = sql[i]
		const next = sql[i + 1] ?? ""

		if (char === "-" && next === "-") {
			const newline = sql.indexOf("\n", i)
			push(TokenType.LINE_COMMENT, i, newline === -1 ? sql.length : newline)
			continue
		}
		if (char === "/" && next === "*") {
			const close = sql.indexOf("*/", i + 2)
			push(TokenType.BLOCK_COMMENT, i, close === -1 ? sql.length : close + 2)
			continue
		}
		if (char === "'") {
			push(TokenType.SINGLE_QUOTE, i, skipQuoted(sql, i, "'"))
			continue
		}
		if (char === '"') {
			push(TokenType.DOUBLE_QUOTE, i, skipQuoted(sql, i, '"'))
			continue
		}
		if (char === "$") {
			const tag = /^\$[A-Za-z_]*\$/.exec(sql.substring(i))
			if (tag) {
				const close = sql.indexOf(tag[0], i + tag[0].length)
				push(TokenType.DOLLAR_QUOTE, i, close === -1 ? sql.length : close + tag[0].length)
				continue
			}
		}
		i++
	}
	flushNormal(sql.length)
	return tokens
}

/** Code outside strings and comments, with each literal replaced by a space. */
function codeOnly(sql: string): string {
	return tokenizeSQL(sql)
		.map((t) => (t.type === TokenType.NORMAL ? t.value : " "))
		.join("")
}

// ============================================================================
// Cleanup
// ============================================================================

/**
 * Normalize raw model output into one statement: drop code fences, a leading
 * `SQL:` label, comments and trailing semicolons.
 */
export function cleanGeneratedSql(raw: string): string {
	let sql = raw.replace(/```(?:sql)?\s*/gi, "").replace(/```/g, "").trim()
	sql = sql.replace(/^(?:sql|query)\s*:\s*/i, "")
	sql = tokenizeSQL(sql)
		.filter((t) => t.type !== TokenType.LINE_COMMENT && t.type !== TokenType.BLOCK_COMMENT)
		.map((t) => t.value)
		.join("")
		.trim()
	sql = sql.replace(/(\s*;)+\s*$/, "")
	return sql.trim()
}

// ============================================================================
// Read-only check
// ============================================================================

export type ReadOnlyCheck = { ok: true } | { ok: false; reason: string }

export function checkReadOnly(sql: string): ReadOnlyCheck {
	const code = codeOnly(sql)
	const firstWord = /^\s*\(*\s*([A-Za-z]+)/.exec(code)?.[1]?.toUpperCase()
	if (!firstWord) return { ok: false, reason: "Empty statement" }
	if (firstWord !== "SELECT" && firstWord !== "WITH") {
		return { ok: false, reason: `Only SELECT or WITH statements are allowed (got ${firstWord})` }
	}
	if (code.includes(";")) {
		return { ok: false, reason: "Multiple statements are not allowed" }
	}
	const upper = code.toUpperCase()
	for (const keyword of FORBIDDEN_KEYWORDS) {
		if (new RegExp(`\\b${keyword}\\b`).test(upper)) {
			return { ok: false, reason: `Keyword ${keyword} is not allowed` }
		}
	}
	const lower = code.toLowerCase()
	for (const fn of FORBIDDEN_FUNCTIONS) {
		if (new RegExp(`\\b${fn}\\s*\\(`).test(lower)) {
			return { ok: false, reason: `Function ${fn} is not allowed` }
		}
	}
	return { ok: true }
}

// ============================================================================
// Table check
// ============================================================================

/** Words that close a FROM list in the scope they appear in */
const FROM_LIST_END = new Set([
	"SELECT", "WHERE", "GROUP", "HAVING", "ORDER", "LIMIT", "OFFSET", "FETCH", "FOR",
	"UNION", "INTERSECT", "EXCEPT", "WINDOW", "RETURNING",
])

/** Words that cannot be a table alias */
const NOT_AN_ALIAS = new Set([
	...FROM_LIST_END,
	"JOIN", "INNER", "LEFT", "RIGHT", "FULL", "OUTER", "CROSS", "NATURAL", "ON", "USING", "LATERAL", "TABLESAMPLE",
])

const SUBQUERY_START = new Set(["SELECT", "WITH", "VALUES", "TABLE"])

const LEXEME = /"(?:[^"]|"")*"?|[A-Za-z_][\w$]*|\d+(?:\.\d+)?|\S/g

/** Code lexemes; strings and comments dropped, quoted identifiers kept whole. */
function lexCode(sql: string): string[] {
	const code = tokenizeSQL(sql)
		.map((t) => (t.type === TokenType.NORMAL || t.type === TokenType.DOUBLE_QUOTE ? t.value : " "))
		.join("")
	return code.match(LEXEME) ?? []
}

function word(lexeme: string | undefined): string {
	return lexeme !== undefined && /^[A-Za-z_]/.test(lexeme) ? lexeme.toUpperCase() : ""
}

function isIdentifier(lexeme: string | undefined): lexeme is string {
	return lexeme !== undefined && /^[A-Za-z_"]/.test(lexeme)
}

/** Unquoted names fold to lower case; quoted names keep their spelling. */
function identifierName(lexeme: string): string {
	return lexeme.startsWith('"') ? lexeme.slice(1, lexeme.endsWith('"') ? -1 : undefined).replace(/""/g, '"') : lexeme.toLowerCase()
}

interface Scope {
	/** a query (top level or subquery) rather than a call or expression */
	query: boolean
	inFromList: boolean
	expectRelation: boolean
}

/**
 * Relations the statement reads from, each as its dotted name parts: FROM,
 * JOIN and TABLE targets and every further entry of a comma-separated FROM
 * list, in every subquery. `FROM` inside a call (`EXTRACT(year FROM ts)`)
 * is not a relation.
 */
export function referencedRelations(sql: string): string[][] {
	const lexemes = lexCode(sql)
	const scopes: Scope[] = [{ query: true, inFromList: false, expectRelation: false }]
	const relations: string[][] = []

	let i = 0
	while (i < lexemes.length) {
		const lexeme = lexemes[i]
		const scope = scopes[scopes.length - 1]
		if (lexeme === "(") {
			const subquery = SUBQUERY_START.has(word(lexemes[i + 1]))
			// a parenthesized join in relation position is still a FROM list
			const joinGroup = scope.expectRelation && !subquery
			scopes.push({ query: subquery || joinGroup, inFromList: joinGroup, expectRelation: joinGroup })
			scope.expectRelation = false
			i++
			continue
		}
		if (lexeme === ")") {
			if (scopes.length > 1) scopes.pop()
			i++
			continue
		}
		if (!scope.query) {
			i++
			continue
		}

		const keyword = word(lexeme)
		if (keyword === "FROM" || keyword === "JOIN" || keyword === "TABLE") {
			scope.inFromList = true
			scope.expectRelation = true
		} else if (FROM_LIST_END.has(keyword)) {
			scope.inFromList = false
			scope.expectRelation = false
		} else if (lexeme === "," && scope.inFromList) {
			scope.expectRelation = true
		} else if (keyword === "LATERAL" || keyword === "ONLY") {
			// modifiers before the relation keep expectRelation as it is
		} else if (scope.expectRelation && isIdentifier(lexeme)) {
			const parts = [identifierName(lexeme)]
			while (lexemes[i + 1] === "." && isIdentifier(lexemes[i + 2])) {
				parts.push(identifierName(lexemes[i + 2]))
				i += 2
			}
			relations.push(parts)
			scope.expectRelation = false
			if (word(lexemes[i + 1]) === "AS") i++
			if (isIdentifier(lexemes[i + 1]) && !NOT_AN_ALIAS.has(word(lexemes[i + 1]))) i++
		} else {
			scope.expectRelation = false
		}
		i++
	}
	return relations
}

/** Names of the common table expressions a WITH clause defines. */
export function cteNames(sql: string): Set<string> {
	const lexemes = lexCode(sql)
	const names = new Set<string>()
	lexemes.forEach((lexeme, k) => {
		if (word(lexeme) !== "AS") return
		let j = k + 1
		if (word(lexemes[j]) === "NOT") j++
		if (word(lexemes[j]) === "MATERIALIZED") j++
		if (lexemes[j] !== "(") return

		let p = k - 1
		if (lexemes[p] === ")") {
			while (p >= 0 && lexemes[p] !== "(") p--
			p--
		}
		const name = lexemes[p]
		const before = lexemes[p - 1]
		if (isIdentifier(name) && (word(before) === "WITH" || word(before) === "RECURSIVE" || before === ",")) {
			names.add(identifierName(name))
		}
	})
	return names
}

/**
 * Every relation the statement reads must be `table` (optionally as
 * `public.table`) or one of its own common table expressions.
 */
export function checkTables(sql: string, table: string): ReadOnlyCheck {
	const allowed = table.toLowerCase()
	const ctes = cteNames(sql)
	for (const parts of referencedRelations(sql)) {
		const [first, second] = parts
		const ok =
			(parts.length === 1 && (first === allowed || ctes.has(first))) ||
			(parts.length === 2 && first === "public" && second === allowed)
		if (!ok) return { ok: false, reason: `Only the ${table} table may be queried (got ${parts.join(".")})` }
	}
	return { ok: true }
}

/**
 * Throws a parse error unless `sql` is a single read-only statement and,
 * when `table` is given, reads nothing but that table.
 */
export function assertReadOnly(sql: string, table?: string): void {
	const result = checkReadOnly(sql)
	const tables = result.ok && table !== undefined ? checkTables(sql, table) : result
	if (!tables.ok) {
		throw new SchemaQueryError("parse", `Rejected generated SQL: ${tables.reason}`, true, { sql })
	}
}
