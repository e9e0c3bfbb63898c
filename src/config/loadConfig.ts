/**
 * Unified config loader.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > defaults
 *
 * The merged document is validated with zod, so every field has a value and
 * a wrong type in YAML fails at startup rather than mid-query.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

export const STRATEGY_SETTINGS = [
	"auto",
	"function_calling",
	"structured_output",
	"sql_generation",
	"pattern_matching",
] as const

const threshold = (value: number) => z.number().min(0).max(1).default(value)

export const configFileSchema = z.object({
	database: z.object({
		url: z.string().optional(),
		host: z.string().default("localhost"),
		port: z.number().int().positive().default(5432),
		name: z.string().default("schemascope"),
		user: z.string().default("schemascope"),
		password: z.string().default(""),
		table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).default("schema_info"),
	}).default({}),
	model: z.object({
		llm: z.string().default("qwen2.5:7b-instruct"),
		embedding: z.string().default("nomic-embed-text"),
		ollama_url: z.string().default("http://localhost:11434"),
		timeout_ms: z.number().int().positive().default(30000),
		function_calling_markers: z.array(z.string()).default(["-fc", ":fc", "tools"]),
		strategy: z.enum(STRATEGY_SETTINGS).default("auto"),
	}).default({}),
	semantic: z.object({
		enabled: z.boolean().default(true),
		search_threshold: threshold(0.6),
		concept_threshold: threshold(0.6),
		naming_threshold: threshold(0.8),
		equivalence_threshold: threshold(0.75),
	}).default({}),
	analysis: z.object({
		common_column_threshold: z.number().int().min(1).default(2),
		schema_similarity_threshold: threshold(0.5),
	}).default({}),
	sql: z.object({
		max_retries: z.number().int().min(0).max(5).default(2),
		statement_timeout_ms: z.number().int().positive().default(5000),
		max_rows: z.number().int().positive().default(200),
	}).default({}),
	response: z.object({
		llm_reformat: z.boolean().default(false),
	}).default({}),
	logging: z.object({
		level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
	}).default({}),
})

export type AppConfig = z.infer<typeof configFileSchema>
export type StrategySetting = AppConfig["model"]["strategy"]

// ── YAML Loading ─────────────────────────────────────────────────────

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): RawConfig {
	if (!fs.existsSync(filePath)) return {}
	const parsed: unknown = yaml.load(fs.readFileSync(filePath, "utf-8"))
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
	const result: RawConfig = { ...a }
	for (const [key, value] of Object.entries(b)) {
		const current = result[key]
		result[key] = isRecord(value) && isRecord(current) ? deepMerge(current, value) : value
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}
function envList(name: string): string[] | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
}

function section(cfg: RawConfig, key: string): RawConfig {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: RawConfig = {}
	cfg[key] = created
	return created
}

/** Set key only when the override is defined. */
function put(target: RawConfig, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

function applyEnvOverrides(cfg: RawConfig): void {
	const db = section(cfg, "database")
	put(db, "url", env("DATABASE_URL"))
	put(db, "host", env("DB_HOST"))
	put(db, "port", envInt("DB_PORT"))
	put(db, "name", env("DB_NAME"))
	put(db, "user", env("DB_USER"))
	put(db, "password", env("DB_PASSWORD"))

	const m = section(cfg, "model")
	put(m, "llm", env("OLLAMA_MODEL"))
	put(m, "embedding", env("EMBEDDING_MODEL"))
	put(m, "ollama_url", env("OLLAMA_BASE_URL"))
	put(m, "timeout_ms", envInt("OLLAMA_TIMEOUT_MS"))
	put(m, "function_calling_markers", envList("FUNCTION_CALLING_MARKERS"))
	put(m, "strategy", env("QUERY_STRATEGY"))

	const s = section(cfg, "semantic")
	put(s, "enabled", envBool("SEMANTIC_ENABLED"))
	put(s, "search_threshold", envFloat("SEMANTIC_THRESHOLD"))
	put(s, "naming_threshold", envFloat("NAMING_THRESHOLD"))

	const q = section(cfg, "sql")
	put(q, "max_retries", envInt("SQL_MAX_RETRIES"))
	put(q, "max_rows", envInt("SQL_MAX_ROWS"))

	put(section(cfg, "response"), "llm_reformat", envBool("LLM_REFORMAT"))
	put(section(cfg, "logging"), "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: AppConfig | null = null

export function loadConfig(): AppConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: RawConfig = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = configFileSchema.parse(merged)
	return _config
}

export function getConfig(): AppConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}

/** Connection string for pg, preferring DATABASE_URL when given. */
export function connectionString(cfg: AppConfig): string {
	if (cfg.database.url) return cfg.database.url
	const { user, password, host, port, name } = cfg.database
	const auth = password ? `${encodeURIComponent(user)}:${encodeURIComponent(password)}` : encodeURIComponent(user)
	return `postgresql://${auth}@${host}:${port}/${name}`
}
