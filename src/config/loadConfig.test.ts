import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import { loadConfig, resetConfig, getConfig, connectionString } from "./loadConfig.js"

/**
 * Tests for the config loader.
 *
 * Each test gets a temp directory with config/config.yaml (and optionally
 * config.local.yaml) and chdirs into it. Env overrides are set on
 * process.env and restored afterwards.
 */

let tmpDir: string
let originalCwd: string
const savedEnv: Record<string, string | undefined> = {}

const ENV_VARS = [
	"DATABASE_URL", "DB_HOST", "DB_PORT", "DB_NAME", "DB_USER", "DB_PASSWORD",
	"OLLAMA_MODEL", "EMBEDDING_MODEL", "OLLAMA_BASE_URL", "OLLAMA_TIMEOUT_MS",
	"FUNCTION_CALLING_MARKERS", "QUERY_STRATEGY",
	"SEMANTIC_ENABLED", "SEMANTIC_THRESHOLD", "NAMING_THRESHOLD",
	"SQL_MAX_RETRIES", "SQL_MAX_ROWS", "LLM_REFORMAT", "LOG_LEVEL",
]

function writeYaml(dir: string, filename: string, content: string) {
	const configDir = path.join(dir, "config")
	fs.mkdirSync(configDir, { recursive: true })
	fs.writeFileSync(path.join(configDir, filename), content)
}

beforeEach(() => {
	resetConfig()
	for (const v of ENV_VARS) {
		savedEnv[v] = process.env[v]
		delete process.env[v]
	}
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "schemascope-config-test-"))
	originalCwd = process.cwd()
	process.chdir(tmpDir)
})

afterEach(() => {
	process.chdir(originalCwd)
	fs.rmSync(tmpDir, { recursive: true, force: true })
	for (const v of ENV_VARS) {
		const saved = savedEnv[v]
		if (saved === undefined) {
			delete process.env[v]
		} else {
			process.env[v] = saved
		}
	}
	resetConfig()
})

// ── Basic Loading ─────────────────────────────────────────────────────

describe("loadConfig: basic YAML loading", () => {
	it("should load values from config/config.yaml", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  host: myhost
  port: 5433
  name: testdb
  user: testuser
  password: test-secret
model:
  llm: "llama3.1:8b"
  embedding: "all-minilm"
  timeout_ms: 15000
  strategy: structured_output
semantic:
  enabled: false
  naming_threshold: 0.85
sql:
  max_retries: 1
response:
  llm_reformat: true
logging:
  level: debug
`)
		const cfg = loadConfig()
		expect(cfg.database.host).toBe("myhost")
		expect(cfg.database.port).toBe(5433)
		expect(cfg.database.password).toBe("test-secret")
		expect(cfg.model.llm).toBe("llama3.1:8b")
		expect(cfg.model.embedding).toBe("all-minilm")
		expect(cfg.model.timeout_ms).toBe(15000)
		expect(cfg.model.strategy).toBe("structured_output")
		expect(cfg.semantic.enabled).toBe(false)
		expect(cfg.semantic.naming_threshold).toBe(0.85)
		expect(cfg.sql.max_retries).toBe(1)
		expect(cfg.response.llm_reformat).toBe(true)
		expect(cfg.logging.level).toBe("debug")
	})

	it("should fill defaults when no config directory exists", () => {
		const cfg = loadConfig()
		expect(cfg.database.table).toBe("schema_info")
		expect(cfg.model.strategy).toBe("auto")
		expect(cfg.model.timeout_ms).toBe(30000)
		expect(cfg.model.function_calling_markers).toEqual(["-fc", ":fc", "tools"])
		expect(cfg.semantic.naming_threshold).toBe(0.8)
		expect(cfg.analysis.common_column_threshold).toBe(2)
		expect(cfg.sql.max_retries).toBe(2)
		expect(cfg.response.llm_reformat).toBe(false)
	})

	it("should reject an unknown strategy", () => {
		writeYaml(tmpDir, "config.yaml", "model:\n  strategy: guesswork\n")
		expect(() => loadConfig()).toThrow()
	})

	it("should reject a threshold above 1", () => {
		writeYaml(tmpDir, "config.yaml", "semantic:\n  search_threshold: 1.5\n")
		expect(() => loadConfig()).toThrow()
	})

	it("should return the same object on the second call", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  host: host1\n")
		expect(loadConfig()).toBe(loadConfig())
	})

	it("should reload after resetConfig", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  host: host1\n")
		const a = loadConfig()
		resetConfig()
		writeYaml(tmpDir, "config.yaml", "database:\n  host: host2\n")
		const b = loadConfig()
		expect(a.database.host).toBe("host1")
		expect(b.database.host).toBe("host2")
	})

	it("should auto-load from getConfig", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  host: autoload\n")
		expect(getConfig().database.host).toBe("autoload")
	})
})

// ── Deep Merge ────────────────────────────────────────────────────────

describe("loadConfig: config.local.yaml overlay", () => {
	it("should let local YAML override base values without clobbering siblings", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  host: basehost
  port: 5432
semantic:
  search_threshold: 0.5
  concept_threshold: 0.55
`)
		writeYaml(tmpDir, "config.local.yaml", `
database:
  host: localhost
semantic:
  concept_threshold: 0.7
`)
		const cfg = loadConfig()
		expect(cfg.database.host).toBe("localhost")
		expect(cfg.database.port).toBe(5432)
		expect(cfg.semantic.search_threshold).toBe(0.5)
		expect(cfg.semantic.concept_threshold).toBe(0.7)
	})
})

// ── Env-Var Overrides ─────────────────────────────────────────────────

describe("loadConfig: env-var overrides", () => {
	it("should let env vars win over YAML", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  host: yamlhost
  port: 5432
model:
  llm: "yaml-model"
  strategy: auto
`)
		process.env.DB_HOST = "envhost"
		process.env.OLLAMA_MODEL = "env-model"
		process.env.QUERY_STRATEGY = "pattern_matching"

		const cfg = loadConfig()
		expect(cfg.database.host).toBe("envhost")
		expect(cfg.database.port).toBe(5432)
		expect(cfg.model.llm).toBe("env-model")
		expect(cfg.model.strategy).toBe("pattern_matching")
	})

	it("should parse numeric, boolean and list env vars", () => {
		process.env.DB_PORT = "5555"
		process.env.OLLAMA_TIMEOUT_MS = "1200"
		process.env.SEMANTIC_THRESHOLD = "0.4"
		process.env.SQL_MAX_RETRIES = "0"
		process.env.SEMANTIC_ENABLED = "false"
		process.env.LLM_REFORMAT = "1"
		process.env.FUNCTION_CALLING_MARKERS = "phi4-mini-fc, -tools"

		const cfg = loadConfig()
		expect(cfg.database.port).toBe(5555)
		expect(cfg.model.timeout_ms).toBe(1200)
		expect(cfg.semantic.search_threshold).toBe(0.4)
		expect(cfg.sql.max_retries).toBe(0)
		expect(cfg.semantic.enabled).toBe(false)
		expect(cfg.response.llm_reformat).toBe(true)
		expect(cfg.model.function_calling_markers).toEqual(["phi4-mini-fc", "-tools"])
	})

	it("should ignore non-numeric values for numeric env vars", () => {
		writeYaml(tmpDir, "config.yaml", "database:\n  port: 5432\n")
		process.env.DB_PORT = "not-a-number"
		expect(loadConfig().database.port).toBe(5432)
	})
})

describe("connectionString", () => {
	it("should prefer DATABASE_URL", () => {
		process.env.DATABASE_URL = "postgresql://reader@db:5432/meta"
		expect(connectionString(loadConfig())).toBe("postgresql://reader@db:5432/meta")
	})

	it("should build a URL from the database section", () => {
		writeYaml(tmpDir, "config.yaml", `
database:
  host: db
  port: 6543
  name: meta
  user: reader
  password: test-secret
`)
		expect(connectionString(loadConfig())).toBe("postgresql://reader:test-secret@db:6543/meta")
	})
})
