#!/usr/bin/env node
/**
 * Stdio entry point for the schema question server.
 *
 * Settings come from config/config.yaml, config/config.local.yaml and
 * environment variables (see config/loadConfig.ts). A JSON argument can
 * override the database URL, model and strategy for one launch:
 *
 *   node stdio.js '{"databaseUrl":"postgresql://...","strategy":"pattern_matching"}'
 *
 * All logging goes to stderr; stdout is reserved for the MCP protocol.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { loadConfig, type AppConfig } from "./config/loadConfig.js"
import { applyLaunchOptions, createApp, launchOptionsSchema } from "./index.js"
import { createLogger } from "./logger.js"

function readLaunchOptions(config: AppConfig, arg: string | undefined): AppConfig {
	if (!arg) return config
	const parsed = launchOptionsSchema.parse(JSON.parse(arg))
	return applyLaunchOptions(config, parsed)
}

async function main() {
	const baseConfig = loadConfig()
	const logger = createLogger(baseConfig.logging.level)

	let config: AppConfig
	try {
		config = readLaunchOptions(baseConfig, process.argv[2])
	} catch (error) {
		logger.error("Invalid launch options", { error: error instanceof Error ? error.message : String(error) })
		logger.error(`Usage: node stdio.js '{"databaseUrl":"postgresql://...","model":"llama3","strategy":"auto"}'`)
		process.exit(1)
	}

	logger.info("Starting schema question server with stdio transport", {
		database: config.database.url ? config.database.url.replace(/:[^:@]+@/, ":***@") : `${config.database.host}/${config.database.name}`,
		model: config.model.llm,
		strategy: config.model.strategy,
	})

	const app = await createApp(config, logger)
	const transport = new StdioServerTransport()
	await app.server.connect(transport)
	logger.info("Server running via stdio", { status: app.context.resolver.getStatus() })

	const shutdown = async (signal: string) => {
		logger.info("Shutting down", { signal })
		await app.server.close()
		await app.close()
		process.exit(0)
	}
	for (const signal of ["SIGINT", "SIGTERM"] as const) {
		process.on(signal, () => {
			shutdown(signal).catch((error: unknown) => {
				logger.error("Shutdown failed", { error: error instanceof Error ? error.message : String(error) })
				process.exit(1)
			})
		})
	}
}

main().catch((error: unknown) => {
	console.error("[ERROR] Fatal error:", error)
	process.exit(1)
})
