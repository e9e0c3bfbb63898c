/**
 * Run one question against the live metadata store and print the answer.
 *
 *   npm run debug:query -- "which columns have type mismatches?"
 *   QUERY_STRATEGY=sql_generation npm run debug:query -- "files with more than 1000 rows"
 *
 * Logs go to stderr at debug level (or DEBUG_LOG_LEVEL); the answer goes
 * to stdout.
 */

import { loadConfig } from "../src/config/loadConfig.js"
import { askSchema, createApp } from "../src/index.js"
import { createLogger, isLogLevel } from "../src/logger.js"

async function main() {
	const question = process.argv.slice(2).join(" ").trim()
	if (!question) {
		console.error('Usage: npm run debug:query -- "<question>"')
		process.exit(1)
	}

	const config = loadConfig()
	const level = process.env.DEBUG_LOG_LEVEL ?? "debug"
	const logger = createLogger(isLogLevel(level) ? level : "debug")
	const app = await createApp(config, logger)

	try {
		console.error("[STATUS]", JSON.stringify(app.context.resolver.getStatus()))
		const started = Date.now()
		const answer = await askSchema(app.context, { question })
		console.log(answer)
		console.error(`[TIME] ${Date.now() - started}ms`)
	} finally {
		await app.close()
	}
}

main().catch((error: unknown) => {
	console.error("[ERR]", error)
	process.exit(1)
})
