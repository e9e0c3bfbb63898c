/**
 * Leveled stderr logger.
 *
 * stdout carries the MCP protocol, so every line goes to stderr as
 * `[LEVEL] message {meta}`.
 */

import type { Logger } from "./config.js"

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value)
}

export type LogSink = (line: string) => void

function formatMeta(meta?: Record<string, unknown>): string {
	if (!meta || Object.keys(meta).length === 0) return ""
	try {
		return " " + JSON.stringify(meta, (_key, value: unknown) =>
			value instanceof Error ? { name: value.name, message: value.message } : value,
		)
	} catch {
		return " [unserializable meta]"
	}
}

export function createLogger(level: LogLevel = "info", sink: LogSink = (line) => console.error(line)): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lvl: Exclude<LogLevel, "silent">, message: string, meta?: Record<string, unknown>) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		sink(`[${lvl.toUpperCase()}] ${message}${formatMeta(meta)}`)
	}
	return {
		debug: (message, meta) => emit("debug", message, meta),
		info: (message, meta) => emit("info", message, meta),
		warn: (message, meta) => emit("warn", message, meta),
		error: (message, meta) => emit("error", message, meta),
	}
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger("silent")
