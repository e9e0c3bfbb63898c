/**
 * JSON Repair
 *
 * Recovers the first JSON object from model output:
 *   1. strip markdown code fences
 *   2. find the first balanced {...} (brace counting that skips strings and comments)
 *   3. strip // and block comments
 *   4. normalize malformed numbers (00.95 → 0.95, 007 → 7, : .5 → : 0.5)
 *   5. drop trailing commas
 *   6. keep only the first occurrence of a duplicated top-level key
 * Anything after the object is discarded.
 *
 * Input that is already a valid JSON object is returned unchanged.
 */

// ============================================================================
// Scanning
// ============================================================================

/** Index just past the string literal starting at `start` (a `"`). */
function skipString(text: string, start: number): number {
	let i = start + 1
	while (i < text.length) {
		if (text[i] === "\\") {
			i += 2
			continue
		}
		if (text[i] === '"') return i + 1
		i++
	}
	return text.length
}

/** Index just past the comment starting at `start`, or -1 when none starts there. */
function skipComment(text: string, start: number): number {
	if (text[start] !== "/") return -1
	if (text[start + 1] === "/") {
		const end = text.indexOf("\n", start + 2)
		return end === -1 ? text.length : end
	}
	if (text[start + 1] === "*") {
		const end = text.indexOf("*/", start + 2)
		return end === -1 ? text.length : end + 2
	}
	return -1
}

/** The balanced object starting at `start` (a `{`), or null if it never closes. */
function balancedObjectAt(text: string, start: number): string | null {
	let depth = 0
	let i = start
	while (i < text.length) {
		const ch = text[i]
		if (ch === '"') {
			i = skipString(text, i)
			continue
		}
		const afterComment = skipComment(text, i)
		if (afterComment !== -1) {
			i = afterComment
			continue
		}
		if (ch === "{") depth++
		else if (ch === "}") {
			depth--
			if (depth === 0) return text.substring(start, i + 1)
		}
		i++
	}
	return null
}

/** Apply `fn` to every stretch of text outside string literals. */
function mapOutsideStrings(text: string, fn: (segment: string) => string): string {
	let out = ""
	let segmentStart = 0
	let i = 0
	while (i < text.length) {
		if (text[i] === '"') {
			out += fn(text.substring(segmentStart, i))
			const end = skipString(text, i)
			out += text.substring(i, end)
			i = end
			segmentStart = i
			continue
		}
		i++
	}
	return out + fn(text.substring(segmentStart))
}

// ============================================================================
// Cleanup passes
// ============================================================================

export function stripCodeFences(text: string): string {
	return text.replace(/```[a-zA-Z]*\s*/g, "")
}

export function stripComments(text: string): string {
	let out = ""
	let i = 0
	while (i < text.length) {
		if (text[i] === '"') {
			const end = skipString(text, i)
			out += text.substring(i, end)
			i = end
			continue
		}
		const afterComment = skipComment(text, i)
		if (afterComment !== -1) {
			i = afterComment
			continue
		}
		out += text[i]
		i++
	}
	return out
}

export function normalizeNumbers(text: string): string {
	return mapOutsideStrings(text, (segment) =>
		segment
			.replace(/(^|[^\w.])(-?)0+(?=\d)/g, "$1$2")
			.replace(/([:,[]\s*)(-?)\.(\d)/g, "$1$20.$3"),
	)
}

export function stripTrailingCommas(text: string): string {
	return mapOutsideStrings(text, (segment) => segment.replace(/,(\s*[}\]])/g, "$1"))
}

/** Split the body of an object into its top-level `key: value` members. */
function topLevelMembers(object: string): string[] {
	const body = object.substring(1, object.length - 1)
	const members: string[] = []
	let depth = 0
	let start = 0
	let i = 0
	while (i < body.length) {
		const ch = body[i]
		if (ch === '"') {
			i = skipString(body, i)
			continue
		}
		if (ch === "{" || ch === "[") depth++
		else if (ch === "}" || ch === "]") depth--
		else if (ch === "," && depth === 0) {
			members.push(body.substring(start, i))
			start = i + 1
		}
		i++
	}
	members.push(body.substring(start))
	return members.map((m) => m.trim()).filter((m) => m.length > 0)
}

function memberKey(member: string): string | null {
	if (!member.startsWith('"')) return null
	const end = skipString(member, 0)
	try {
		const key: unknown = JSON.parse(member.substring(0, end))
		return typeof key === "string" ? key : null
	} catch {
		return null
	}
}

export function dropDuplicateKeys(object: string): string {
	const members = topLevelMembers(object)
	const seen = new Set<string>()
	const kept: string[] = []
	for (const member of members) {
		const key = memberKey(member)
		if (key !== null) {
			if (seen.has(key)) continue
			seen.add(key)
		}
		kept.push(member)
	}
	if (kept.length === members.length) return object
	return `{${kept.join(",")}}`
}

// ============================================================================
// Entry point
// ============================================================================

function isJsonObject(text: string): boolean {
	try {
		const value: unknown = JSON.parse(text)
		return value !== null && typeof value === "object" && !Array.isArray(value)
	} catch {
		return false
	}
}

function repairBlock(block: string): string | null {
	const cleaned = dropDuplicateKeys(stripTrailingCommas(normalizeNumbers(stripComments(block))))
	return isJsonObject(cleaned) ? cleaned : null
}

/**
 * The first recoverable JSON object in `text`, as a JSON string. Null when
 * the first opening brace never closes, or no balanced block can be made
 * valid; a balanced block that is not JSON (a `{tool}` placeholder) is
 * skipped in favour of a later one.
 */
export function repairJson(text: string): string | null {
	const trimmed = text.trim()
	if (isJsonObject(trimmed) && dropDuplicateKeys(trimmed) === trimmed) return text

	const stripped = stripCodeFences(text)
	let from = stripped.indexOf("{")
	while (from !== -1) {
		const block = balancedObjectAt(stripped, from)
		// unclosed: the reply was cut off
		if (block === null) return null
		const repaired = repairBlock(block)
		if (repaired !== null) return repaired
		from = stripped.indexOf("{", from + block.length)
	}
	return null
}

/** repairJson + JSON.parse, narrowed to a plain object. */
export function parseJsonObject(text: string): Record<string, unknown> | null {
	const repaired = repairJson(text)
	if (repaired === null) return null
	const value: unknown = JSON.parse(repaired)
	if (value === null || typeof value !== "object" || Array.isArray(value)) return null
	return Object.fromEntries(Object.entries(value))
}
