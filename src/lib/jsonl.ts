/**
 * JSON Lines helpers
 *
 * One JSON object per line, newline terminated. Non-ASCII characters are
 * escaped so files stay ASCII-only.
 */

import { Result, ok, err } from './result-types.js';

/**
 * JSON.stringify with every non-ASCII code unit escaped as \uXXXX
 */
export function toAsciiJson(value: unknown): string {
	return JSON.stringify(value).replace(
		/[\u0080-\uffff]/g,
		(char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
	);
}

/**
 * Serialize items as JSON Lines (trailing newline included, empty for no items)
 */
export function toJsonl(items: readonly unknown[]): string {
	if (items.length === 0) return '';
	return items.map(toAsciiJson).join('\n') + '\n';
}

/**
 * Parse one line as a JSON object
 *
 * @returns The object, or the reason the line cannot be used
 */
export function parseJsonObjectLine(line: string): Result<Record<string, unknown>, string> {
	let value: unknown;
	try {
		value = JSON.parse(line);
	} catch (error) {
		return err(`malformed JSON: ${error instanceof Error ? error.message : String(error)}`);
	}

	if (!isPlainObject(value)) {
		return err(`expected an object, got ${Array.isArray(value) ? 'array' : typeof value}`);
	}
	return ok(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
