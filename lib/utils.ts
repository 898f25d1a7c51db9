import * as util from 'util'
import { Console } from 'console'

export function debug(obj: unknown, depth = null as number | null) {
	return util.inspect(obj, { depth, colors: false })
}

export function format_lines(lines: unknown[], depth = null as number | null) {
	return lines.map(line => {
		return typeof line === 'string'
			? line
			: debug(line, depth)
	}).join(' ')
}

export type LogLevel = 'silent' | 'warn' | 'debug'
const LOG_LEVELS: readonly LogLevel[] = ['silent', 'warn', 'debug']

export function parse_log_level(value: string | undefined): LogLevel {
	switch (value) {
		case 'silent':
		case 'warn':
		case 'debug':
			return value
		default:
			return 'warn'
	}
}

// everything goes to stderr, stdout belongs to whoever renders labels
const console = new Console({ stdout: process.stderr, stderr: process.stderr, inspectOptions: { depth: 5 } })
let current_level = parse_log_level(process.env.ZPLKIT_LOG)

export function log_level(): LogLevel {
	return current_level
}

/** Returns the previous level so callers can restore it. */
export function set_log_level(level: LogLevel): LogLevel {
	const previous = current_level
	current_level = level
	return previous
}

export function log_enabled(level: Exclude<LogLevel, 'silent'>) {
	return LOG_LEVELS.indexOf(current_level) >= LOG_LEVELS.indexOf(level)
}

export const logger = {
	warn(...lines: unknown[]) {
		if (log_enabled('warn'))
			console.warn(`[zplkit] warn: ${format_lines(lines, 5)}`)
	},
	debug(...lines: unknown[]) {
		if (log_enabled('debug'))
			console.error(`[zplkit] debug: ${format_lines(lines, 5)}`)
	},
}


export function exhaustive(v: never): never {
	throw new Error(`unhandled variant: ${debug(v)}`)
}

export const U32_MAX = 4294967295

export function saturating_add(left: number, right: number) {
	return Math.min(left + right, U32_MAX)
}
