import { Result, Ok, Err } from '@ts-std/monads'

import { Command } from './commands'
import { ParseError } from '../error'
import { Matcher, standard } from './standard'
import { custom } from './custom'
import { Cursor, Mismatch, Cut } from '../runtime/cursor'

export const unsupported: Matcher = {
	tag: '^',
	parse: cursor => {
		const code = cursor.take(2)
		if (code === undefined)
			throw new Mismatch(cursor.index, 'command code')
		return { type: 'Unsupported', command: `^${code}`, args: cursor.take_till_caret().trim() }
	},
}

// order matters, tags overlap: ^GIC must not be read as unsupported ^GI
export const matchers: readonly Matcher[] = [...standard, ...custom, unsupported]

export function position(source: string, index: number) {
	const preceding = source.slice(0, index)
	const line = preceding.split('\n').length
	const column = index - (preceding.lastIndexOf('\n') + 1) + 1
	return { line, column }
}

function parse_error(source: string, index: number, detail: string) {
	const { line, column } = position(source, index)
	return new ParseError(line, column, index, detail)
}

function attempt(cursor: Cursor): Command | undefined {
	const start = cursor.index
	for (const matcher of matchers) {
		if (!cursor.tag(matcher.tag))
			continue

		try {
			return matcher.parse(cursor)
		}
		catch (e) {
			if (e instanceof Cut)
				throw parse_error(cursor.source, e.index, `expected ${e.category} in ${matcher.tag} command`)
			if (!(e instanceof Mismatch))
				throw e
			cursor.index = start
		}
	}

	return undefined
}

export function parse(source: string): Result<Command[], ParseError> {
	const cursor = new Cursor(source)
	const commands: Command[] = []

	try {
		cursor.skip_whitespace()
		while (!cursor.at_end()) {
			const command = attempt(cursor)
			if (command === undefined)
				return Err(parse_error(source, cursor.index, 'expected command'))

			commands.push(command)
			cursor.skip_whitespace()
		}
	}
	catch (e) {
		if (e instanceof ParseError)
			return Err(e)
		throw e
	}

	return Ok(commands)
}
