import { U32_MAX } from '../utils'

// soft failure, the enclosing alternative may try something else
export class Mismatch {
	constructor(readonly index: number, readonly category: string) {}
}

// hard failure, parsing stops right here
export class Cut {
	constructor(readonly index: number, readonly category: string) {}
}

export class Cursor {
	constructor(readonly source: string, public index = 0) {}

	at_end() {
		return this.index >= this.source.length
	}

	peek(): string | undefined {
		return this.source[this.index]
	}

	tag(literal: string) {
		if (!this.source.startsWith(literal, this.index))
			return false
		this.index += literal.length
		return true
	}

	/** Matches a sticky regex at the current index, advancing past the match. */
	attempt(regex: RegExp): string | undefined {
		regex.lastIndex = this.index
		const match = regex.exec(this.source)
		if (match === null)
			return undefined

		const content = match[0]
		this.index += content.length
		return content
	}

	/** Takes exactly `count` code points, or nothing at all. */
	take(count: number): string | undefined {
		let end = this.index
		for (let taken = 0; taken < count; taken++) {
			const code_point = this.source.codePointAt(end)
			if (code_point === undefined)
				return undefined
			end += code_point > 0xFFFF ? 2 : 1
		}

		const content = this.source.slice(this.index, end)
		this.index = end
		return content
	}

	take_till_caret() {
		const caret = this.source.indexOf('^', this.index)
		const end = caret === -1 ? this.source.length : caret
		const content = this.source.slice(this.index, end)
		this.index = end
		return content
	}

	skip_whitespace() {
		this.attempt(/[ \t\r\n]*/y)
	}
}


export type Primitive<T> = Readonly<{
	category: string,
	regex: RegExp,
	convert: (content: string) => T | undefined,
}>

export const unsigned: Primitive<number> = {
	category: 'unsigned integer',
	regex: /[0-9]+/y,
	convert: content => {
		const value = Number(content)
		return value <= U32_MAX ? value : undefined
	},
}

export const decimal: Primitive<number> = {
	category: 'decimal number',
	regex: /[0-9]+(?:\.[0-9]+)?/y,
	convert: content => Number(content),
}

export const character: Primitive<string> = {
	category: 'character',
	regex: /[^,^\r\n \t]/uy,
	convert: content => content,
}


export function value<T>(cursor: Cursor, primitive: Primitive<T>): T {
	const start = cursor.index
	const content = cursor.attempt(primitive.regex)
	const converted = content !== undefined ? primitive.convert(content) : undefined
	if (converted === undefined) {
		cursor.index = start
		throw new Mismatch(start, primitive.category)
	}
	return converted
}

/** The first parameter of a list, absent when the list ends or skips it. */
export function leading<T>(cursor: Cursor, primitive: Primitive<T>): T | undefined {
	const next = cursor.peek()
	if (next === undefined || next === ',' || next === '^')
		return undefined
	return value(cursor, primitive)
}

export function comma(cursor: Cursor) {
	if (!cursor.tag(','))
		throw new Mismatch(cursor.index, 'comma')
}

export function param<T>(cursor: Cursor, primitive: Primitive<T>): T | undefined {
	comma(cursor)
	return leading(cursor, primitive)
}

export function lax<T>(cursor: Cursor, fn: () => T): T | undefined {
	const start = cursor.index
	try {
		return fn()
	}
	catch (e) {
		if (!(e instanceof Mismatch))
			throw e
		cursor.index = start
		return undefined
	}
}

export function cut<T>(fn: () => T): T {
	try {
		return fn()
	}
	catch (e) {
		if (e instanceof Mismatch)
			throw new Cut(e.index, e.category)
		throw e
	}
}

export function lax_param<T>(cursor: Cursor, primitive: Primitive<T>): T | undefined {
	return lax(cursor, () => param(cursor, primitive))
}
