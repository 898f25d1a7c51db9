import chalk from 'chalk'

export abstract class LabelError extends Error {
	abstract readonly type: string
	constructor(message: string) {
		super(message)
		this.name = new.target.name
	}
}

export class ParseError extends LabelError {
	readonly type: 'ParseError' = 'ParseError'
	constructor(
		readonly line: number,
		readonly column: number,
		readonly index: number,
		readonly detail: string,
	) {
		super(`Parse error at line ${line}: ${detail}`)
	}
}

export class EmptyInput extends LabelError {
	readonly type: 'EmptyInput' = 'EmptyInput'
	constructor() {
		super('Empty or invalid ZPL input')
	}
}

// nothing raises this yet, the builder degrades instead of failing
export class BuilderError extends LabelError {
	readonly type: 'BuilderError' = 'BuilderError'
	constructor(readonly detail: string) {
		super(`Builder error: ${detail}`)
	}
}

export class SecurityLimitExceeded extends LabelError {
	readonly type: 'SecurityLimitExceeded' = 'SecurityLimitExceeded'
	constructor(readonly requested: number, readonly limit: number) {
		super(`Security limit exceeded: ${requested} bytes requested, limit is ${limit}`)
	}
}

export class ImageError extends LabelError {
	readonly type: 'ImageError' = 'ImageError'
	constructor(readonly detail: string) {
		super(`Image error: ${detail}`)
	}
}

export class FontError extends LabelError {
	readonly type: 'FontError' = 'FontError'
	constructor(readonly detail: string) {
		super(`Font error: ${detail}`)
	}
}

export class BackendError extends LabelError {
	readonly type: 'BackendError' = 'BackendError'
	constructor(readonly detail: string) {
		super(`Backend error: ${detail}`)
	}
}

export type CompileError =
	| ParseError
	| EmptyInput
	| BuilderError


export type RenderOptions = Readonly<{
	filename?: string,
	colors?: boolean,
}>

export function render_parse_error(
	error: ParseError,
	source: string,
	{ filename, colors = true }: RenderOptions = {},
) {
	const paint = colors ? chalk : new chalk.Instance({ level: 0 })
	const err = paint.red.bold
	const bold = paint.white.bold
	const info = paint.blue.bold
	const file = paint.magentaBright.bold
	const pos = paint.cyanBright.bold

	const { line, column, index } = error
	const line_number_width = line.toString().length
	function make_margin(line_number?: number) {
		const insert = line_number !== undefined
			? ' '.repeat(line_number_width - line_number.toString().length) + line_number
			: ' '.repeat(line_number_width)
		return info(`\n ${insert} |  `)
	}
	const blank_margin = make_margin()

	const line_start = index === 0 ? 0 : source.lastIndexOf('\n', index - 1) + 1
	const newline = source.indexOf('\n', line_start)
	const source_line = source.slice(line_start, newline === -1 ? source.length : newline)

	const print_source_line = source_line.replace(/\t/g, '  ')
	const pointer_prefix = source_line.slice(0, column - 1).replace(/\t/g, '  ').replace(/[^ ]/g, ' ')
	const pointer = pointer_prefix + err('^')

	const header = filename
		? '\n' + ' '.repeat(line_number_width + 2) + file(filename) + ':' + pos(line) + ':' + pos(column)
		: ''

	return err('error') + bold(`: ${error.message}`)
		+ header
		+ blank_margin
		+ make_margin(line) + print_source_line
		+ blank_margin + pointer
		+ blank_margin
}
