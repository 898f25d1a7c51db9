import 'mocha'
import { expect } from 'chai'

import { parse } from './ast/grammar'
import { ParseError, FontError, LabelError, render_parse_error } from './error'

function parse_error(source: string) {
	return parse(source).match({
		ok: () => { throw new Error('expected a parse error') },
		err: e => e,
	})
}

describe('LabelError', () => it('names and tags every error', () => {
	const error = new FontError('no face')
	expect(error).instanceof(LabelError)
	expect(error).instanceof(Error)
	expect([error.name, error.type, error.message]).eql(['FontError', 'FontError', 'Font error: no face'])
}))

describe('render_parse_error', () => {
	const source = '^XA\n^A\n^XZ'

	it('points at the failing column', () => {
		expect(render_parse_error(parse_error(source), source, { colors: false })).eql(
			'error: Parse error at line 2: expected character in ^A command'
			+ '\n   |  '
			+ '\n 2 |  ^A'
			+ '\n   |    ^'
			+ '\n   |  '
		)
	})

	it('names the file', () => {
		const rendered = render_parse_error(parse_error(source), source, { filename: 'label.zpl', colors: false })
		expect(rendered.split('\n').slice(0, 2)).eql([
			'error: Parse error at line 2: expected character in ^A command',
			'   label.zpl:2:3',
		])
	})

	it('expands tabs in the source line', () => {
		const error = new ParseError(1, 3, 2, 'expected command')
		expect(render_parse_error(error, '\tx?', { colors: false })).eql(
			'error: Parse error at line 1: expected command'
			+ '\n   |  '
			+ '\n 1 |    x?'
			+ '\n   |     ^'
			+ '\n   |  '
		)
	})
})
