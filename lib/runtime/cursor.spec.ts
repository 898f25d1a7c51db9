import 'mocha'
import { expect } from 'chai'

import {
	Cursor, Mismatch, Cut, unsigned, decimal, character,
	value, leading, param, lax, cut, lax_param,
} from './cursor'

function thrown(fn: () => unknown): unknown {
	try {
		fn()
	}
	catch (e) {
		return e
	}
	return undefined
}

describe('Cursor', () => {
	it('tag', () => {
		const cursor = new Cursor('^XA^XZ')
		expect(cursor.tag('^XZ')).false
		expect(cursor.index).eql(0)
		expect(cursor.tag('^XA')).true
		expect(cursor.index).eql(3)
	})

	it('take counts code points', () => {
		const cursor = new Cursor('^😀Zrest')
		cursor.tag('^')
		expect(cursor.take(2)).eql('😀Z')
		expect(cursor.index).eql(4)
		expect(new Cursor('a').take(2)).eql(undefined)
	})

	it('take_till_caret', () => {
		const cursor = new Cursor('hello world ^FS')
		expect(cursor.take_till_caret()).eql('hello world ')
		expect(cursor.index).eql(12)
		expect(cursor.take_till_caret()).eql('')

		const to_end = new Cursor('abc')
		expect(to_end.take_till_caret()).eql('abc')
		expect(to_end.at_end()).true
	})

	it('skip_whitespace', () => {
		const cursor = new Cursor(' \t\r\n ^XA')
		cursor.skip_whitespace()
		expect(cursor.index).eql(5)
		cursor.skip_whitespace()
		expect(cursor.index).eql(5)
	})
})

describe('primitives', () => {
	it('unsigned', () => {
		const cursor = new Cursor('123,')
		expect(value(cursor, unsigned)).eql(123)
		expect(cursor.index).eql(3)

		expect(value(new Cursor('4294967295'), unsigned)).eql(4294967295)
		expect(thrown(() => value(new Cursor('4294967296'), unsigned))).instanceOf(Mismatch)
		expect(thrown(() => value(new Cursor('x1'), unsigned))).instanceOf(Mismatch)
	})

	it('a failed value consumes nothing', () => {
		const cursor = new Cursor('99999999999')
		try {
			value(cursor, unsigned)
		}
		catch (e) {
			expect(e).eql(new Mismatch(0, 'unsigned integer'))
		}
		expect(cursor.index).eql(0)
	})

	it('decimal', () => {
		expect(value(new Cursor('3.5'), decimal)).eql(3.5)
		expect(value(new Cursor('3'), decimal)).eql(3)

		const cursor = new Cursor('3.')
		expect(value(cursor, decimal)).eql(3)
		expect(cursor.index).eql(1)
	})

	it('character', () => {
		expect(value(new Cursor('N'), character)).eql('N')
		expect(value(new Cursor('é'), character)).eql('é')
		for (const excluded of [',', '^', '\r', '\n', ' ', '\t'])
			expect(thrown(() => value(new Cursor(excluded), character))).instanceOf(Mismatch)
	})
})

describe('combinators', () => {
	it('leading', () => {
		expect(leading(new Cursor(''), unsigned)).eql(undefined)
		expect(leading(new Cursor(',5'), unsigned)).eql(undefined)
		expect(leading(new Cursor('^FS'), unsigned)).eql(undefined)
		expect(leading(new Cursor('5'), unsigned)).eql(5)
		expect(thrown(() => leading(new Cursor('x'), unsigned))).instanceOf(Mismatch)
	})

	it('param', () => {
		const cursor = new Cursor(',7,,9')
		expect(param(cursor, unsigned)).eql(7)
		expect(param(cursor, unsigned)).eql(undefined)
		expect(param(cursor, unsigned)).eql(9)
		expect(thrown(() => param(new Cursor('7'), unsigned))).instanceOf(Mismatch)
	})

	it('lax restores the cursor', () => {
		const cursor = new Cursor(',abc')
		expect(lax(cursor, () => param(cursor, unsigned))).eql(undefined)
		expect(cursor.index).eql(0)
		expect(lax_param(cursor, character)).eql('a')
		expect(cursor.index).eql(2)
	})

	it('cut hardens a mismatch', () => {
		const cursor = new Cursor('^A\n', 2)
		try {
			cut(() => value(cursor, character))
			expect.fail('cut should throw')
		}
		catch (e) {
			expect(e).eql(new Cut(2, 'character'))
		}
	})

	it('lax does not catch a cut', () => {
		const cursor = new Cursor('x')
		expect(thrown(() => lax(cursor, () => cut(() => value(cursor, unsigned))))).instanceOf(Cut)
	})
})
