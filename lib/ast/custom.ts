import { Matcher } from './standard'
import { Cursor, Mismatch, unsigned, value, param, comma, cut } from '../runtime/cursor'

function required_height(cursor: Cursor) {
	const height = param(cursor, unsigned)
	if (height === undefined)
		throw new Mismatch(cursor.index, unsigned.category)
	return height
}

function payload(cursor: Cursor) {
	const start = cursor.index
	const data = cursor.take_till_caret().trim()
	if (data === '')
		throw new Mismatch(start, 'base64 payload')
	return data
}

// ^GIC<width>,<height>,<base64>, everything mandatory
export const custom_image: Matcher = {
	tag: '^GIC',
	parse: cursor => {
		const width = cut(() => value(cursor, unsigned))
		const height = cut(() => required_height(cursor))
		cut(() => comma(cursor))
		const data = cut(() => payload(cursor))
		return { type: 'CustomImage', width, height, data }
	},
}

export const text_color: Matcher = {
	tag: '^GTC',
	parse: cursor => ({ type: 'GraphicTextColor', color: cursor.take_till_caret().trim() }),
}

export const line_color: Matcher = {
	tag: '^GLC',
	parse: cursor => ({ type: 'GraphicLineColor', color: cursor.take_till_caret().trim() }),
}

export const custom: readonly Matcher[] = [custom_image, text_color, line_color]
