import { tuple as t } from '@ts-std/types'

import { logger } from '../utils'
import { Command, Justification, YesNo } from './commands'
import {
	Cursor, Primitive, unsigned, decimal, character,
	value, leading, comma, cut, lax_param,
} from '../runtime/cursor'

export type Matcher = Readonly<{
	tag: string,
	parse: (cursor: Cursor) => Command,
}>

function xy(cursor: Cursor) {
	const x = cut(() => leading(cursor, unsigned))
	const y = lax_param(cursor, unsigned)
	return t(x, y)
}

function text(cursor: Cursor) {
	return cursor.take_till_caret().trim()
}

// barcode style commands read their whole argument list up front,
// anything after the parameters they know about is dropped
function with_args(cursor: Cursor, fn: (args: Cursor) => Command): Command {
	return fn(new Cursor(cursor.take_till_caret()))
}

function optional<T>(primitive: Primitive<T>) {
	return (cursor: Cursor) => lax_param(cursor, primitive)
}
const u32 = optional(unsigned)
const char = optional(character)

export function to_yes_no(letter: string): YesNo {
	if (letter === 'Y' || letter === 'N')
		return letter
	logger.debug(`${letter} is not a valid yes/no value, using N`)
	return 'N'
}

export function to_justification(letter: string): Justification {
	switch (letter) {
		case 'L':
		case 'C':
		case 'R':
		case 'J':
			return letter
		default:
			logger.debug(`${letter} is not a valid justification, using L`)
			return 'L'
	}
}

export const standard: readonly Matcher[] = [
	{ tag: '^XA', parse: () => ({ type: 'StartFormat' }) },
	{ tag: '^XZ', parse: () => ({ type: 'EndFormat' }) },
	{ tag: '^LH', parse: cursor => {
		const [x, y] = xy(cursor)
		return { type: 'LabelHome', x, y }
	} },
	{ tag: '^LL', parse: cursor => {
		return { type: 'LabelLength', length: cut(() => leading(cursor, unsigned)) }
	} },
	{ tag: '^FO', parse: cursor => {
		const [x, y] = xy(cursor)
		return { type: 'FieldOrigin', x, y }
	} },
	{ tag: '^FT', parse: cursor => {
		const [x, y] = xy(cursor)
		return { type: 'FieldTypeset', x, y }
	} },
	{ tag: '^FS', parse: () => ({ type: 'FieldSeparator' }) },
	{ tag: '^LR', parse: cursor => {
		const letter = cut(() => leading(cursor, character))
		return { type: 'LabelReverse', reverse: letter !== undefined ? to_yes_no(letter) : undefined }
	} },
	{ tag: '^FX', parse: cursor => ({ type: 'Comment', text: text(cursor) }) },
	{ tag: '^A', parse: cursor => {
		const font_name = cut(() => value(cursor, character))
		// not cut: "^A0" followed by a line break falls through to the unsupported matcher
		const orientation = leading(cursor, character)
		const height = u32(cursor)
		const width = u32(cursor)
		return { type: 'FontSpecFull', font_name, orientation, height, width }
	} },
	{ tag: '^CF', parse: cursor => {
		const font_name = cut(() => value(cursor, character))
		const height = u32(cursor)
		const width = u32(cursor)
		return { type: 'FontSpec', font_name, height, width }
	} },
	{ tag: '^FD', parse: cursor => ({ type: 'FieldData', data: text(cursor) }) },
	{ tag: '^FB', parse: cursor => {
		const width = cut(() => leading(cursor, unsigned))
		const max_lines = u32(cursor)
		const line_spacing = u32(cursor)
		const justification = char(cursor)
		const indent = u32(cursor)
		return {
			type: 'FieldBlock', width, max_lines, line_spacing, indent,
			justification: justification !== undefined ? to_justification(justification) : undefined,
		}
	} },
	{ tag: '^CI', parse: cursor => with_args(cursor, args => {
		return { type: 'ChangeInternationalFont', charset: leading(args, unsigned) }
	}) },
	{ tag: '^FR', parse: () => ({ type: 'FieldReverse' }) },
	{ tag: '^GB', parse: cursor => {
		const width = cut(() => value(cursor, unsigned))
		cut(() => comma(cursor))
		const height = cut(() => value(cursor, unsigned))
		const border_thickness = u32(cursor)
		const line_color = char(cursor)
		const corner_rounding = u32(cursor)
		return { type: 'GraphicBox', width, height, border_thickness, line_color, corner_rounding }
	} },
	{ tag: '^GC', parse: cursor => {
		const diameter = cut(() => leading(cursor, unsigned))
		const border_thickness = u32(cursor)
		const line_color = char(cursor)
		return { type: 'GraphicCircle', diameter, border_thickness, line_color }
	} },
	{ tag: '^GE', parse: cursor => {
		const width = cut(() => leading(cursor, unsigned))
		const height = u32(cursor)
		const border_thickness = u32(cursor)
		const line_color = char(cursor)
		return { type: 'GraphicEllipse', width, height, border_thickness, line_color }
	} },
	{ tag: '^GF', parse: cursor => {
		const compression_type = cut(() => leading(cursor, character))
		const binary_byte_count = u32(cursor)
		const graphic_field_count = u32(cursor)
		const bytes_per_row = u32(cursor)
		cursor.tag(',')
		return {
			type: 'GraphicField',
			compression_type, binary_byte_count, graphic_field_count, bytes_per_row,
			data: text(cursor),
		}
	} },
	{ tag: '^BQ', parse: cursor => with_args(cursor, args => {
		const orientation = leading(args, character)
		const model = u32(args)
		const magnification = u32(args)
		const error_correction = char(args)
		const mask = u32(args)
		return { type: 'QRCode', orientation, model, magnification, error_correction, mask }
	}) },
	{ tag: '^B3', parse: cursor => with_args(cursor, args => {
		const orientation = leading(args, character)
		const check_digit = char(args)
		const height = u32(args)
		const interpretation_line = char(args)
		const interpretation_line_above = char(args)
		return { type: 'Code39', orientation, check_digit, height, interpretation_line, interpretation_line_above }
	}) },
	{ tag: '^BY', parse: cursor => with_args(cursor, args => {
		const module_width = leading(args, unsigned)
		const ratio = lax_param(args, decimal)
		const height = u32(args)
		return { type: 'BarcodeDefault', module_width, ratio, height }
	}) },
	{ tag: '^BX', parse: cursor => with_args(cursor, args => {
		const orientation = leading(args, character)
		const height = u32(args)
		const quality = u32(args)
		const columns = u32(args)
		const rows = u32(args)
		return { type: 'DataMatrix', orientation, height, quality, columns, rows }
	}) },
	{ tag: '^BC', parse: cursor => with_args(cursor, args => {
		const orientation = leading(args, character)
		const height = u32(args)
		const interpretation_line = char(args)
		const interpretation_line_above = char(args)
		const check_digit = char(args)
		const mode = char(args)
		return {
			type: 'Code128',
			orientation, height, interpretation_line, interpretation_line_above, check_digit, mode,
		}
	}) },
]
