import { tuple as t } from '@ts-std/types'

export type Rgb = [number, number, number]

/**
 * Reads the colors given to `^GTC` and `^GLC`: `RRGGBB` or shorthand `RGB`, with or without `#`.
 * Anything unreadable is black.
 */
export function parse_hex_color(color: string | undefined): Rgb {
	if (color === undefined)
		return t(0, 0, 0)

	const hex = color.replace(/^#+/, '')
	if (/^[0-9A-Fa-f]{6}$/.test(hex))
		return t(
			parseInt(hex.slice(0, 2), 16),
			parseInt(hex.slice(2, 4), 16),
			parseInt(hex.slice(4, 6), 16),
		)
	if (/^[0-9A-Fa-f]{3}$/.test(hex))
		return t(
			parseInt(hex[0], 16) * 17,
			parseInt(hex[1], 16) * 17,
			parseInt(hex[2], 16) * 17,
		)

	return t(0, 0, 0)
}
