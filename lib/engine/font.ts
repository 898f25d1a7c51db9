import { Result, Ok, Err, Maybe } from '@ts-std/monads'

import { FontError } from '../error'

/** Every font identifier a label can select, in range order. */
export const FONT_IDENTIFIERS: readonly string[] = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'.split('')

// TrueType, OpenType (CFF), Apple TrueType, PostScript sfnt and font collections
const SFNT_SIGNATURES: readonly number[] = [0x00010000, 0x4F54544F, 0x74727565, 0x74797031, 0x74746366]
const SFNT_HEADER_LENGTH = 12

export type FontFace = Readonly<{
	name: string,
	data: Uint8Array,
}>

export function is_font_data(bytes: Uint8Array) {
	if (bytes.length < SFNT_HEADER_LENGTH)
		return false
	const signature = ((bytes[0] << 24) | (bytes[1] << 16) | (bytes[2] << 8) | bytes[3]) >>> 0
	return SFNT_SIGNATURES.includes(signature)
}

/**
 * Maps font identifiers to font faces.
 *
 * Registries never change after construction, `with_font` returns a new one,
 * so a single registry can back any number of engines and renders.
 */
export class FontRegistry {
	private constructor(
		private readonly faces: ReadonlyMap<string, FontFace>,
		private readonly assignments: ReadonlyMap<string, string>,
	) {}

	static empty() {
		return new FontRegistry(new Map(), new Map())
	}

	/**
	 * Registers a font and assigns it to the identifiers `from` through `to` inclusive.
	 * An unknown or reversed range registers the font without assigning it.
	 */
	with_font(name: string, bytes: Uint8Array, from: string, to: string): Result<FontRegistry, FontError> {
		if (!is_font_data(bytes))
			return Err(new FontError('invalid font data'))

		const faces = new Map(this.faces)
		faces.set(name, { name, data: bytes.slice() })

		const assignments = new Map(this.assignments)
		const start = FONT_IDENTIFIERS.indexOf(from)
		const end = FONT_IDENTIFIERS.indexOf(to)
		if (start !== -1 && end !== -1 && start <= end)
			for (const identifier of FONT_IDENTIFIERS.slice(start, end + 1))
				assignments.set(identifier, name)

		return Ok(new FontRegistry(faces, assignments))
	}

	get_font(identifier: string): Maybe<FontFace> {
		const name = this.assignments.get(identifier)
		return Maybe.from_nillable(name !== undefined ? this.faces.get(name) : undefined)
	}

	font_names() {
		return [...this.faces.keys()]
	}
}
