import { Result, Ok, Err } from '@ts-std/monads'
import { tuple as t } from '@ts-std/types'

import { ImageError, SecurityLimitExceeded } from '../error'

export const MAX_DECODED_SIZE = 10 * 1024 * 1024
const MAX_NIBBLE_REPEAT = 10000
const MAX_ROW_REPEAT = 1000
const MAX_RUN = 400

const UPPER_G = 'G'.charCodeAt(0)
const LOWER_G = 'g'.charCodeAt(0)

class ByteSink {
	private buffer = new Uint8Array(256)
	length = 0
	constructor(readonly limit: number) {}

	private reserve(additional: number) {
		const needed = this.length + additional
		if (needed <= this.buffer.length)
			return

		let capacity = this.buffer.length
		while (capacity < needed)
			capacity *= 2
		const next = new Uint8Array(Math.min(capacity, this.limit))
		next.set(this.buffer.subarray(0, this.length))
		this.buffer = next
	}

	private room(count: number) {
		return Math.max(0, Math.min(count, this.limit - this.length))
	}

	push(byte: number) {
		if (this.room(1) === 0)
			return
		this.reserve(1)
		this.buffer[this.length++] = byte
	}

	fill(byte: number, count: number) {
		const amount = this.room(count)
		this.reserve(amount)
		this.buffer.fill(byte, this.length, this.length + amount)
		this.length += amount
	}

	// appends a copy of an earlier range
	repeat(start: number, end: number) {
		const amount = this.room(end - start)
		this.reserve(amount)
		this.buffer.copyWithin(this.length, start, start + amount)
		this.length += amount
	}

	finish() {
		return this.buffer.slice(0, this.length)
	}
}

function is_hex_digit(c: string) {
	return /^[0-9A-Fa-f]$/.test(c)
}

/**
 * Decodes a compressed `^GF` payload.
 *
 * Never fails: unknown characters are skipped and output stops growing at `MAX_DECODED_SIZE`.
 * Row controls (`:`, `,` and `!`) only fill or copy rows when `bytes_per_row` is positive.
 */
export function decode(text: string, bytes_per_row: number): Uint8Array {
	const sink = new ByteSink(MAX_DECODED_SIZE)
	let multiplier = 0
	let high: number | undefined = undefined
	let last_was_row_terminator = false

	function flush_high(low: number) {
		if (high === undefined)
			return
		sink.push((high << 4) | low)
		high = undefined
	}

	function pad_row(byte: number) {
		if (bytes_per_row <= 0)
			return
		const row_position = sink.length % bytes_per_row
		if (row_position !== 0)
			sink.fill(byte, bytes_per_row - row_position)
		else if (last_was_row_terminator)
			sink.fill(byte, bytes_per_row)
	}

	function repeat_row() {
		if (bytes_per_row <= 0)
			return

		const row_position = sink.length % bytes_per_row
		const total_repeats = multiplier === 0 ? 1 : multiplier
		let repeats_done = 0

		if (row_position > 0) {
			const row_start = sink.length - row_position
			if (row_start >= bytes_per_row) {
				const previous_start = row_start - bytes_per_row
				sink.repeat(previous_start + row_position, previous_start + bytes_per_row)
			}
			else
				sink.fill(0x00, bytes_per_row - row_position)
			repeats_done++
		}

		const remaining = Math.min(total_repeats - repeats_done, MAX_ROW_REPEAT)
		const last_row_start = sink.length >= bytes_per_row ? sink.length - bytes_per_row : undefined
		for (let repeat = 0; repeat < remaining; repeat++) {
			if (sink.length + bytes_per_row > MAX_DECODED_SIZE)
				break
			if (last_row_start !== undefined)
				sink.repeat(last_row_start, last_row_start + bytes_per_row)
			else
				sink.fill(0x00, bytes_per_row)
		}
	}

	for (const c of text) {
		if (sink.length >= MAX_DECODED_SIZE)
			break

		if (c >= 'G' && c <= 'Y') {
			multiplier += c.charCodeAt(0) - UPPER_G + 1
			continue
		}
		if (c >= 'g' && c <= 'z') {
			multiplier += (c.charCodeAt(0) - LOWER_G + 1) * 20
			continue
		}

		if (is_hex_digit(c)) {
			const nibble = parseInt(c, 16)
			const count = Math.min(multiplier === 0 ? 1 : multiplier, MAX_NIBBLE_REPEAT)
			multiplier = 0

			for (let repeat = 0; repeat < count; repeat++) {
				if (sink.length >= MAX_DECODED_SIZE)
					break
				if (high !== undefined) {
					sink.push((high << 4) | nibble)
					high = undefined
				}
				else
					high = nibble
			}
			last_was_row_terminator = false
			continue
		}

		switch (c) {
			case ':':
				flush_high(0x00)
				repeat_row()
				break
			case ',':
				flush_high(0x00)
				pad_row(0x00)
				break
			case '!':
				flush_high(0x0F)
				pad_row(0xFF)
				break
			default:
				continue
		}
		multiplier = 0
		last_was_row_terminator = true
	}

	flush_high(0x00)
	return sink.finish()
}


export type RasterImage = Readonly<{
	width: number,
	height: number,
	channels: 1 | 3 | 4,
	data: Uint8Array,
}>

function validate(image: RasterImage): ImageError | SecurityLimitExceeded | undefined {
	const { width, height, channels, data } = image
	if (![1, 3, 4].includes(channels))
		return new ImageError(`unsupported channel count ${channels}`)
	if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0)
		return new ImageError(`invalid dimensions ${width}x${height}`)

	const total_bytes = Math.ceil(width / 8) * height
	if (total_bytes > MAX_DECODED_SIZE)
		return new SecurityLimitExceeded(total_bytes, MAX_DECODED_SIZE)

	const expected = width * height * channels
	if (data.length !== expected)
		return new ImageError(`expected ${expected} bytes of pixel data, got ${data.length}`)

	return undefined
}

// assumes a validated image
function pack(image: RasterImage) {
	const { width, height, channels, data } = image
	const bytes_per_row = Math.ceil(width / 8)
	const bitmap = new Uint8Array(bytes_per_row * height)

	for (let row = 0; row < height; row++) {
		const row_offset = row * bytes_per_row
		for (let column = 0; column < width; column++) {
			const pixel = (row * width + column) * channels
			const luma = channels === 1
				? data[pixel]
				: Math.floor((2126 * data[pixel] + 7152 * data[pixel + 1] + 722 * data[pixel + 2]) / 10000)

			if (luma < 128)
				bitmap[row_offset + (column >> 3)] |= 0x80 >> (column & 7)
		}
	}

	return t(bitmap, bytes_per_row)
}

/** Packs an image into one bit per pixel, dark pixels set, most significant bit first. */
export function pack_bitmap(
	image: RasterImage,
): Result<[Uint8Array, number], ImageError | SecurityLimitExceeded> {
	const invalid = validate(image)
	if (invalid !== undefined)
		return Err(invalid)
	return Ok(pack(image))
}

export function repeat_token(count: number) {
	let token = ''
	let remaining = count
	while (remaining >= 20) {
		const factor = Math.min(Math.floor(remaining / 20), 20)
		token += String.fromCharCode(LOWER_G + factor - 1)
		remaining -= factor * 20
	}
	if (remaining > 0)
		token += String.fromCharCode(UPPER_G + remaining - 1)
	return token
}

export function compress(hex: string) {
	const parts: string[] = []
	let index = 0
	while (index < hex.length) {
		const c = hex[index]
		let count = 1
		while (index + count < hex.length && hex[index + count] === c && count < MAX_RUN)
			count++

		parts.push(count > 1 ? repeat_token(count) + c : c)
		index += count
	}
	return parts.join('')
}

/** Encodes an image as a `^GF` payload, returning it with its total byte count and bytes per row. */
export function encode(
	image: RasterImage,
): Result<[string, number, number], ImageError | SecurityLimitExceeded> {
	const invalid = validate(image)
	if (invalid !== undefined)
		return Err(invalid)

	const [bitmap, bytes_per_row] = pack(image)
	const hex = Buffer.from(bitmap).toString('hex').toUpperCase()
	return Ok(t(compress(hex), bitmap.length, bytes_per_row))
}
