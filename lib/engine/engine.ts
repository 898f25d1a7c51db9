import { Result, Ok, Err } from '@ts-std/monads'
import { Dict } from '@ts-std/types'

import { parse } from '../ast/grammar'
import { exhaustive } from '../utils'
import { LabelError, EmptyInput, CompileError } from '../error'
import { build } from './builder'
import { Backend } from './backend'
import { FontRegistry } from './font'
import { Instruction } from './instructions'
import { Resolution, Unit } from './units'

export type Variables = Readonly<Dict<string>>

export function compile(source: string): Result<Instruction[], CompileError> {
	const parsed = parse(source)
	if (parsed.is_err())
		return Err(parsed.error)

	const commands = parsed.unwrap()
	if (commands.length === 0)
		return Err(new EmptyInput())

	return Ok(build(commands))
}

/** Replaces each `{{name}}` that has a value, leaving the rest as written. */
export function substitute(text: string, variables: Variables) {
	return text.replace(/\{\{([^{}]*)\}\}/g, (placeholder, name: string) => {
		return Object.prototype.hasOwnProperty.call(variables, name)
			? variables[name]
			: placeholder
	})
}

function draw(backend: Backend, instruction: Instruction, variables: Variables) {
	switch (instruction.type) {
		case 'Text':
			return backend.draw_text({ ...instruction, text: substitute(instruction.text, variables) })
		case 'GraphicBox':
			return backend.draw_box(instruction)
		case 'GraphicCircle':
			return backend.draw_circle(instruction)
		case 'GraphicEllipse':
			return backend.draw_ellipse(instruction)
		case 'GraphicField':
			return backend.draw_bitmap(instruction)
		case 'CustomImage':
			return backend.draw_custom_image(instruction)
		case 'Code128':
			return backend.draw_code128({ ...instruction, data: substitute(instruction.data, variables) })
		case 'Code39':
			return backend.draw_code39({ ...instruction, data: substitute(instruction.data, variables) })
		case 'QRCode':
			return backend.draw_qr({ ...instruction, data: substitute(instruction.data, variables) })
		default:
			return exhaustive(instruction)
	}
}

export class Engine {
	private constructor(
		readonly instructions: readonly Instruction[],
		readonly width: Unit,
		readonly height: Unit,
		readonly resolution: Resolution,
		readonly fonts: FontRegistry,
	) {}

	static create(source: string, width: Unit, height: Unit, resolution: Resolution): Result<Engine, CompileError> {
		const compiled = compile(source)
		if (compiled.is_err())
			return Err(compiled.error)

		const instructions = Object.freeze(compiled.unwrap())
		return Ok(new Engine(instructions, width, height, resolution, FontRegistry.empty()))
	}

	get width_dots() {
		return Unit.to_dots(this.width, this.resolution)
	}

	get height_dots() {
		return Unit.to_dots(this.height, this.resolution)
	}

	with_fonts(fonts: FontRegistry) {
		return new Engine(this.instructions, this.width, this.height, this.resolution, fonts)
	}

	render(backend: Backend, variables: Variables = {}): Result<Uint8Array, LabelError> {
		try {
			backend.setup_page(this.width_dots, this.height_dots, Resolution.dpi(this.resolution))
			backend.setup_font_source(this.fonts)
			for (const instruction of this.instructions)
				draw(backend, instruction, variables)
			return Ok(backend.finalize())
		}
		catch (e) {
			if (e instanceof LabelError)
				return Err(e)
			throw e
		}
	}
}
