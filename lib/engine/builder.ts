import { Command, GraphicField } from '../ast/commands'
import { decode } from '../codec/rle'
import { logger, exhaustive, saturating_add, U32_MAX } from '../utils'
import { Instruction } from './instructions'
import { ModalState } from './state'

function fallback(value: number | undefined, preferred: number, otherwise: number) {
	return value !== undefined ? value : preferred > 0 ? preferred : otherwise
}

function apply_graphic_field(state: ModalState, command: GraphicField) {
	const compression_type = command.compression_type !== undefined ? command.compression_type : 'A'
	if (compression_type !== 'A')
		return false

	const { bytes_per_row, graphic_field_count } = command
	const data = decode(command.data, bytes_per_row !== undefined ? bytes_per_row : 0)
	if (bytes_per_row !== undefined) {
		state.metrics.width = Math.min(bytes_per_row * 8, U32_MAX)
		if (graphic_field_count !== undefined && bytes_per_row > 0)
			state.metrics.height = Math.floor(graphic_field_count / bytes_per_row)
	}
	state.graphic_data = data
	state.kind = 'GraphicField'
	return true
}

/**
 * Applies one command to the modal state.
 * Returns false when the command stops the build, everything after it is ignored.
 */
export function apply(state: ModalState, command: Command, emit: (instruction: Instruction) => void): boolean {
	switch (command.type) {
		case 'FieldOrigin':
			if (command.x !== undefined) state.position.x = command.x
			if (command.y !== undefined) state.position.y = command.y
			return true
		case 'FieldTypeset':
			if (command.x !== undefined) state.typeset.x = saturating_add(state.typeset.x, command.x)
			if (command.y !== undefined) state.typeset.y = saturating_add(state.typeset.y, command.y)
			return true
		case 'FieldReverse':
			state.reverse = !state.reverse
			return true

		case 'FontSpec':
			state.font.name = command.font_name
			if (command.height !== undefined) state.font.height = command.height
			if (command.width !== undefined) state.font.width = command.width
			return true
		case 'FontSpecFull':
			state.font.name = command.font_name
			if (command.orientation !== undefined) state.font.orientation = command.orientation
			if (command.height !== undefined) state.font.height = command.height
			if (command.width !== undefined) state.font.width = command.width
			return true
		case 'FieldData':
			state.value = command.data
			return true

		case 'GraphicBox':
			state.metrics.width = command.width
			state.metrics.height = command.height
			state.metrics.thickness = command.border_thickness !== undefined ? command.border_thickness : 1
			state.attributes.line_color = command.line_color
			state.params.rounding = command.corner_rounding !== undefined ? command.corner_rounding : 0
			state.kind = 'GraphicBox'
			return true
		case 'GraphicCircle':
			state.metrics.width = command.diameter !== undefined ? command.diameter : 0
			state.metrics.thickness = command.border_thickness !== undefined ? command.border_thickness : 1
			state.attributes.line_color = command.line_color
			state.kind = 'GraphicCircle'
			return true
		case 'GraphicEllipse':
			state.metrics.width = command.width !== undefined ? command.width : 0
			state.metrics.height = command.height !== undefined ? command.height : 0
			state.metrics.thickness = command.border_thickness !== undefined ? command.border_thickness : 1
			state.attributes.line_color = command.line_color
			state.kind = 'GraphicEllipse'
			return true
		case 'GraphicTextColor':
			state.font.color = command.color
			return true
		case 'GraphicLineColor':
			state.attributes.custom_line_color = command.color
			return true
		case 'GraphicField':
			if (apply_graphic_field(state, command))
				return true
			logger.warn(`compression type ${command.compression_type} is not supported, ignoring the rest of the label`)
			return false

		case 'BarcodeDefault':
			if (command.module_width !== undefined) state.barcode.thickness = command.module_width
			if (command.height !== undefined) state.barcode.height = command.height
			if (command.ratio !== undefined) state.params.ratio = command.ratio
			return true
		case 'Code128':
			state.attributes.orientation = command.orientation
			state.metrics.height = fallback(command.height, state.barcode.height, 10)
			state.attributes.interpretation_line = command.interpretation_line
			state.attributes.interpretation_line_above = command.interpretation_line_above
			state.attributes.check_digit = command.check_digit
			state.attributes.mode = command.mode
			state.kind = 'Code128'
			return true
		case 'Code39':
			state.attributes.orientation = command.orientation
			state.attributes.check_digit = command.check_digit
			state.metrics.height = fallback(command.height, state.barcode.height, 10)
			state.attributes.interpretation_line = command.interpretation_line
			state.attributes.interpretation_line_above = command.interpretation_line_above
			state.kind = 'Code39'
			return true
		case 'QRCode':
			state.attributes.orientation = command.orientation
			state.params.model = command.model !== undefined ? command.model : 2
			state.metrics.thickness = fallback(command.magnification, state.barcode.thickness, 2)
			state.attributes.error_correction = command.error_correction
			state.params.mask = command.mask !== undefined ? command.mask : 7
			state.kind = 'QRCode'
			return true
		case 'CustomImage':
			state.metrics.width = command.width
			state.metrics.height = command.height
			state.value = command.data
			state.kind = 'CustomImage'
			return true

		// no effect on what gets drawn
		case 'StartFormat':
		case 'EndFormat':
		case 'LabelHome':
		case 'LabelLength':
		case 'LabelReverse':
		case 'Comment':
		case 'FieldBlock':
		case 'ChangeInternationalFont':
		case 'DataMatrix':
		case 'Unsupported':
			return true

		case 'FieldSeparator': {
			const instruction = flush(state)
			if (instruction !== undefined)
				emit(instruction)
			return true
		}

		default:
			return exhaustive(command)
	}
}

/** Resolves the current field into an instruction and clears the per field state. */
export function flush(state: ModalState): Instruction | undefined {
	const instruction = resolve(state)
	ModalState.reset_field(state)
	return instruction !== undefined ? Object.freeze(instruction) : undefined
}

function resolve(state: ModalState): Instruction | undefined {
	const { x, y } = state.position
	const data = state.value !== undefined ? state.value : ''
	const reverse_print = state.reverse
	const { metrics, attributes, params } = state
	const color = attributes.line_color !== undefined ? attributes.line_color : 'B'
	const custom_color = attributes.custom_line_color
	const module_width = state.barcode.thickness > 0 ? state.barcode.thickness : 2

	if (state.kind === undefined) {
		if (state.value === undefined)
			return undefined
		const { name: font, height, width, color: text_color } = state.font
		return { type: 'Text', x, y, font, height, width, text: data, reverse_print, color: text_color }
	}

	switch (state.kind) {
		case 'GraphicBox':
			return {
				type: 'GraphicBox', x, y,
				width: metrics.width, height: metrics.height, thickness: metrics.thickness,
				color, custom_color, rounding: params.rounding, reverse_print,
			}
		case 'GraphicCircle':
			return {
				type: 'GraphicCircle', x, y,
				diameter: metrics.width, thickness: metrics.thickness,
				color, custom_color, reverse_print,
			}
		case 'GraphicEllipse':
			return {
				type: 'GraphicEllipse', x, y,
				width: metrics.width, height: metrics.height, thickness: metrics.thickness,
				color, custom_color, reverse_print,
			}
		case 'GraphicField':
			if (state.graphic_data === undefined)
				return undefined
			return {
				type: 'GraphicField', x, y,
				width: metrics.width, height: metrics.height, data: state.graphic_data, reverse_print,
			}
		case 'CustomImage':
			return { type: 'CustomImage', x, y, width: metrics.width, height: metrics.height, data }
		case 'Code128':
			return {
				type: 'Code128', x, y,
				orientation: attributes.orientation !== undefined ? attributes.orientation : 'N',
				height: metrics.height,
				module_width,
				interpretation_line: attributes.interpretation_line !== undefined ? attributes.interpretation_line : 'Y',
				interpretation_line_above: attributes.interpretation_line_above !== undefined ? attributes.interpretation_line_above : 'N',
				check_digit: attributes.check_digit !== undefined ? attributes.check_digit : 'N',
				mode: attributes.mode !== undefined ? attributes.mode : 'N',
				data, reverse_print,
			}
		case 'Code39':
			return {
				type: 'Code39', x, y,
				orientation: attributes.orientation !== undefined ? attributes.orientation : 'N',
				check_digit: attributes.check_digit !== undefined ? attributes.check_digit : 'N',
				height: metrics.height,
				module_width,
				interpretation_line: attributes.interpretation_line !== undefined ? attributes.interpretation_line : 'Y',
				interpretation_line_above: attributes.interpretation_line_above !== undefined ? attributes.interpretation_line_above : 'N',
				data, reverse_print,
			}
		case 'QRCode':
			return {
				type: 'QRCode', x, y,
				orientation: attributes.orientation !== undefined ? attributes.orientation : 'N',
				model: params.model,
				magnification: metrics.thickness,
				error_correction: attributes.error_correction !== undefined ? attributes.error_correction : 'M',
				mask: params.mask,
				data, reverse_print,
			}
		default:
			return exhaustive(state.kind)
	}
}

export function build(commands: readonly Command[]): Instruction[] {
	const state = ModalState.create()
	const instructions: Instruction[] = []

	for (const command of commands)
		if (!apply(state, command, instruction => instructions.push(instruction)))
			break

	return instructions
}
