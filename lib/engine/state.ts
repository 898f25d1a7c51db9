import { InstructionKind } from './instructions'

export type Position = { x: number, y: number }

// thickness doubles as the QR magnification
export type Metrics = {
	width: number,
	height: number,
	thickness: number,
}

export type BarcodeMetrics = {
	thickness: number,
	height: number,
}

export type Attributes = {
	orientation: string | undefined,
	interpretation_line: string | undefined,
	interpretation_line_above: string | undefined,
	check_digit: string | undefined,
	mode: string | undefined,
	error_correction: string | undefined,
	line_color: string | undefined,
	custom_line_color: string | undefined,
}

export type Params = {
	rounding: number,
	model: number,
	mask: number,
	ratio: number | undefined,
}

export type Font = {
	name: string,
	orientation: string | undefined,
	height: number | undefined,
	width: number | undefined,
	color: string | undefined,
}

export type ModalState = {
	position: Position,
	typeset: Position,
	metrics: Metrics,
	barcode: BarcodeMetrics,
	attributes: Attributes,
	params: Params,
	font: Font,
	reverse: boolean,
	value: string | undefined,
	graphic_data: Uint8Array | undefined,
	kind: InstructionKind | undefined,
}

export namespace ModalState {
	export function create(): ModalState {
		return {
			position: { x: 0, y: 0 },
			typeset: { x: 0, y: 0 },
			metrics: { width: 0, height: 0, thickness: 0 },
			barcode: { thickness: 0, height: 0 },
			attributes: {
				orientation: undefined,
				interpretation_line: undefined,
				interpretation_line_above: undefined,
				check_digit: undefined,
				mode: undefined,
				error_correction: undefined,
				line_color: undefined,
				custom_line_color: undefined,
			},
			params: { rounding: 0, model: 0, mask: 0, ratio: undefined },
			font: { name: '0', orientation: undefined, height: undefined, width: undefined, color: undefined },
			reverse: false,
			value: undefined,
			graphic_data: undefined,
			kind: undefined,
		}
	}

	/** Clears everything that belongs to a single field. */
	export function reset_field(state: ModalState) {
		state.value = undefined
		state.kind = undefined
		state.graphic_data = undefined
		state.reverse = false
	}
}
