import { exhaustive } from '../utils'

export type Resolution =
	| 'Dpi152'
	| 'Dpi203'
	| 'Dpi300'
	| 'Dpi600'
	| Readonly<{ custom_dpi: number }>

export namespace Resolution {
	export function custom(dpi: number): Resolution {
		return { custom_dpi: dpi }
	}

	/** Dots per millimeter. */
	export function dpmm(resolution: Resolution): number {
		if (typeof resolution !== 'string')
			return resolution.custom_dpi / 25.4

		switch (resolution) {
			case 'Dpi152': return 6
			case 'Dpi203': return 8
			case 'Dpi300': return 12
			case 'Dpi600': return 24
			default: return exhaustive(resolution)
		}
	}

	/** Dots per inch. */
	export function dpi(resolution: Resolution): number {
		if (typeof resolution !== 'string')
			return resolution.custom_dpi

		switch (resolution) {
			case 'Dpi152': return 152
			case 'Dpi203': return 203.2
			case 'Dpi300': return 304.8
			case 'Dpi600': return 609.6
			default: return exhaustive(resolution)
		}
	}
}

export type Unit = Readonly<
	| { type: 'Dots', value: number }
	| { type: 'Inches', value: number }
	| { type: 'Millimeters', value: number }
	| { type: 'Centimeters', value: number }
>

export namespace Unit {
	export function dots(value: number): Unit {
		return { type: 'Dots', value }
	}
	export function inches(value: number): Unit {
		return { type: 'Inches', value }
	}
	export function millimeters(value: number): Unit {
		return { type: 'Millimeters', value }
	}
	export function centimeters(value: number): Unit {
		return { type: 'Centimeters', value }
	}

	export function to_dots(unit: Unit, resolution: Resolution): number {
		const value = Math.max(unit.value, 0)
		switch (unit.type) {
			case 'Dots': return Math.floor(value)
			case 'Inches': return Math.round(value * Resolution.dpi(resolution))
			case 'Millimeters': return Math.round(value * Resolution.dpmm(resolution))
			case 'Centimeters': return Math.round(value * 10 * Resolution.dpmm(resolution))
			default: return exhaustive(unit)
		}
	}
}
