export type YesNo = 'Y' | 'N'
export type Justification = 'L' | 'C' | 'R' | 'J'

export type StartFormat = Readonly<{ type: 'StartFormat' }>
export type EndFormat = Readonly<{ type: 'EndFormat' }>
export type FieldSeparator = Readonly<{ type: 'FieldSeparator' }>
export type FieldReverse = Readonly<{ type: 'FieldReverse' }>

export type LabelHome = Readonly<{ type: 'LabelHome', x: number | undefined, y: number | undefined }>
export type LabelLength = Readonly<{ type: 'LabelLength', length: number | undefined }>
export type LabelReverse = Readonly<{ type: 'LabelReverse', reverse: YesNo | undefined }>
export type FieldOrigin = Readonly<{ type: 'FieldOrigin', x: number | undefined, y: number | undefined }>
export type FieldTypeset = Readonly<{ type: 'FieldTypeset', x: number | undefined, y: number | undefined }>
export type Comment = Readonly<{ type: 'Comment', text: string }>
export type FieldData = Readonly<{ type: 'FieldData', data: string }>

export type FontSpecFull = Readonly<{
	type: 'FontSpecFull',
	font_name: string,
	orientation: string | undefined,
	height: number | undefined,
	width: number | undefined,
}>
export type FontSpec = Readonly<{
	type: 'FontSpec',
	font_name: string,
	height: number | undefined,
	width: number | undefined,
}>

export type FieldBlock = Readonly<{
	type: 'FieldBlock',
	width: number | undefined,
	max_lines: number | undefined,
	line_spacing: number | undefined,
	justification: Justification | undefined,
	indent: number | undefined,
}>
export type ChangeInternationalFont = Readonly<{ type: 'ChangeInternationalFont', charset: number | undefined }>

export type GraphicBox = Readonly<{
	type: 'GraphicBox',
	width: number,
	height: number,
	border_thickness: number | undefined,
	line_color: string | undefined,
	corner_rounding: number | undefined,
}>
export type GraphicCircle = Readonly<{
	type: 'GraphicCircle',
	diameter: number | undefined,
	border_thickness: number | undefined,
	line_color: string | undefined,
}>
export type GraphicEllipse = Readonly<{
	type: 'GraphicEllipse',
	width: number | undefined,
	height: number | undefined,
	border_thickness: number | undefined,
	line_color: string | undefined,
}>
export type GraphicField = Readonly<{
	type: 'GraphicField',
	compression_type: string | undefined,
	binary_byte_count: number | undefined,
	graphic_field_count: number | undefined,
	bytes_per_row: number | undefined,
	data: string,
}>

// extensions
export type CustomImage = Readonly<{ type: 'CustomImage', width: number, height: number, data: string }>
export type GraphicTextColor = Readonly<{ type: 'GraphicTextColor', color: string }>
export type GraphicLineColor = Readonly<{ type: 'GraphicLineColor', color: string }>

export type Code128 = Readonly<{
	type: 'Code128',
	orientation: string | undefined,
	height: number | undefined,
	interpretation_line: string | undefined,
	interpretation_line_above: string | undefined,
	check_digit: string | undefined,
	mode: string | undefined,
}>
export type QRCode = Readonly<{
	type: 'QRCode',
	orientation: string | undefined,
	model: number | undefined,
	magnification: number | undefined,
	error_correction: string | undefined,
	mask: number | undefined,
}>
export type Code39 = Readonly<{
	type: 'Code39',
	orientation: string | undefined,
	check_digit: string | undefined,
	height: number | undefined,
	interpretation_line: string | undefined,
	interpretation_line_above: string | undefined,
}>
export type DataMatrix = Readonly<{
	type: 'DataMatrix',
	orientation: string | undefined,
	height: number | undefined,
	quality: number | undefined,
	columns: number | undefined,
	rows: number | undefined,
}>
export type BarcodeDefault = Readonly<{
	type: 'BarcodeDefault',
	module_width: number | undefined,
	ratio: number | undefined,
	height: number | undefined,
}>

export type Unsupported = Readonly<{ type: 'Unsupported', command: string, args: string }>

export type Command =
	| StartFormat
	| EndFormat
	| LabelHome
	| LabelLength
	| FieldOrigin
	| FieldTypeset
	| FieldSeparator
	| LabelReverse
	| Comment
	| FontSpecFull
	| FontSpec
	| FieldData
	| FieldBlock
	| ChangeInternationalFont
	| FieldReverse
	| GraphicBox
	| GraphicCircle
	| GraphicEllipse
	| GraphicField
	| CustomImage
	| GraphicTextColor
	| GraphicLineColor
	| Code128
	| QRCode
	| Code39
	| DataMatrix
	| BarcodeDefault
	| Unsupported
