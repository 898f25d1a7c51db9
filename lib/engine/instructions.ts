export type TextInstruction = Readonly<{
	type: 'Text',
	x: number,
	y: number,
	font: string,
	height: number | undefined,
	width: number | undefined,
	text: string,
	reverse_print: boolean,
	color: string | undefined,
}>

export type GraphicBoxInstruction = Readonly<{
	type: 'GraphicBox',
	x: number,
	y: number,
	width: number,
	height: number,
	thickness: number,
	color: string,
	custom_color: string | undefined,
	rounding: number,
	reverse_print: boolean,
}>

export type GraphicCircleInstruction = Readonly<{
	type: 'GraphicCircle',
	x: number,
	y: number,
	diameter: number,
	thickness: number,
	color: string,
	custom_color: string | undefined,
	reverse_print: boolean,
}>

export type GraphicEllipseInstruction = Readonly<{
	type: 'GraphicEllipse',
	x: number,
	y: number,
	width: number,
	height: number,
	thickness: number,
	color: string,
	custom_color: string | undefined,
	reverse_print: boolean,
}>

export type GraphicFieldInstruction = Readonly<{
	type: 'GraphicField',
	x: number,
	y: number,
	width: number,
	height: number,
	data: Uint8Array,
	reverse_print: boolean,
}>

/** Base64 encoded image placed as is, never reverse printed. */
export type CustomImageInstruction = Readonly<{
	type: 'CustomImage',
	x: number,
	y: number,
	width: number,
	height: number,
	data: string,
}>

export type Code128Instruction = Readonly<{
	type: 'Code128',
	x: number,
	y: number,
	orientation: string,
	height: number,
	module_width: number,
	interpretation_line: string,
	interpretation_line_above: string,
	check_digit: string,
	mode: string,
	data: string,
	reverse_print: boolean,
}>

export type Code39Instruction = Readonly<{
	type: 'Code39',
	x: number,
	y: number,
	orientation: string,
	check_digit: string,
	height: number,
	module_width: number,
	interpretation_line: string,
	interpretation_line_above: string,
	data: string,
	reverse_print: boolean,
}>

export type QRCodeInstruction = Readonly<{
	type: 'QRCode',
	x: number,
	y: number,
	orientation: string,
	model: number,
	magnification: number,
	error_correction: string,
	mask: number,
	data: string,
	reverse_print: boolean,
}>

export type Instruction =
	| TextInstruction
	| GraphicBoxInstruction
	| GraphicCircleInstruction
	| GraphicEllipseInstruction
	| GraphicFieldInstruction
	| CustomImageInstruction
	| Code128Instruction
	| Code39Instruction
	| QRCodeInstruction

export type InstructionKind = Exclude<Instruction['type'], 'Text'>
