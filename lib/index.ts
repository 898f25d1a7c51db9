export { parse } from './ast/grammar'
export type { Command } from './ast/commands'
export { build } from './engine/builder'
export type { Instruction, InstructionKind } from './engine/instructions'
export { compile, substitute, Engine } from './engine/engine'
export type { Variables } from './engine/engine'
export type { Backend } from './engine/backend'
export { Resolution, Unit } from './engine/units'
export { FontRegistry, FONT_IDENTIFIERS, is_font_data } from './engine/font'
export type { FontFace } from './engine/font'
export { parse_hex_color } from './engine/color'
export type { Rgb } from './engine/color'
export { decode, encode, pack_bitmap, compress, MAX_DECODED_SIZE } from './codec/rle'
export type { RasterImage } from './codec/rle'
export {
	LabelError, ParseError, EmptyInput, BuilderError, SecurityLimitExceeded,
	ImageError, FontError, BackendError, render_parse_error,
} from './error'
export type { CompileError, RenderOptions } from './error'
export { set_log_level, log_level } from './utils'
export type { LogLevel } from './utils'
