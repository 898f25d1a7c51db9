import { FontRegistry } from './font'
import {
	TextInstruction, GraphicBoxInstruction, GraphicCircleInstruction, GraphicEllipseInstruction,
	GraphicFieldInstruction, CustomImageInstruction, Code128Instruction, Code39Instruction, QRCodeInstruction,
} from './instructions'

/**
 * Anything that can turn instructions into output: a raster, a page description, a printer stream.
 *
 * Calls arrive in draw order with every value resolved to absolute dots.
 * Implementations signal failure by throwing a `LabelError` (`FontError`, `ImageError`, `BackendError`),
 * which the engine hands back to its caller unchanged.
 */
export interface Backend {
	setup_page(width: number, height: number, dpi: number): void
	setup_font_source(fonts: FontRegistry): void

	draw_text(text: TextInstruction): void
	draw_box(box: GraphicBoxInstruction): void
	draw_circle(circle: GraphicCircleInstruction): void
	draw_ellipse(ellipse: GraphicEllipseInstruction): void
	draw_bitmap(field: GraphicFieldInstruction): void
	draw_custom_image(image: CustomImageInstruction): void
	draw_code128(barcode: Code128Instruction): void
	draw_code39(barcode: Code39Instruction): void
	draw_qr(barcode: QRCodeInstruction): void

	finalize(): Uint8Array
}
