import 'mocha'
import { expect } from 'chai'

import { FontError } from '../error'
import { Backend } from './backend'
import { Engine, compile, substitute } from './engine'
import { FontRegistry } from './font'
import { Unit } from './units'
import {
	TextInstruction, GraphicBoxInstruction, GraphicCircleInstruction, GraphicEllipseInstruction,
	GraphicFieldInstruction, CustomImageInstruction, Code128Instruction, Code39Instruction, QRCodeInstruction,
} from './instructions'

class RecordingBackend implements Backend {
	readonly calls: [string, unknown][] = []
	fonts: FontRegistry | undefined = undefined

	constructor(readonly fail_on: string | undefined = undefined, readonly failure: Error = new FontError('missing font')) {}

	private record(name: string, payload: unknown) {
		if (name === this.fail_on)
			throw this.failure
		this.calls.push([name, payload])
	}

	setup_page(width: number, height: number, dpi: number) { this.record('setup_page', [width, height, dpi]) }
	setup_font_source(fonts: FontRegistry) {
		this.fonts = fonts
		this.record('setup_font_source', fonts.font_names())
	}

	draw_text(text: TextInstruction) { this.record('draw_text', text.text) }
	draw_box(box: GraphicBoxInstruction) { this.record('draw_box', [box.width, box.height]) }
	draw_circle(circle: GraphicCircleInstruction) { this.record('draw_circle', circle.diameter) }
	draw_ellipse(ellipse: GraphicEllipseInstruction) { this.record('draw_ellipse', [ellipse.width, ellipse.height]) }
	draw_bitmap(field: GraphicFieldInstruction) { this.record('draw_bitmap', Array.from(field.data)) }
	draw_custom_image(image: CustomImageInstruction) { this.record('draw_custom_image', image.data) }
	draw_code128(barcode: Code128Instruction) { this.record('draw_code128', barcode.data) }
	draw_code39(barcode: Code39Instruction) { this.record('draw_code39', barcode.data) }
	draw_qr(barcode: QRCodeInstruction) { this.record('draw_qr', barcode.data) }

	finalize() {
		return Uint8Array.from([this.calls.length])
	}
}

function create(source: string) {
	return Engine.create(source, Unit.millimeters(50), Unit.millimeters(25), 'Dpi203').unwrap()
}

describe('compile', () => {
	it('empty input', () => {
		for (const source of ['', ' \r\n\t'])
			expect(compile(source).match({ ok: () => '', err: e => e.type })).eql('EmptyInput')
	})

	it('parse errors', () => {
		const error = compile('^XA\n^A\n^XZ').match({ ok: () => undefined, err: e => e })
		expect(error === undefined ? undefined : [error.type, error.message])
			.eql(['ParseError', 'Parse error at line 2: expected character in ^A command'])
	})

	it('a label with nothing to draw', () => {
		expect(compile('^XA^XZ').unwrap()).eql([])
	})
})

describe('substitute', () => it('works', () => {
	expect(substitute('Hello {{name}}', { name: 'World' })).eql('Hello World')
	expect(substitute('{{a}}-{{b}}-{{a}}', { a: '1', b: '2' })).eql('1-2-1')
	expect(substitute('{{missing}} {{ name }}', { name: 'x' })).eql('{{missing}} {{ name }}')
	expect(substitute('{{toString}}', {})).eql('{{toString}}')
	expect(substitute('{{a}}', { a: '{{b}}', b: 'x' })).eql('{{b}}')
	expect(substitute('{{{a}}}', { a: 'x' })).eql('{x}')
}))

describe('Engine', () => {
	it('converts the page size', () => {
		const engine = create('^XA^XZ')
		expect([engine.width_dots, engine.height_dots]).eql([400, 200])

		const in_inches = Engine.create('^XA^XZ', Unit.inches(2), Unit.dots(100.9), 'Dpi300').unwrap()
		expect([in_inches.width_dots, in_inches.height_dots]).eql([610, 100])
	})

	it('passes compile errors through', () => {
		const type = Engine.create('', Unit.dots(10), Unit.dots(10), 'Dpi203').match({ ok: () => '', err: e => e.type })
		expect(type).eql('EmptyInput')
	})

	it('keeps its instructions frozen', () => {
		const engine = create('^XA^FDa^FS^XZ')
		expect(engine.instructions.length).eql(1)
		expect(Object.isFrozen(engine.instructions)).true
		expect(Object.isFrozen(engine.instructions[0])).true
	})

	it('renders every instruction in order', () => {
		const engine = create([
			'^XA',
			'^FO10,10^FDHello {{name}}^FS',
			'^FO20,20^GB30,40^FS',
			'^GC25^FS',
			'^GE10,5^FS',
			'^GFA,2,2,1,F0F0^FS',
			'^GIC1,1,QUJD^FS',
			'^BCN,50^FD{{sku}}^FS',
			'^B3N^FD{{sku}}-39^FS',
			'^BQN,2,4^FDQA,{{url}}^FS',
			'^XZ',
		].join('\n'))

		const backend = new RecordingBackend()
		const output = engine.render(backend, { name: 'World', sku: 'A1', url: 'test.invalid' }).unwrap()

		expect(backend.calls).eql([
			['setup_page', [400, 200, 203.2]],
			['setup_font_source', []],
			['draw_text', 'Hello World'],
			['draw_box', [30, 40]],
			['draw_circle', 25],
			['draw_ellipse', [10, 5]],
			['draw_bitmap', [0xF0, 0xF0]],
			['draw_custom_image', 'QUJD'],
			['draw_code128', 'A1'],
			['draw_code39', 'A1-39'],
			['draw_qr', 'QA,test.invalid'],
		])
		expect(Array.from(output)).eql([11])
	})

	it('leaves placeholders alone without variables', () => {
		const backend = new RecordingBackend()
		create('^XA^FDHello {{name}}^FS^XZ').render(backend).unwrap()
		expect(backend.calls[2]).eql(['draw_text', 'Hello {{name}}'])
	})

	it('renders with its font registry', () => {
		const bytes = Uint8Array.from([0x00, 0x01, 0x00, 0x00, 0, 0, 0, 0, 0, 0, 0, 0])
		const fonts = FontRegistry.empty().with_font('Sans', bytes, 'A', 'Z').unwrap()

		const engine = create('^XA^FDa^FS^XZ')
		const with_fonts = engine.with_fonts(fonts)
		expect(with_fonts).not.equal(engine)
		expect(with_fonts.instructions).equal(engine.instructions)

		const backend = new RecordingBackend()
		with_fonts.render(backend).unwrap()
		expect(backend.fonts).equal(fonts)
		expect(backend.calls[1]).eql(['setup_font_source', ['Sans']])

		const plain = new RecordingBackend()
		engine.render(plain).unwrap()
		expect(plain.calls[1]).eql(['setup_font_source', []])
	})

	it('returns backend failures', () => {
		const engine = create('^XA^FDa^FS^XZ')
		const result = engine.render(new RecordingBackend('draw_text'))
		expect(result.match({ ok: () => '', err: e => e.message })).eql('Font error: missing font')
	})

	it('rethrows anything that is not a label error', () => {
		const engine = create('^XA^FDa^FS^XZ')
		const backend = new RecordingBackend('draw_text', new TypeError('broken backend'))
		expect(() => engine.render(backend)).throw(TypeError, 'broken backend')
	})
})
