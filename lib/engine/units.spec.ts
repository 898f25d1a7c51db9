import 'mocha'
import { expect } from 'chai'

import { Resolution, Unit } from './units'

describe('Resolution', () => it('works', () => {
	expect(Resolution.dpmm('Dpi152')).eql(6)
	expect(Resolution.dpmm('Dpi203')).eql(8)
	expect(Resolution.dpmm('Dpi300')).eql(12)
	expect(Resolution.dpmm('Dpi600')).eql(24)
	expect(Resolution.dpmm(Resolution.custom(254))).closeTo(10, 1e-9)

	expect(Resolution.dpi('Dpi203')).eql(203.2)
	expect(Resolution.dpi('Dpi600')).eql(609.6)
	expect(Resolution.dpi(Resolution.custom(96))).eql(96)
}))

describe('Unit.to_dots', () => {
	it('converts', () => {
		expect(Unit.to_dots(Unit.inches(4), 'Dpi203')).eql(813)
		expect(Unit.to_dots(Unit.inches(6), 'Dpi203')).eql(1219)
		expect(Unit.to_dots(Unit.millimeters(10), 'Dpi203')).eql(80)
		expect(Unit.to_dots(Unit.centimeters(2.5), 'Dpi203')).eql(200)
		expect(Unit.to_dots(Unit.millimeters(100), 'Dpi300')).eql(1200)
		expect(Unit.to_dots(Unit.dots(812), 'Dpi600')).eql(812)
	})

	it('clamps negatives to zero', () => {
		expect(Unit.to_dots(Unit.inches(-2), 'Dpi203')).eql(0)
		expect(Unit.to_dots(Unit.millimeters(-0.5), 'Dpi300')).eql(0)
		expect(Unit.to_dots(Unit.dots(-4), 'Dpi203')).eql(0)
	})
})
