import { SysExComposer } from '../composer'
import { SysExParser } from '../parser'
import { createParameterCatalog } from '../../registry/ParameterCatalog'
import { convertFromMidi } from '../../registry/conversion'
import { FAMILY_LAYOUTS } from '../../registry/layouts'
import { PARAMETER_FAMILIES } from '../../registry/types'
import type { ParameterDescriptor, PartialScheme } from '../../registry/types'
import { AREA_BASE_ADDRESSES } from '../../address/areas'

const catalog = createParameterCatalog()
const composer = new SysExComposer(catalog)
const parser = new SysExParser(catalog)

/** Last partial of each scheme, so drum writes reach the highest LMBs */
const LAST_PARTIAL: Record<PartialScheme, number | undefined> = {
  none: undefined,
  digital: 3,
  drum: 72,
  programPart: 4,
  programZone: 4
}

/** Every raw value, or about 256 of them for wide ranges */
function rawSamples(descriptor: ParameterDescriptor): number[] {
  const step = Math.max(1, Math.ceil((descriptor.max - descriptor.min) / 256))
  const samples: number[] = []
  for (let raw = descriptor.min; raw < descriptor.max; raw += step) samples.push(raw)
  samples.push(descriptor.max)
  return samples
}

describe('compose then parse', () => {
  it.each([...PARAMETER_FAMILIES])('returns every representable %s value', family => {
    const layout = FAMILY_LAYOUTS[family]
    const base = AREA_BASE_ADDRESSES[layout.areas[0]]
    const partial = LAST_PARTIAL[layout.partials]

    for (const descriptor of catalog.get(family)?.list() ?? []) {
      for (const raw of rawSamples(descriptor)) {
        const display = convertFromMidi(descriptor, raw)
        const message = composer.compose(base, descriptor, display, partial)
        if (!message.ok) throw message.error

        const result = parser.parse(message.value.toBytes())
        if (!result.ok) throw result.error

        expect(result.value.family).toBe(family)
        expect(result.value.values[descriptor.name]).toBe(display)
      }
    }
  })

  it('answers partial selectors with the same partial', () => {
    const osc = catalog.getByName('DigitalPartial', 'OSC_WAVE')
    if (!osc) throw new Error('Missing OSC_WAVE')

    for (const partial of [1, 2, 3]) {
      const message = composer.compose(AREA_BASE_ADDRESSES.DigitalSynth1, osc, 2, partial)
      if (!message.ok) throw message.error
      const result = parser.parse(message.value.toBytes())
      expect(result.ok && result.value.partial).toBe(partial)
    }
  })
})
