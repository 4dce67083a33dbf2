import { encodeToneName, SysExComposer } from '../composer'
import { createParameterCatalog } from '../../registry/ParameterCatalog'
import { Address } from '../../address/Address'
import { AREA_BASE_ADDRESSES } from '../../address/areas'
import { AddressResolutionError, BitWidthError, UnknownParameterError, ValueOutOfRangeError } from '../../errors'
import type { ComposeError, Result } from '../../errors'
import type { SysExMessage } from '../SysExMessage'
import { SysExParser } from '../parser'

const catalog = createParameterCatalog()
const composer = new SysExComposer(catalog)

function bytesOf(result: Result<SysExMessage, ComposeError>): number[] {
  if (!result.ok) throw result.error
  return result.value.toBytes()
}

function hexOf(result: Result<SysExMessage, ComposeError>): string {
  if (!result.ok) throw result.error
  return result.value.toHexString()
}

describe('SysExComposer', () => {
  let warnSpy: jest.SpyInstance

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    warnSpy.mockRestore()
  })

  describe('device ID', () => {
    it('refuses a device ID that is not a 7-bit byte', () => {
      expect(() => new SysExComposer(catalog, { deviceId: 0x80 })).toThrow(BitWidthError)
      expect(() => new SysExComposer(catalog, { deviceId: 0xf7 })).toThrow(BitWidthError)
    })

    it('writes a custom device ID the parser accepts', () => {
      const custom = new SysExComposer(catalog, { deviceId: 0x11 })
      const bytes = bytesOf(custom.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'AMP_LEVEL', 100))
      expect(bytes[2]).toBe(0x11)

      const result = new SysExParser(catalog, { deviceId: 0x11 }).parse(bytes)
      expect(result.ok && result.value.values).toEqual({ AMP_LEVEL: 100 })
    })
  })

  describe('composeData', () => {
    it('frames raw data at an address', () => {
      const message = composer.composeData(new Address(0x19, 0x40, 0x00, 0x15), [0x64])
      expect(message.toHexString()).toBe('F0 41 10 00 00 00 0E 12 19 40 00 15 64 2E F7')
    })
  })

  describe('compose', () => {
    it('writes an analog parameter at its registry address', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'AMP_LEVEL', 100)
      expect(hexOf(result)).toBe('F0 41 10 00 00 00 0E 12 19 42 00 2A 64 17 F7')
    })

    it('converts bipolar display values', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'LFO_PITCH_DEPTH', -63)
      expect(bytesOf(result).slice(8, 13)).toEqual([0x19, 0x42, 0x00, 0x12, 0x01])
    })

    it('writes four-byte parameters as nibbles', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Program, 'Effect1', 'EFX1_PARAM_1', 1000)
      expect(hexOf(result)).toBe('F0 41 10 00 00 00 0E 12 18 00 02 11 08 03 0E 08 34 F7')
    })

    it('continues effect parameters on the next LMB', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Program, 'Effect1', 'EFX1_PARAM_32', 0)
      expect(bytesOf(result).slice(8, 16)).toEqual([0x18, 0x00, 0x03, 0x0d, 0x08, 0x00, 0x00, 0x00])
    })

    it('scales master tune by its divisor', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.System, 'SystemCommon', 'MASTER_TUNE', -100)
      expect(bytesOf(result).slice(8, 16)).toEqual([0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x01, 0x08])
    })

    it('addresses digital partials', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.DigitalSynth2, 'DigitalPartial', 'OSC_PITCH', 5, 2)
      expect(bytesOf(result).slice(8, 13)).toEqual([0x19, 0x21, 0x21, 0x03, 69])
    })

    it('addresses drum partials by key', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Drum, 'DrumPartial', 'PARTIAL_LEVEL', 90, 38)
      expect(bytesOf(result).slice(8, 13)).toEqual([0x19, 0x70, 0x32, 0x0e, 90])
    })

    it('writes the configured device ID', () => {
      const other = new SysExComposer(catalog, { deviceId: 0x11 })
      const result = other.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'AMP_LEVEL', 1)
      expect(bytesOf(result)[2]).toBe(0x11)
    })
  })

  describe('value handling', () => {
    it('clamps overshooting values and warns', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'AMP_LEVEL', 200)
      expect(bytesOf(result)[12]).toBe(0x7f)
      expect(warnSpy).toHaveBeenCalledWith('SysExComposer: AMP_LEVEL value 200 clamped to 127')
    })

    it('clamps bipolar values on the display scale', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'LFO_PITCH_DEPTH', 100)
      expect(bytesOf(result)[12]).toBe(127)
      expect(warnSpy).toHaveBeenCalledWith('SysExComposer: LFO_PITCH_DEPTH value 100 clamped to 63')
    })

    it('does not warn for in-range values', () => {
      composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'AMP_LEVEL', 127)
      expect(warnSpy).not.toHaveBeenCalled()
    })

    it('rejects negative values for unsigned parameters', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'AMP_LEVEL', -1)
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValueOutOfRangeError)
        expect(result.error).toMatchObject({ parameter: 'AMP_LEVEL', value: -1, displayMin: 0, displayMax: 127 })
      }
    })

    it('rejects values that are not finite', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'LFO_PITCH_DEPTH', Number.NaN)
      expect(!result.ok && result.error).toBeInstanceOf(ValueOutOfRangeError)
    })
  })

  describe('errors', () => {
    it('rejects unknown parameter names', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'NOT_A_PARAMETER', 1)
      expect(!result.ok && result.error).toBeInstanceOf(UnknownParameterError)
    })

    it('rejects descriptors from another catalog', () => {
      const foreign = createParameterCatalog().getByName('Analog', 'AMP_LEVEL')
      if (!foreign) throw new Error('Missing AMP_LEVEL')
      const result = composer.compose(AREA_BASE_ADDRESSES.Analog, foreign, 1)
      expect(!result.ok && result.error).toBeInstanceOf(UnknownParameterError)
    })

    it('rejects a family the base address cannot reach', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.DigitalSynth1, 'Analog', 'AMP_LEVEL', 1)
      expect(!result.ok && result.error).toBeInstanceOf(UnknownParameterError)
      expect(!result.ok && result.error.message).toBe('Analog is not reachable from address 19 01 00 00')
    })

    it('requires a partial for partial families', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.DigitalSynth1, 'DigitalPartial', 'OSC_PITCH', 0)
      expect(!result.ok && result.error).toBeInstanceOf(AddressResolutionError)
    })

    it('rejects a partial for single-section families', () => {
      const result = composer.composeByName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'AMP_LEVEL', 1, 1)
      expect(!result.ok && result.error).toBeInstanceOf(AddressResolutionError)
    })

    it('reports offsets that overflow the address', () => {
      const result = composer.composeByName(new Address(0x19, 0x42, 0x00, 0x60), 'Analog', 'AMP_LEVEL', 1)
      expect(!result.ok && result.error).toBeInstanceOf(AddressResolutionError)
      expect(!result.ok && result.error).toMatchObject({ family: 'Analog' })
    })
  })

  describe('composeToneName', () => {
    it('writes a padded name at the section start', () => {
      const result = composer.composeToneName(AREA_BASE_ADDRESSES.Analog, 'Analog', 'Bass 1')
      expect(bytesOf(result).slice(8, 24)).toEqual([
        0x19, 0x42, 0x00, 0x00,
        0x42, 0x61, 0x73, 0x73, 0x20, 0x31, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20
      ])
    })

    it('names a drum partial by key', () => {
      const result = composer.composeToneName(AREA_BASE_ADDRESSES.Drum, 'DrumPartial', 'Kick', 36)
      expect(bytesOf(result).slice(8, 12)).toEqual([0x19, 0x70, 0x2e, 0x00])
    })

    it('rejects families without a name field', () => {
      const result = composer.composeToneName(AREA_BASE_ADDRESSES.Program, 'Delay', 'Echo')
      expect(!result.ok && result.error).toBeInstanceOf(UnknownParameterError)
    })
  })

  describe('composeRequest', () => {
    it('requests a whole section', () => {
      const result = composer.composeRequest(AREA_BASE_ADDRESSES.Analog, 'Analog')
      expect(hexOf(result)).toBe('F0 41 10 00 00 00 0E 11 19 42 00 00 00 00 00 40 65 F7')
    })

    it('sizes long sections across LMBs', () => {
      const drum = composer.composeRequest(AREA_BASE_ADDRESSES.Drum, 'DrumPartial', 36)
      expect(bytesOf(drum).slice(8, 16)).toEqual([0x19, 0x70, 0x2e, 0x00, 0x00, 0x00, 0x01, 0x43])

      const effect = composer.composeRequest(AREA_BASE_ADDRESSES.Program, 'Effect1')
      expect(bytesOf(effect).slice(8, 16)).toEqual([0x18, 0x00, 0x02, 0x00, 0x00, 0x00, 0x01, 0x11])
    })
  })
})

describe('encodeToneName', () => {
  it('pads and truncates to twelve characters', () => {
    expect(encodeToneName('')).toEqual(Array(12).fill(0x20))
    expect(encodeToneName('ABCDEFGHIJKLMNOP')).toEqual([...'ABCDEFGHIJKL'].map(c => c.charCodeAt(0)))
  })

  it('gives one space to a character outside the basic plane', () => {
    expect(encodeToneName('A\u{1F600}BCDEFGHIJK')).toEqual([0x41, 0x20, ...[...'BCDEFGHIJK'].map(c => c.charCodeAt(0))])
  })

  it('replaces characters outside printable ASCII', () => {
    expect(encodeToneName('Café\t')).toEqual([0x43, 0x61, 0x66, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20, 0x20])
  })
})
