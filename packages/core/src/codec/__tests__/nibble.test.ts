import {
  decode7BitTo14Bit,
  decodeParameterValue,
  decodeRoland7Bit,
  encode14BitTo7Bit,
  encodeParameterValue,
  encodeRoland7Bit,
  joinNibblesTo16Bit,
  joinNibblesTo32Bit,
  joinNibblesTo8Bit,
  nibbleData,
  split16BitToNibbles,
  split32BitToNibbles,
  split8BitToNibbles
} from '../nibble'
import { BitWidthError } from '../../errors'

describe('nibble codec', () => {
  describe('8-bit', () => {
    it('splits into high and low nibble', () => {
      expect(split8BitToNibbles(0xab)).toEqual([0x0a, 0x0b])
      expect(joinNibblesTo8Bit([0x0a, 0x0b])).toBe(0xab)
    })

    it('joins back every byte', () => {
      for (let value = 0; value <= 0xff; value++) {
        expect(joinNibblesTo8Bit(split8BitToNibbles(value))).toBe(value)
      }
    })

    it('rejects values wider than 8 bits', () => {
      expect(() => split8BitToNibbles(0x100)).toThrow(BitWidthError)
    })
  })

  describe('16-bit', () => {
    it('splits MSB first', () => {
      expect(split16BitToNibbles(0x1234)).toEqual([1, 2, 3, 4])
      expect(split16BitToNibbles(32768)).toEqual([8, 0, 0, 0])
    })

    it('joins back every 16-bit value', () => {
      const mismatches: number[] = []
      for (let value = 0; value <= 0xffff; value++) {
        if (joinNibblesTo16Bit(split16BitToNibbles(value)) !== value) mismatches.push(value)
      }
      expect(mismatches).toEqual([])
    })

    it('rejects out of range input', () => {
      expect(() => split16BitToNibbles(0x10000)).toThrow(BitWidthError)
      expect(() => split16BitToNibbles(-1)).toThrow(BitWidthError)
      expect(() => split16BitToNibbles(1.5)).toThrow(BitWidthError)
      expect(() => joinNibblesTo16Bit([1, 2, 3, 16])).toThrow(BitWidthError)
      expect(() => joinNibblesTo16Bit([1, 2, 3])).toThrow(RangeError)
    })
  })

  describe('32-bit', () => {
    it('splits into eight nibbles', () => {
      expect(split32BitToNibbles(0x12345678)).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
    })

    it('handles the full unsigned range', () => {
      expect(split32BitToNibbles(0xffffffff)).toEqual(Array(8).fill(15))
      expect(joinNibblesTo32Bit(Array(8).fill(15))).toBe(0xffffffff)
    })
  })

  describe('nibbleData', () => {
    it('splits only bytes above 0x7F', () => {
      expect(nibbleData([0x10, 0x80, 0xff, 0x7f])).toEqual([0x10, 0x08, 0x00, 0x0f, 0x0f, 0x7f])
    })
  })

  describe('Roland 7-bit groups', () => {
    it('encodes 28-bit sizes', () => {
      expect(encodeRoland7Bit(194)).toEqual([0x00, 0x00, 0x01, 0x42])
      expect(encodeRoland7Bit(2 ** 28 - 1)).toEqual([0x7f, 0x7f, 0x7f, 0x7f])
    })

    it('decodes back', () => {
      for (const value of [0, 127, 128, 194, 0x1fffff, 2 ** 28 - 1]) {
        expect(decodeRoland7Bit(encodeRoland7Bit(value))).toBe(value)
      }
    })

    it('never wraps', () => {
      expect(() => encodeRoland7Bit(2 ** 28)).toThrow(BitWidthError)
      expect(() => decodeRoland7Bit([0, 0, 0x80, 0])).toThrow(BitWidthError)
    })
  })

  describe('14-bit', () => {
    it('splits into two 7-bit bytes', () => {
      expect(encode14BitTo7Bit(8192)).toEqual([0x40, 0x00])
      expect(encode14BitTo7Bit(0x3fff)).toEqual([0x7f, 0x7f])
      expect(decode7BitTo14Bit(0x40, 0x00)).toBe(8192)
    })

    it('decodes back every 14-bit value', () => {
      const mismatches: number[] = []
      for (let value = 0; value <= 0x3fff; value++) {
        const [msb, lsb] = encode14BitTo7Bit(value)
        if (decode7BitTo14Bit(msb, lsb) !== value) mismatches.push(value)
      }
      expect(mismatches).toEqual([])
    })

    it('rejects 15-bit input', () => {
      expect(() => encode14BitTo7Bit(0x4000)).toThrow(BitWidthError)
    })
  })

  describe('parameter payloads', () => {
    it('sends one-byte values as they are', () => {
      expect(encodeParameterValue(100, 1)).toEqual([100])
      expect(decodeParameterValue([100])).toBe(100)
    })

    it('sends four-byte values as 16-bit nibbles', () => {
      expect(encodeParameterValue(33768, 4)).toEqual([0x08, 0x03, 0x0e, 0x08])
      expect(decodeParameterValue([0x08, 0x03, 0x0e, 0x08])).toBe(33768)
    })

    it('rejects other payload lengths', () => {
      expect(() => decodeParameterValue([1, 2])).toThrow(RangeError)
    })
  })
})
