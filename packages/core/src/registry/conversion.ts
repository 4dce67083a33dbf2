import type { BipolarCenter, ParameterDescriptor } from './types'

/**
 * Clamp a raw value into the descriptor's range. Devices sometimes echo
 * bytes just outside the documented range.
 */
export function validateValue(descriptor: ParameterDescriptor, raw: number): number {
  return Math.min(descriptor.max, Math.max(descriptor.min, raw))
}

/**
 * Display value to raw MIDI value. The result is not clamped.
 */
export function convertToMidi(descriptor: ParameterDescriptor, display: number): number {
  return displayToRaw(descriptor.bipolar, display)
}

export function convertFromMidi(descriptor: ParameterDescriptor, raw: number): number {
  return rawToDisplay(descriptor.bipolar, raw)
}

export function rawToDisplay(bipolar: BipolarCenter | undefined, raw: number): number {
  if (!bipolar) return raw
  return (raw - bipolar.center) * bipolar.step / bipolar.divisor
}

export function displayToRaw(bipolar: BipolarCenter | undefined, display: number): number {
  if (!bipolar) return Math.round(display)
  return Math.round(display * bipolar.divisor / bipolar.step) + bipolar.center
}
