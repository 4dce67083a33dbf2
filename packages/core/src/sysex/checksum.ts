/**
 * Roland checksum and frame validation.
 */

import { err, HeaderMismatchError, ok, TruncatedMessageError } from '../errors'
import type { Result } from '../errors'
import {
  JDXI_DEVICE_ID,
  JDXI_MODEL_ID,
  MessagePosition,
  MIN_FRAME_LENGTH,
  ROLAND_ID,
  SYSEX_END,
  SYSEX_START
} from './constants'

/**
 * `(128 - sum % 128) % 128` over address and data bytes, so that address,
 * data and checksum together sum to a multiple of 128.
 */
export function computeChecksum(addressAndData: readonly number[]): number {
  const sum = addressAndData.reduce((acc, byte) => acc + byte, 0)
  return (0x80 - (sum % 0x80)) % 0x80
}

export function validateChecksum(addressAndData: readonly number[], checksum: number): boolean {
  return computeChecksum(addressAndData) === checksum
}

/**
 * Start byte, end byte and minimum length, with the failing field.
 */
export function checkFrame(
  bytes: ArrayLike<number>,
  minimumLength = MIN_FRAME_LENGTH
): Result<true, HeaderMismatchError | TruncatedMessageError> {
  if (bytes.length < minimumLength) {
    return err(new TruncatedMessageError(bytes.length, minimumLength))
  }
  if (bytes[0] !== SYSEX_START) {
    return err(new HeaderMismatchError('start', SYSEX_START, bytes[0], 0))
  }
  const last = bytes.length - 1
  if (bytes[last] !== SYSEX_END) {
    return err(new HeaderMismatchError('end', SYSEX_END, bytes[last], last))
  }
  return ok(true)
}

/**
 * True when the buffer is framed as SysEx, whatever device it is for.
 */
export function validateFrame(bytes: ArrayLike<number>): boolean {
  return checkFrame(bytes).ok
}

/**
 * Manufacturer, device and model bytes.
 */
export function validateHeader(
  bytes: ArrayLike<number>,
  deviceId = JDXI_DEVICE_ID
): Result<true, HeaderMismatchError> {
  const expected: Array<[string, number, number]> = [
    ['manufacturer', ROLAND_ID, MessagePosition.ROLAND_ID],
    ['device', deviceId, MessagePosition.DEVICE_ID],
    ...JDXI_MODEL_ID.map((byte, i): [string, number, number] => ['model', byte, MessagePosition.MODEL_ID + i])
  ]
  for (const [field, value, position] of expected) {
    if (bytes[position] !== value) {
      return err(new HeaderMismatchError(field, value, bytes[position], position))
    }
  }
  return ok(true)
}
