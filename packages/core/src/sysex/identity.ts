/**
 * Universal Non-Realtime Identity Request / Reply.
 */

import { err, HeaderMismatchError, ok, TruncatedMessageError } from '../errors'
import type { Result } from '../errors'
import {
  BROADCAST_DEVICE_ID,
  GENERAL_INFORMATION,
  IDENTITY_REPLY,
  IDENTITY_REQUEST,
  JDXI_DEVICE_ID,
  JDXI_FAMILY_CODE,
  JDXI_MODEL_ID,
  ROLAND_ID,
  SYSEX_END,
  SYSEX_START,
  UNIVERSAL_NON_REALTIME
} from './constants'

/** `F0 7E dev 06 02 41 fam(2) num(2) rev(4) F7` */
export const IDENTITY_REPLY_LENGTH = 15

/** `F0 7E dev 06 02 41 10 00 00 00 0E rev(4) F7` */
export const EXTENDED_IDENTITY_REPLY_LENGTH = 16

export interface IdentityInfo {
  readonly deviceId: number
  readonly manufacturerId: number
  /** Family code; empty for the extended reply, which carries a model instead */
  readonly family: readonly number[]
  /** Family number (2 bytes) or model ID (4 bytes) */
  readonly model: readonly number[]
  readonly revision: readonly number[]
  readonly isRoland: boolean
  readonly isJdxi: boolean
  /** e.g. `v1.00` */
  readonly versionString: string
}

/**
 * `F0 7E dev 06 01 F7`. The default device ID addresses every device.
 */
export function createIdentityRequest(deviceId = BROADCAST_DEVICE_ID): number[] {
  return [SYSEX_START, UNIVERSAL_NON_REALTIME, deviceId, GENERAL_INFORMATION, IDENTITY_REQUEST, SYSEX_END]
}

/**
 * Cheap check used to route inbound SysEx before a full parse.
 */
export function isIdentityReply(bytes: ArrayLike<number>): boolean {
  return bytes.length >= 5 &&
    bytes[0] === SYSEX_START &&
    bytes[1] === UNIVERSAL_NON_REALTIME &&
    bytes[3] === GENERAL_INFORMATION &&
    bytes[4] === IDENTITY_REPLY
}

/**
 * `v{major}.{minor}` from the revision bytes. Leading zero bytes are dropped
 * while more than two remain.
 */
export function formatVersion(revision: readonly number[]): string {
  let digits = [...revision]
  while (digits.length > 2 && digits[0] === 0) digits = digits.slice(1)
  const [major = 0, minor = 0] = digits
  return `v${major}.${String(minor).padStart(2, '0')}`
}

export function parseIdentityReply(
  bytes: ArrayLike<number>
): Result<IdentityInfo, HeaderMismatchError | TruncatedMessageError> {
  if (bytes.length < IDENTITY_REPLY_LENGTH) {
    return err(new TruncatedMessageError(bytes.length, IDENTITY_REPLY_LENGTH))
  }

  const header: Array<[string, number, number]> = [
    ['start', SYSEX_START, 0],
    ['universal', UNIVERSAL_NON_REALTIME, 1],
    ['subId1', GENERAL_INFORMATION, 3],
    ['subId2', IDENTITY_REPLY, 4]
  ]
  for (const [field, value, position] of header) {
    if (bytes[position] !== value) {
      return err(new HeaderMismatchError(field, value, bytes[position], position))
    }
  }

  const last = bytes.length - 1
  if (bytes[last] !== SYSEX_END) {
    return err(new HeaderMismatchError('end', SYSEX_END, bytes[last], last))
  }
  if (bytes.length !== IDENTITY_REPLY_LENGTH && bytes.length !== EXTENDED_IDENTITY_REPLY_LENGTH) {
    return err(new HeaderMismatchError('length', IDENTITY_REPLY_LENGTH, bytes.length, last))
  }

  const all = Array.from(bytes)
  const manufacturerId = all[5]
  const isRoland = manufacturerId === ROLAND_ID
  const extended = bytes.length === EXTENDED_IDENTITY_REPLY_LENGTH

  const family = extended ? [] : all.slice(6, 8)
  const model = extended ? all.slice(7, 11) : all.slice(8, 10)
  const revision = extended ? all.slice(11, 15) : all.slice(10, 14)

  const isJdxi = isRoland && (extended
    ? all[6] === JDXI_DEVICE_ID && sameBytes(model, JDXI_MODEL_ID)
    : sameBytes(family, JDXI_FAMILY_CODE))

  return ok({
    deviceId: all[2],
    manufacturerId,
    family,
    model,
    revision,
    isRoland,
    isJdxi,
    versionString: formatVersion(revision)
  })
}

function sameBytes(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i])
}
