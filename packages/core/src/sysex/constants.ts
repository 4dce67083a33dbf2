/**
 * Roland SysEx framing constants for the JD-Xi.
 */

export const SYSEX_START = 0xf0
export const SYSEX_END = 0xf7

export const ROLAND_ID = 0x41
export const JDXI_DEVICE_ID = 0x10
export const JDXI_MODEL_ID: readonly number[] = Object.freeze([0x00, 0x00, 0x00, 0x0e])

export const CommandId = {
  /** Data Request 1 */
  RQ1: 0x11,
  /** Data Set 1 */
  DT1: 0x12
} as const

export type CommandIdValue = typeof CommandId[keyof typeof CommandId]

/** Byte positions inside a DT1/RQ1 frame. */
export const MessagePosition = {
  START: 0,
  ROLAND_ID: 1,
  DEVICE_ID: 2,
  MODEL_ID: 3,
  COMMAND: 7,
  ADDRESS: 8,
  DATA: 12
} as const

/** F0, Roland ID, device, model(4), command, address(4) */
export const HEADER_LENGTH = 12

/** Header plus checksum and end byte, with no data */
export const MIN_FRAME_LENGTH = HEADER_LENGTH + 2

export const TONE_NAME_LENGTH = 12

// =============================================================================
// Universal Non-Realtime Identity
// =============================================================================

export const UNIVERSAL_NON_REALTIME = 0x7e
export const BROADCAST_DEVICE_ID = 0x7f
export const GENERAL_INFORMATION = 0x06
export const IDENTITY_REQUEST = 0x01
export const IDENTITY_REPLY = 0x02

/** Device family code in a standard identity reply */
export const JDXI_FAMILY_CODE: readonly number[] = Object.freeze([0x0e, 0x03])
