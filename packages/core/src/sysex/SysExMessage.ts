import { Address } from '../address/Address'
import { encodeRoland7Bit } from '../codec/nibble'
import { BitWidthError, ChecksumMismatchError, err, HeaderMismatchError, ok } from '../errors'
import type { ParseError, Result } from '../errors'
import { checkFrame, computeChecksum, validateHeader } from './checksum'
import {
  CommandId,
  HEADER_LENGTH,
  JDXI_DEVICE_ID,
  JDXI_MODEL_ID,
  MessagePosition,
  ROLAND_ID,
  SYSEX_END,
  SYSEX_START
} from './constants'
import type { CommandIdValue } from './constants'

export interface DecodeOptions {
  /** Expected device ID (default 0x10) */
  deviceId?: number
  /** Reject frames whose checksum does not match (default true) */
  verifyChecksum?: boolean
}

function isCommand(value: number): value is CommandIdValue {
  return value === CommandId.DT1 || value === CommandId.RQ1
}

function assert7Bit(byte: number): void {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0x7f) throw new BitWidthError(byte, 7)
}

function assertDataBytes(data: readonly number[]): void {
  for (const byte of data) assert7Bit(byte)
}

/**
 * Device IDs sit inside the header and must be 7-bit data bytes.
 *
 * @throws BitWidthError outside 0x00..0x7F
 */
export function assertDeviceId(deviceId: number): number {
  assert7Bit(deviceId)
  return deviceId
}

/**
 * One Roland DT1 or RQ1 frame:
 * `F0 41 dev 00 00 00 0E cmd addr(4) data... checksum F7`.
 *
 * For RQ1 the data is the 4-byte size of the requested block.
 */
export class SysExMessage {
  readonly data: readonly number[]
  readonly checksum: number

  private constructor(
    readonly command: CommandIdValue,
    readonly address: Address,
    data: readonly number[],
    readonly deviceId: number
  ) {
    assertDeviceId(deviceId)
    assertDataBytes(data)
    this.data = Object.freeze([...data])
    this.checksum = computeChecksum([...address.toBytes(), ...data])
    Object.freeze(this)
  }

  /**
   * Data Set: write `data` starting at `address`.
   */
  static dt1(address: Address, data: readonly number[], deviceId = JDXI_DEVICE_ID): SysExMessage {
    return new SysExMessage(CommandId.DT1, address, data, deviceId)
  }

  /**
   * Data Request: ask for `size` bytes (a linear count) from `address`.
   */
  static rq1(address: Address, size: number, deviceId = JDXI_DEVICE_ID): SysExMessage {
    return new SysExMessage(CommandId.RQ1, address, encodeRoland7Bit(size), deviceId)
  }

  /**
   * Decode a complete frame. Nothing is returned for a frame that fails any
   * check.
   */
  static fromBytes(bytes: ArrayLike<number>, options: DecodeOptions = {}): Result<SysExMessage, ParseError> {
    const deviceId = options.deviceId ?? JDXI_DEVICE_ID

    const frame = checkFrame(bytes)
    if (!frame.ok) return frame
    const header = validateHeader(bytes, deviceId)
    if (!header.ok) return header

    const command = bytes[MessagePosition.COMMAND]
    if (!isCommand(command)) {
      return err(new HeaderMismatchError('command', CommandId.DT1, command, MessagePosition.COMMAND))
    }

    const body = Array.from(bytes).slice(1, -1)
    const wide = body.findIndex(byte => byte > 0x7f)
    if (wide !== -1) {
      return err(new HeaderMismatchError('data', 0x7f, body[wide], wide + 1))
    }

    const address = Address.fromBytes(bytes, MessagePosition.ADDRESS)
    const data = Array.from(bytes).slice(HEADER_LENGTH, -2)
    const message = new SysExMessage(command, address, data, deviceId)

    const received = bytes[bytes.length - 2]
    if ((options.verifyChecksum ?? true) && received !== message.checksum) {
      return err(new ChecksumMismatchError(message.checksum, received))
    }
    return ok(message)
  }

  get isDataSet(): boolean {
    return this.command === CommandId.DT1
  }

  toBytes(): number[] {
    return [
      SYSEX_START,
      ROLAND_ID,
      this.deviceId,
      ...JDXI_MODEL_ID,
      this.command,
      ...this.address.toBytes(),
      ...this.data,
      this.checksum,
      SYSEX_END
    ]
  }

  /** Upper-case bytes separated by spaces, e.g. `F0 41 10 ...`. */
  toHexString(): string {
    return this.toBytes()
      .map(byte => byte.toString(16).toUpperCase().padStart(2, '0'))
      .join(' ')
  }
}
