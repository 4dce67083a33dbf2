// =============================================================================
// @jdxi-sysex/core - Public API
// Addressing, parameter registry, SysEx composer/parser, identity codec
// =============================================================================

// --- Errors ---
export {
  ok,
  err,
  SysExError,
  HeaderMismatchError,
  TruncatedMessageError,
  ChecksumMismatchError,
  UnknownParameterError,
  ValueOutOfRangeError,
  AddressResolutionError,
  BitWidthError,
  AddressOverflowError
} from './errors'
export type { Result, SysExErrorCode, ComposeError, ParseError } from './errors'

// --- Codec ---
export {
  split8BitToNibbles,
  joinNibblesTo8Bit,
  split16BitToNibbles,
  joinNibblesTo16Bit,
  split32BitToNibbles,
  joinNibblesTo32Bit,
  nibbleData,
  encodeRoland7Bit,
  decodeRoland7Bit,
  encode14BitTo7Bit,
  decode7BitTo14Bit,
  encodeParameterValue,
  decodeParameterValue
} from './codec/nibble'
export type { ParameterSize } from './codec/nibble'

// --- Addressing ---
export { Address, ZERO_OFFSET, addOffsets, linearOffset } from './address/Address'
export type { AddressComponent, AddressOffset } from './address/Address'
export {
  StartMSB,
  TemporaryToneUMB,
  SystemLMB,
  SuperNaturalLMB,
  ProgramLMB,
  DrumKitLMB,
  AREA_BASE_ADDRESSES,
  resolveArea,
  DRUM_KEYS,
  DRUM_PARTIAL_BASE_LMB,
  DRUM_PARTIAL_STRIDE,
  FIRST_DRUM_KEY,
  LAST_DRUM_KEY,
  drumKeyByLmb,
  drumKeyByNumber
} from './address/areas'
export type { AreaTag, ResolvedArea, DrumKey } from './address/areas'

// --- Parameter Registry ---
export { PARAMETER_FAMILIES, isParameterFamily } from './registry/types'
export type { BipolarCenter, ParameterDescriptor, ParameterFamily, PartialScheme, FamilyLayout } from './registry/types'
export { FAMILY_LAYOUTS, vendorToLinear, ProgramCommonOffsetCandidates } from './registry/layouts'
export { validateValue, convertToMidi, convertFromMidi, rawToDisplay, displayToRaw } from './registry/conversion'
export { ParameterTableError, loadParameterTable } from './registry/loader'
export { ParameterRegistry } from './registry/ParameterRegistry'
export { ParameterCatalog, createParameterCatalog } from './registry/ParameterCatalog'
export { getOffsetForPartial, getSectionOffset, resolveParameterAddress } from './registry/partials'
export { resolveSection } from './registry/sections'
export type { SectionMatch } from './registry/sections'

// --- SysEx ---
export * from './sysex/constants'
export { computeChecksum, validateChecksum, checkFrame, validateFrame, validateHeader } from './sysex/checksum'
export { SysExMessage, assertDeviceId } from './sysex/SysExMessage'
export type { DecodeOptions } from './sysex/SysExMessage'
export { SysExComposer, encodeToneName } from './sysex/composer'
export type { SysExComposerOptions } from './sysex/composer'
export { SysExParser, decodeToneName } from './sysex/parser'
export type { SysExParserOptions, ParsedToneData } from './sysex/parser'

// --- Identity ---
export {
  IDENTITY_REPLY_LENGTH,
  EXTENDED_IDENTITY_REPLY_LENGTH,
  createIdentityRequest,
  isIdentityReply,
  formatVersion,
  parseIdentityReply
} from './sysex/identity'
export type { IdentityInfo } from './sysex/identity'
