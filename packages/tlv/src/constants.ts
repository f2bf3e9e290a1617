/**
 * Wire constants for BigSize integers and TLV records.
 */

/** Largest value representable by a TLV type or BigSize integer */
export const MAX_U64 = 0xffff_ffff_ffff_ffffn

/** BigSize prefix bytes for the wider forms */
export const BigSizePrefix = {
  U16: 0xfd,
  U32: 0xfe,
  U64: 0xff,
} as const

/** Smallest value each wider BigSize form may carry (anything less is non-minimal) */
export const BigSizeMinimum = {
  U16: 0xfdn,
  U32: 0x1_0000n,
  U64: 0x1_0000_0000n,
} as const

/**
 * Default upper bound on a single length-prefixed value.
 * Matches the largest payload a transport frame can carry.
 */
export const DEFAULT_MAX_RECORD_LENGTH = 0xffff
