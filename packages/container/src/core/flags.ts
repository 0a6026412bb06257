/*
 * Registration Flag System
 * ------------------------
 * Compact bit flags used in Registration.flags for the hot resolution path.
 *
 * Memory layout (32-bit integer):
 *   Bits 0-1:  Lifetime (2 bits = 4 possible values)
 *   Bit  2:    Has realized singleton instance
 *   Bit  3:    Has no dependencies (fast-path construction)
 *   Bits 4-31: Reserved
 */

/**
 * Lifetime flags (bits 0-1). Extract with `flags & LIFETIME_MASK`.
 */
export const LIFETIME_SINGLETON = 0b00;
export const LIFETIME_SCOPED = 0b01;
export const LIFETIME_TRANSIENT = 0b10;

export const LIFETIME_MASK = 0b11;

/**
 * State flag: the singleton slot holds a value. Tracked separately from the
 * slot itself so `undefined` and `null` singletons are cached too.
 */
export const FLAG_HAS_INSTANCE = 1 << 2;

/**
 * State flag: constructor takes no parameters and no property is injected.
 */
export const FLAG_HAS_NO_DEPS = 1 << 3;
