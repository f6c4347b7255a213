/*
 * Binding & Cell Flag System
 * --------------------------
 * Compact bit flags used in Binding.flags and Cell.flags so resolution can
 * branch on integers instead of comparing strings.
 *
 * Layout:
 *   Bit  0:    Scope (0 = singleton, 1 = prototype)
 *   Bit  1:    Binding has a configure phase
 *   Bit  2:    Cell holds a materialized instance
 *   Bit  3:    Binding is eager (constructed at registration)
 *   Bit  4:    Binding is a pre-built value
 */

/**
 * Scope flags (bit 0). Extract with `flags & SCOPE_MASK`.
 */
export const SCOPE_SINGLETON = 0b0;
export const SCOPE_PROTOTYPE = 0b1;
export const SCOPE_MASK = 0b1;

/** Binding carries a non-empty configure list. */
export const FLAG_HAS_CONFIGURE = 1 << 1;

/** Cell holds a materialized, committed instance. */
export const FLAG_HAS_INSTANCE = 1 << 2;

/** Binding is constructed as soon as it is registered. */
export const FLAG_EAGER = 1 << 3;

/** Binding was registered through registerValue(). */
export const FLAG_VALUE = 1 << 4;
