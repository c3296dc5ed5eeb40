/** Maximum re-roll attempts on a single die before evaluation fails. */
export const MAX_REROLLS = 100;

/** Maximum explosions on a single die before evaluation fails. */
export const MAX_EXPLOSIONS = 100;

/** Largest dice count accepted by the parser for a single roll. */
export const MAX_DICE_COUNT = 10_000;

/** Integers saturate here instead of overflowing (unsigned 32-bit maximum). */
export const MAX_INTEGER_LITERAL = 4_294_967_295;
