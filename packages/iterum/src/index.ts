/**
 * iterum - lazy, composable iteration
 *
 * Pull-based sequences that answer every pull with an `Option`, a suite of
 * lazy combinators, and eager terminal operations.
 *
 * ## Quick Start
 *
 * ```ts
 * import { iterum, range, Some, nil } from "iterum";
 *
 * range(0, 5)
 *   .map((x) => x * x + 1)
 *   .filter((x) => x % 2 === 1)
 *   .collect(); // [1, 5, 17]
 *
 * const words = iterum(["a", "bb", "ccc"]);
 * words.nextBack(); // Some("ccc")
 * words.len();      // 2
 * ```
 *
 * ## Configuration
 *
 * ```json
 * // .iterumrc.json
 * { "debug": true }
 * ```
 *
 * @module
 */

// ============================================================================
// Configuration and logging
// ============================================================================

export * from "@iterum/core";

// ============================================================================
// Option and Ordering
// ============================================================================

export * from "@iterum/option";

// ============================================================================
// Sequences
// ============================================================================

export * from "@iterum/iter";
