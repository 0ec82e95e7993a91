/**
 * Ledger error types
 *
 * All errors are tagged using Effect's Data.TaggedError pattern
 * for exhaustive error handling and pattern matching
 *
 * @since 0.1.0
 */

import { Data, Match } from "effect";

// ============================================================================
// BLOCK-LEVEL REJECTIONS
// ============================================================================

/**
 * The candidate does not point at its predecessor's hash
 *
 * @category Error
 * @since 0.1.0
 */
export class BrokenLink extends Data.TaggedError("BrokenLink")<{
  readonly blockId: number;
  readonly expected: string;
  readonly actual: string;
}> {}

/**
 * The candidate's hash does not carry enough leading zero bits
 *
 * @category Error
 * @since 0.1.0
 */
export class InsufficientWork extends Data.TaggedError("InsufficientWork")<{
  readonly blockId: number;
  readonly hash: string;
  readonly requiredBits: number;
}> {}

/**
 * The candidate is not numbered directly after its predecessor
 *
 * @category Error
 * @since 0.1.0
 */
export class OutOfSequence extends Data.TaggedError("OutOfSequence")<{
  readonly blockId: number;
  readonly expected: number;
}> {}

/**
 * The claimed hash is not the digest of the claimed contents
 *
 * @category Error
 * @since 0.1.0
 */
export class HashMismatch extends Data.TaggedError("HashMismatch")<{
  readonly blockId: number;
  readonly claimed: string;
  readonly computed: string;
}> {}

/**
 * A hash field is not decodable hex text
 *
 * @category Error
 * @since 0.1.0
 */
export class InvalidEncoding extends Data.TaggedError("InvalidEncoding")<{
  readonly value: string;
  readonly reason: string;
}> {}

export type BlockRejection =
  | BrokenLink
  | InsufficientWork
  | OutOfSequence
  | HashMismatch
  | InvalidEncoding;

// ============================================================================
// CHAIN-LEVEL ERRORS
// ============================================================================

/**
 * A block inside a sequence failed validation against its predecessor
 *
 * @category Error
 * @since 0.1.0
 */
export class InvalidChain extends Data.TaggedError("InvalidChain")<{
  readonly index: number;
  readonly rejection: BlockRejection;
}> {}

/**
 * Both the local and the remote chain failed validation during fork
 * selection. The adoption is refused; the node keeps its state.
 *
 * @category Error
 * @since 0.1.0
 */
export class NoValidChain extends Data.TaggedError("NoValidChain")<{
  readonly local: InvalidChain;
  readonly remote: InvalidChain;
}> {}

// ============================================================================
// NODE ERRORS
// ============================================================================

/**
 * Node identity could not be generated
 *
 * @category Error
 * @since 0.1.0
 */
export class IdentityError extends Data.TaggedError("IdentityError")<{
  readonly reason: string;
  readonly cause?: unknown;
}> {}

/**
 * Operator input did not match any command
 *
 * @category Error
 * @since 0.1.0
 */
export class UnknownCommand extends Data.TaggedError("UnknownCommand")<{
  readonly input: string;
}> {}

/**
 * One-line diagnostic for a block rejection
 *
 * @category Display
 * @since 0.1.0
 */
export const describeRejection = Match.typeTags<BlockRejection>()({
  BrokenLink: (e) =>
    `block with id: ${e.blockId} has wrong previous hash (expected ${e.expected}, got ${e.actual})`,
  InsufficientWork: (e) =>
    `block with id: ${e.blockId} has invalid difficulty (needs ${e.requiredBits} leading zero bits)`,
  OutOfSequence: (e) =>
    `block with id: ${e.blockId} is not the next block after the latest (expected id ${e.expected})`,
  HashMismatch: (e) =>
    `block with id: ${e.blockId} has invalid hash (computed ${e.computed})`,
  InvalidEncoding: (e) => `hash "${e.value}" is not valid hex: ${e.reason}`,
});
