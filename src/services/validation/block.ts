/**
 * Block Validator — checks a single candidate against its claimed
 * predecessor.
 *
 * @module BlockValidator
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect";
import * as Either from "effect/Either";
import type * as Block from "../../entities/block";
import {
  BrokenLink,
  HashMismatch,
  InsufficientWork,
  OutOfSequence,
  type BlockRejection,
} from "../../entities/errors";
import { DIFFICULTY_BITS, HashingService } from "../hash";

/**
 * @category Services
 * @since 0.1.0
 */
export class BlockValidator extends Context.Tag("@ledger/BlockValidator")<
  BlockValidator,
  {
    /**
     * Run every check in priority order; the first failure is returned.
     *
     * @category Operations
     * @since 0.1.0
     */
    readonly validateBlock: (
      candidate: Block.Block,
      predecessor: Block.Block
    ) => Either.Either<Block.Block, BlockRejection>;

    readonly isBlockValid: (
      candidate: Block.Block,
      predecessor: Block.Block
    ) => boolean;
  }
>() {}

/**
 * @category Layers
 * @since 0.1.0
 */
export const BlockValidatorLive = Layer.effect(
  BlockValidator,
  Effect.gen(function* () {
    const hashing = yield* HashingService;

    const validateBlock = (
      candidate: Block.Block,
      predecessor: Block.Block
    ): Either.Either<Block.Block, BlockRejection> => {
      if (candidate.previousHash !== predecessor.hash)
        return Either.left(
          new BrokenLink({
            blockId: candidate.id,
            expected: predecessor.hash,
            actual: candidate.previousHash,
          })
        );

      const digest = hashing.decodeHex(candidate.hash);
      if (Either.isLeft(digest)) return Either.left(digest.left);

      if (!hashing.satisfiesDifficulty(digest.right))
        return Either.left(
          new InsufficientWork({
            blockId: candidate.id,
            hash: candidate.hash,
            requiredBits: DIFFICULTY_BITS,
          })
        );

      if (candidate.id !== predecessor.id + 1)
        return Either.left(
          new OutOfSequence({
            blockId: candidate.id,
            expected: predecessor.id + 1,
          })
        );

      const { hash, ...content } = candidate;
      const computed = hashing.computeHash(content);
      if (computed !== hash)
        return Either.left(
          new HashMismatch({ blockId: candidate.id, claimed: hash, computed })
        );

      return Either.right(candidate);
    };

    return BlockValidator.of({
      validateBlock,
      isBlockValid: (candidate, predecessor) =>
        Either.isRight(validateBlock(candidate, predecessor)),
    });
  })
);
