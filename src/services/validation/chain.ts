/**
 * Chain Validator — applies the block validator to every adjacent pair of
 * a sequence. Index 0 (genesis) is the trust anchor and is never checked.
 *
 * @module ChainValidator
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect";
import * as Array from "effect/Array";
import * as Chunk from "effect/Chunk";
import * as Either from "effect/Either";
import type * as Block from "../../entities/block";
import { InvalidChain } from "../../entities/errors";
import { BlockValidator } from "./block";

/**
 * @category Services
 * @since 0.1.0
 */
export class ChainValidator extends Context.Tag("@ledger/ChainValidator")<
  ChainValidator,
  {
    /**
     * Fails with the first pair that does not validate. Empty and
     * single-block sequences are trivially valid.
     *
     * @category Operations
     * @since 0.1.0
     */
    readonly validateChain: <C extends Chunk.Chunk<Block.Block>>(
      chain: C
    ) => Either.Either<C, InvalidChain>;

    readonly isChainValid: (chain: Chunk.Chunk<Block.Block>) => boolean;
  }
>() {}

/**
 * @category Layers
 * @since 0.1.0
 */
export const ChainValidatorLive = Layer.effect(
  ChainValidator,
  Effect.gen(function* () {
    const blockValidator = yield* BlockValidator;

    const validateChain = <C extends Chunk.Chunk<Block.Block>>(
      chain: C
    ): Either.Either<C, InvalidChain> => {
      const blocks = Chunk.toReadonlyArray(chain);

      for (const [i, [previous, current]] of Array.window(
        blocks,
        2
      ).entries()) {
        const result = blockValidator.validateBlock(current, previous);
        if (Either.isLeft(result))
          return Either.left(
            new InvalidChain({ index: i + 1, rejection: result.left })
          );
      }

      return Either.right(chain);
    };

    return ChainValidator.of({
      validateChain,
      isChainValid: (chain) => Either.isRight(validateChain(chain)),
    });
  })
);
