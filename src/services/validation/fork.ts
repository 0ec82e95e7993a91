/**
 * Fork Selector — longest valid chain wins, ties keep the local chain.
 *
 * With a fixed difficulty every block carries the same work, so the
 * longest valid chain is also the one with the most accumulated work.
 *
 * @module ForkSelector
 * @since 0.1.0
 */

import { Context, Data, Effect, Layer } from "effect";
import * as Chunk from "effect/Chunk";
import * as Either from "effect/Either";
import type * as Chain from "../../entities/chain";
import { NoValidChain } from "../../entities/errors";
import { ChainValidator } from "./chain";

/**
 * Outcome of fork selection
 *
 * @category Models
 * @since 0.1.0
 */
export type ForkChoice = Data.TaggedEnum<{
  KeepLocal: { readonly chain: Chain.Chain };
  AdoptRemote: { readonly chain: Chain.Chain };
}>;

export const ForkChoice = Data.taggedEnum<ForkChoice>();

/**
 * @category Services
 * @since 0.1.0
 */
export class ForkSelector extends Context.Tag("@ledger/ForkSelector")<
  ForkSelector,
  {
    /**
     * Validate both chains independently and pick one.
     *
     * | local | remote | outcome |
     * |---|---|---|
     * | valid | valid | longer one, local on ties |
     * | valid | invalid | local |
     * | invalid | valid | remote |
     * | invalid | invalid | `NoValidChain` |
     *
     * @category Operations
     * @since 0.1.0
     */
    readonly selectChain: (
      local: Chain.Chain,
      remote: Chain.Chain
    ) => Either.Either<ForkChoice, NoValidChain>;
  }
>() {}

/**
 * @category Layers
 * @since 0.1.0
 */
export const ForkSelectorLive = Layer.effect(
  ForkSelector,
  Effect.gen(function* () {
    const chainValidator = yield* ChainValidator;

    return ForkSelector.of({
      selectChain: (local, remote) => {
        const localResult = chainValidator.validateChain(local);
        const remoteResult = chainValidator.validateChain(remote);

        if (Either.isRight(localResult) && Either.isRight(remoteResult))
          return Either.right(
            Chunk.size(local) >= Chunk.size(remote)
              ? ForkChoice.KeepLocal({ chain: local })
              : ForkChoice.AdoptRemote({ chain: remote })
          );

        if (Either.isRight(localResult))
          return Either.right(ForkChoice.KeepLocal({ chain: local }));

        if (Either.isRight(remoteResult))
          return Either.right(ForkChoice.AdoptRemote({ chain: remote }));

        return Either.left(
          new NoValidChain({
            local: localResult.left,
            remote: remoteResult.left,
          })
        );
      },
    });
  })
);
