/**
 * Ledger Store — this node's authoritative chain.
 *
 * The chain is held as a non-empty Chunk seeded with genesis, so there is
 * always a latest block to validate against.
 *
 * @module LedgerStore
 * @since 0.1.0
 */

import { Context, Effect, Layer, Ref } from "effect";
import * as Chunk from "effect/Chunk";
import * as Either from "effect/Either";
import type * as Block from "../entities/block";
import * as Chain from "../entities/chain";
import { describeRejection, type BlockRejection } from "../entities/errors";
import { BlockValidator } from "./validation";

/**
 * @category Services
 * @since 0.1.0
 */
export class LedgerStore extends Context.Tag("@ledger/LedgerStore")<
  LedgerStore,
  {
    /** Snapshot of the current chain */
    readonly blocks: Effect.Effect<Chain.Chain>;

    readonly latest: Effect.Effect<Block.Block>;

    /**
     * Validate against the current latest block and append. A rejection is
     * logged and returned in the error channel; the chain is unchanged.
     *
     * @category Operations
     * @since 0.1.0
     */
    readonly appendIfValid: (
      candidate: Block.Block
    ) => Effect.Effect<Block.Block, BlockRejection>;

    /**
     * Overwrite the chain. Performs no validation: callers run fork
     * selection first.
     *
     * @category Operations
     * @since 0.1.0
     */
    readonly replaceWith: (chain: Chain.Chain) => Effect.Effect<void>;
  }
>() {}

const make = (initial: Chain.Chain) =>
  Effect.gen(function* () {
    const blockValidator = yield* BlockValidator;
    const ref = yield* Ref.make(initial);

    const appendIfValid = (candidate: Block.Block) =>
      Ref.modify(ref, (chain) => {
        const result = blockValidator.validateBlock(
          candidate,
          Chain.latest(chain)
        );
        const next = Either.isRight(result)
          ? Chunk.append(chain, result.right)
          : chain;
        return [result, next] as const;
      }).pipe(
        Effect.flatMap((result) => result),
        Effect.tap((block) =>
          Effect.logDebug("block appended").pipe(
            Effect.annotateLogs({ blockId: block.id, hash: block.hash })
          )
        ),
        Effect.tapError((rejection) =>
          Effect.logWarning("could not add block - invalid").pipe(
            Effect.annotateLogs({
              tag: rejection._tag,
              reason: describeRejection(rejection),
            })
          )
        ),
        Effect.withLogSpan("appendIfValid")
      );

    return LedgerStore.of({
      blocks: Ref.get(ref),
      latest: Ref.get(ref).pipe(Effect.map(Chain.latest)),
      appendIfValid,
      replaceWith: (chain) =>
        Ref.set(ref, chain).pipe(
          Effect.zipRight(
            Effect.logInfo("ledger replaced").pipe(
              Effect.annotateLogs({ length: Chunk.size(chain) })
            )
          )
        ),
    });
  });

/**
 * Live implementation seeded with the genesis block.
 *
 * @category Layers
 * @since 0.1.0
 */
export const LedgerStoreLive = Layer.effect(
  LedgerStore,
  make(Chain.genesisOnly())
);

/**
 * Ledger seeded with an arbitrary chain.
 *
 * @category Layers
 * @since 0.1.0
 */
export const LedgerStoreFrom = (initial: Chain.Chain) =>
  Layer.effect(LedgerStore, make(initial));
