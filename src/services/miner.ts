/**
 * Miner — proof-of-work nonce search.
 *
 * Runs on its own fiber and hands finished blocks to the node as events;
 * the search yields every `LEDGER_MINER_YIELD_EVERY` attempts so the node
 * keeps processing gossip meanwhile.
 *
 * @module Miner
 * @since 0.1.0
 */

import { Context, DateTime, Effect, Layer } from "effect";
import { hexlify } from "ethers";
import * as Block from "../entities/block";
import { MinerConfig } from "../config";
import { HashingService } from "./hash";

/**
 * @category Services
 * @since 0.1.0
 */
export class Miner extends Context.Tag("@ledger/Miner")<
  Miner,
  {
    /**
     * Search nonces from 0 upward for a block extending `previous`.
     *
     * @category Constructors
     * @since 0.1.0
     */
    readonly mine: (
      previous: Block.Block,
      data: string
    ) => Effect.Effect<Block.Block>;
  }
>() {}

/**
 * @category Layers
 * @since 0.1.0
 */
export const MinerLive = Layer.effect(
  Miner,
  Effect.gen(function* () {
    const hashing = yield* HashingService;
    const { yieldEvery } = yield* MinerConfig;

    const search = (
      content: Omit<Block.BlockContent, "nonce">,
      from: number
    ): Effect.Effect<Block.Block> =>
      Effect.suspend(() => {
        for (let nonce = from; nonce < from + yieldEvery; nonce++) {
          const digest = hashing.computeDigest({ ...content, nonce });
          if (hashing.satisfiesDifficulty(digest))
            return Effect.succeed(
              // Remove '0x' prefix from ethers output
              Block.make({ ...content, nonce, hash: hexlify(digest).slice(2) })
            );
        }
        return Effect.zipRight(
          Effect.yieldNow(),
          search(content, from + yieldEvery)
        );
      });

    return Miner.of({
      mine: (previous, data) =>
        Effect.gen(function* () {
          const now = yield* DateTime.now;
          const content = {
            id: previous.id + 1,
            previousHash: previous.hash,
            timestamp: Math.floor(DateTime.toEpochMillis(now) / 1000),
            data,
          };

          yield* Effect.logInfo("mining block").pipe(
            Effect.annotateLogs({ blockId: content.id })
          );
          const block = yield* search(content, 0);
          yield* Effect.logInfo("mined block").pipe(
            Effect.annotateLogs({
              blockId: block.id,
              nonce: block.nonce,
              hash: block.hash,
            })
          );
          return block;
        }).pipe(Effect.withLogSpan("mine")),
    });
  })
);
