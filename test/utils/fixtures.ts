import { Effect, Layer, Logger, LogLevel } from "effect";
import * as Chunk from "effect/Chunk";
import * as Block from "../../src/entities/block";
import * as Chain from "../../src/entities/chain";
import { HashingServiceLive } from "../../src/services/hash";
import { Miner, MinerLive } from "../../src/services/miner";
import { ValidationLive } from "../../src/services/validation";

/** Hashing, validation and mining, no node state */
export const CoreTestLayer = Layer.mergeAll(ValidationLive, MinerLive).pipe(
  Layer.provideMerge(HashingServiceLive)
);

/**
 * Mine `length` blocks on top of genesis. The payload of block `i` is
 * `${label} ${i}`.
 */
export const mineChain = (length: number, label: string) =>
  Effect.gen(function* () {
    const miner = yield* Miner;
    let chain = Chain.genesisOnly();
    for (let i = 1; i <= length; i++) {
      const block = yield* miner.mine(Chain.latest(chain), `${label} ${i}`);
      chain = Chunk.append(chain, block);
    }
    return chain;
  }).pipe(
    Effect.provide(CoreTestLayer),
    Effect.provide(Logger.minimumLogLevel(LogLevel.None))
  );

/** Mine outside a test body (for `beforeAll`) */
export const runMineChain = (length: number, label: string) =>
  Effect.runPromise(mineChain(length, label));

/** Element `index` of a chain; fails loudly when out of range */
export const blockAt = (chain: Chunk.Chunk<Block.Block>, index: number) =>
  Chunk.unsafeGet(chain, index);

/** Copy of `chain` with the block at `index` patched */
export const tamper = (
  chain: Chain.Chain,
  index: number,
  patch: Partial<Block.Block>
): Chain.Chain =>
  Chunk.map(chain, (block, i) =>
    i === index ? { ...block, ...patch } : block
  );

/** First `length` blocks of a chain */
export const prefix = (chain: Chain.Chain, length: number): Chain.Chain =>
  Chain.fromBlocks(
    Chunk.headNonEmpty(chain),
    ...Chunk.toReadonlyArray(chain).slice(1, length)
  );
