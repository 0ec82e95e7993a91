import { Schema } from "effect";
import * as Chunk from "effect/Chunk";
import * as Block from "./block";

/** A ledger: never empty, index 0 is genesis */
export const ChainSchema = Schema.NonEmptyChunk(Block.BlockSchema);

export type Chain = typeof ChainSchema.Type;

export const genesisOnly = (): Chain => Chunk.of(Block.GENESIS);

export const fromBlocks = (
  first: Block.Block,
  ...rest: ReadonlyArray<Block.Block>
): Chain => Chunk.prepend(Chunk.fromIterable(rest), first);

export const latest = (chain: Chain): Block.Block => Chunk.lastNonEmpty(chain);
