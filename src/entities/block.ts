import { Schema } from "effect";
import * as Primitives from "./primitives";

/** Sentinel stored in the genesis block's `previousHash` */
export const GENESIS_PREVIOUS_HASH = "genesis";

/**
 * A ledger entry. The domain uses camelCase keys; the wire form keeps the
 * snake_case `previous_hash` every peer expects.
 */
export const BlockSchema = Schema.Struct({
  id: Primitives.NonNegativeIntSchema,
  // hex digest over the five other fields
  hash: Schema.String,
  previousHash: Schema.propertySignature(Schema.String).pipe(
    Schema.fromKey("previous_hash")
  ),
  // seconds since epoch, informational only
  timestamp: Primitives.IntSchema,
  data: Schema.String,
  nonce: Primitives.NonNegativeIntSchema,
});

export type Block = typeof BlockSchema.Type;
export type EncodedBlock = typeof BlockSchema.Encoded;

/** Everything the block hash commits to */
export type BlockContent = Omit<Block, "hash">;

export const make = BlockSchema.make;

/**
 * Trust anchor seeded into every ledger. Never run through the validator.
 */
export const GENESIS: Block = make({
  id: 0,
  hash: "0000f816a87f806bb0073dcf026a64fb40c946b5abee2573702828694d5b4c43",
  previousHash: GENESIS_PREVIOUS_HASH,
  timestamp: 1637140000,
  data: "genesis!",
  nonce: 2836,
});
