import { Data, Schema } from "effect";
import * as Block from "./block";
import * as Chain from "./chain";
import * as Peer from "./peer";

// ============================================================================
// TOPICS
// ============================================================================

export const TopicSchema = Schema.Literal("chains", "blocks");

export type Topic = typeof TopicSchema.Type;

/** Chain-level messages: ChainResponse and ChainRequest */
export const CHAIN_TOPIC: Topic = "chains";

/** Single-block announcements */
export const BLOCK_TOPIC: Topic = "blocks";

export const ALL_TOPICS: ReadonlyArray<Topic> = [CHAIN_TOPIC, BLOCK_TOPIC];

// ============================================================================
// WIRE PAYLOADS
// ============================================================================

/** A sender's full ledger, addressed to the peer that asked for it */
export const ChainResponseSchema = Schema.Struct({
  receiver: Peer.PeerIdSchema,
  blocks: Chain.ChainSchema,
});

export type ChainResponse = typeof ChainResponseSchema.Type;

/** Asks the peer named by `fromPeerId` to send its ledger */
export const ChainRequestSchema = Schema.Struct({
  fromPeerId: Schema.propertySignature(Peer.PeerIdSchema).pipe(
    Schema.fromKey("from_peer_id")
  ),
});

export type ChainRequest = typeof ChainRequestSchema.Type;

export const makeChainResponse = ChainResponseSchema.make;
export const makeChainRequest = ChainRequestSchema.make;

// ============================================================================
// DECODED MESSAGES
// ============================================================================

/** Result of interpreting an inbound payload */
export type GossipMessage = Data.TaggedEnum<{
  ChainResponse: { readonly response: ChainResponse };
  ChainRequest: { readonly request: ChainRequest };
  BlockAnnouncement: { readonly block: Block.Block };
  Unrecognized: { readonly reason: string };
}>;

export const GossipMessage = Data.taggedEnum<GossipMessage>();

/** A payload as delivered by the transport */
export interface InboundMessage {
  readonly topic: Topic;
  readonly source: Peer.PeerId;
  readonly payload: Uint8Array;
}
