import { Schema } from "effect";

/** Self-generated node identity, used to address gossip */
export const PeerIdSchema = Schema.String.pipe(
  Schema.minLength(1),
  Schema.brand("PeerId")
);

export type PeerId = typeof PeerIdSchema.Type;

export const PeerId = PeerIdSchema.make;

/**
 * Independent signals that can vouch for a peer being reachable:
 * local-network discovery, or an explicitly dialled connection.
 */
export const DiscoverySourceSchema = Schema.Literal("local", "direct");

export type DiscoverySource = typeof DiscoverySourceSchema.Type;
