/**
 * Node identity — generated once at startup and threaded through the
 * services that address gossip.
 *
 * A PeerId is the checksummed address of a fresh secp256k1 key pair.
 *
 * @module NodeIdentity
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect";
import { ethers } from "ethers";
import { IdentityError } from "../entities/errors";
import * as Peer from "../entities/peer";

/**
 * @category Services
 * @since 0.1.0
 */
export class NodeIdentity extends Context.Tag("@ledger/NodeIdentity")<
  NodeIdentity,
  { readonly peerId: Peer.PeerId }
>() {}

/**
 * Generate a new random identity
 *
 * @category Implementation
 * @since 0.1.0
 */
export const generatePeerId = Effect.try({
  try: () => ethers.Wallet.createRandom(),
  catch: (error) =>
    new IdentityError({
      reason: `Failed to generate node key: ${
        error instanceof Error ? error.message : String(error)
      }`,
      cause: error,
    }),
}).pipe(
  // `ethers` returns a checksummed address, hence `make` and not `decode`
  Effect.map((wallet) => Peer.PeerId(wallet.address))
);

/**
 * @category Layers
 * @since 0.1.0
 */
export const NodeIdentityLive = Layer.effect(
  NodeIdentity,
  generatePeerId.pipe(
    Effect.tap((peerId) =>
      Effect.logInfo("local peer id generated").pipe(
        Effect.annotateLogs({ peerId })
      )
    ),
    Effect.map((peerId) => NodeIdentity.of({ peerId }))
  )
);

/**
 * Identity with a caller-chosen PeerId
 *
 * @category Layers
 * @since 0.1.0
 */
export const NodeIdentityFixed = (peerId: Peer.PeerId) =>
  Layer.succeed(NodeIdentity, NodeIdentity.of({ peerId }));
