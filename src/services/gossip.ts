/**
 * Gossip Protocol Handler — interprets inbound peer messages and drives the
 * ledger.
 *
 * Nothing here answers a peer negatively: rejected blocks and refused
 * chains are logged and simply never show up in this node's ledger.
 *
 * @module GossipHandler
 * @since 0.1.0
 */

import { Context, Data, Effect, Layer } from "effect";
import * as Chunk from "effect/Chunk";
import * as Either from "effect/Either";
import type * as Block from "../entities/block";
import {
  describeRejection,
  type BlockRejection,
  type NoValidChain,
} from "../entities/errors";
import {
  CHAIN_TOPIC,
  GossipMessage,
  makeChainResponse,
  type ChainRequest,
  type ChainResponse,
  type InboundMessage,
} from "../entities/message";
import type * as Peer from "../entities/peer";
import * as Codec from "./codec";
import { NodeIdentity } from "./identity";
import { LedgerStore } from "./ledger";
import { PeerMembership } from "./membership";
import { Transport } from "./transport";
import { ForkSelector } from "./validation";

/**
 * What handling one inbound message did
 *
 * @category Models
 * @since 0.1.0
 */
export type GossipOutcome = Data.TaggedEnum<{
  ChainAdopted: { readonly length: number };
  ChainKept: { readonly length: number };
  ChainRefused: { readonly error: NoValidChain };
  ChainSent: { readonly receiver: Peer.PeerId; readonly length: number };
  BlockAppended: { readonly block: Block.Block };
  BlockRejected: { readonly rejection: BlockRejection };
  Ignored: { readonly reason: string };
}>;

export const GossipOutcome = Data.taggedEnum<GossipOutcome>();

/**
 * @category Services
 * @since 0.1.0
 */
export class GossipHandler extends Context.Tag("@ledger/GossipHandler")<
  GossipHandler,
  {
    /**
     * Decode one payload and act on it. Never fails.
     *
     * @category Operations
     * @since 0.1.0
     */
    readonly handle: (message: InboundMessage) => Effect.Effect<GossipOutcome>;

    readonly peerDiscovered: (
      peer: Peer.PeerId,
      source: Peer.DiscoverySource
    ) => Effect.Effect<void>;

    readonly peerExpired: (
      peer: Peer.PeerId,
      source: Peer.DiscoverySource
    ) => Effect.Effect<void>;
  }
>() {}

/**
 * @category Layers
 * @since 0.1.0
 */
export const GossipHandlerLive = Layer.effect(
  GossipHandler,
  Effect.gen(function* () {
    const identity = yield* NodeIdentity;
    const ledger = yield* LedgerStore;
    const forkSelector = yield* ForkSelector;
    const membership = yield* PeerMembership;
    const transport = yield* Transport;

    const onChainResponse = (
      source: Peer.PeerId,
      response: ChainResponse
    ): Effect.Effect<GossipOutcome> =>
      Effect.gen(function* () {
        if (response.receiver !== identity.peerId) {
          yield* Effect.logDebug("chain response for another peer").pipe(
            Effect.annotateLogs({ receiver: response.receiver })
          );
          return GossipOutcome.Ignored({
            reason: "response addressed to another peer",
          });
        }

        yield* Effect.logInfo(`response from ${source}`).pipe(
          Effect.annotateLogs({ length: Chunk.size(response.blocks) })
        );
        yield* Effect.forEach(
          response.blocks,
          (block) =>
            Effect.logDebug("received block").pipe(
              Effect.annotateLogs({ blockId: block.id, hash: block.hash })
            ),
          { discard: true }
        );

        const local = yield* ledger.blocks;
        const choice = forkSelector.selectChain(local, response.blocks);

        if (Either.isLeft(choice)) {
          yield* Effect.logError(
            "local and remote chains are both invalid"
          ).pipe(
            Effect.annotateLogs({
              localIndex: choice.left.local.index,
              localReason: describeRejection(choice.left.local.rejection),
              remoteIndex: choice.left.remote.index,
              remoteReason: describeRejection(choice.left.remote.rejection),
            })
          );
          return GossipOutcome.ChainRefused({ error: choice.left });
        }

        const chosen = choice.right;
        if (chosen._tag === "KeepLocal") {
          yield* Effect.logInfo("keeping local chain").pipe(
            Effect.annotateLogs({
              local: Chunk.size(chosen.chain),
              remote: Chunk.size(response.blocks),
            })
          );
          return GossipOutcome.ChainKept({ length: Chunk.size(chosen.chain) });
        }

        yield* ledger.replaceWith(chosen.chain);
        return GossipOutcome.ChainAdopted({ length: Chunk.size(chosen.chain) });
      });

    const onChainRequest = (
      source: Peer.PeerId,
      request: ChainRequest
    ): Effect.Effect<GossipOutcome> =>
      Effect.gen(function* () {
        if (request.fromPeerId !== identity.peerId)
          return GossipOutcome.Ignored({
            reason: "request addressed to another peer",
          });

        yield* Effect.logInfo(`sending local chain to ${source}`);
        const snapshot = yield* ledger.blocks;
        yield* transport.publish(
          CHAIN_TOPIC,
          Codec.encodeChainResponse(
            makeChainResponse({ receiver: source, blocks: snapshot })
          )
        );

        return GossipOutcome.ChainSent({
          receiver: source,
          length: Chunk.size(snapshot),
        });
      });

    const onBlock = (
      source: Peer.PeerId,
      block: Block.Block
    ): Effect.Effect<GossipOutcome> =>
      Effect.logInfo(`received new block from ${source}`).pipe(
        Effect.annotateLogs({ blockId: block.id }),
        Effect.zipRight(ledger.appendIfValid(block)),
        Effect.map((appended) =>
          GossipOutcome.BlockAppended({ block: appended })
        ),
        Effect.catchAll((rejection) =>
          Effect.succeed(GossipOutcome.BlockRejected({ rejection }))
        )
      );

    const handle = (inbound: InboundMessage): Effect.Effect<GossipOutcome> =>
      GossipMessage.$match(Codec.decode(inbound.payload), {
        ChainResponse: ({ response }) =>
          onChainResponse(inbound.source, response),
        ChainRequest: ({ request }) => onChainRequest(inbound.source, request),
        BlockAnnouncement: ({ block }) => onBlock(inbound.source, block),
        Unrecognized: ({ reason }) =>
          Effect.logDebug("dropping unrecognized payload").pipe(
            Effect.annotateLogs({ reason }),
            Effect.as(GossipOutcome.Ignored({ reason }))
          ),
      }).pipe(
        Effect.annotateLogs({ source: inbound.source, topic: inbound.topic }),
        Effect.withLogSpan("gossip")
      );

    return GossipHandler.of({
      handle,
      peerDiscovered: (peer, source) =>
        Effect.asVoid(membership.discovered(peer, source)),
      peerExpired: (peer, source) =>
        Effect.asVoid(membership.expired(peer, source)),
    });
  })
);
