/**
 * Node Runtime — one replica of the ledger.
 *
 * Every input the node reacts to (gossip, mined blocks, discovery, operator
 * commands) becomes a `NodeEvent` on a single queue and is processed to
 * completion before the next one, so the ledger has exactly one writer.
 * The miner runs on its own fiber and only submits events.
 *
 * @module LedgerNode
 * @since 0.1.0
 */

import { Context, Data, Effect, Layer, Queue } from "effect";
import * as Array from "effect/Array";
import * as Either from "effect/Either";
import * as Option from "effect/Option";
import type * as Block from "../entities/block";
import type * as Chain from "../entities/chain";
import {
  ALL_TOPICS,
  BLOCK_TOPIC,
  CHAIN_TOPIC,
  makeChainRequest,
  type InboundMessage,
} from "../entities/message";
import type * as Peer from "../entities/peer";
import * as Codec from "./codec";
import { parseCommand, type Command } from "./commands";
import { displayChain, displayPeers } from "./display";
import { GossipHandler, GossipHandlerLive } from "./gossip";
import { HashingServiceLive } from "./hash";
import { NodeIdentity } from "./identity";
import { LedgerStore, LedgerStoreFrom, LedgerStoreLive } from "./ledger";
import { PeerMembership, PeerMembershipLive } from "./membership";
import { Miner, MinerLive } from "./miner";
import {
  GossipNetwork,
  Transport,
  TransportLive,
  type NetworkEvent,
} from "./transport";
import { ValidationLive, type BlockValidator } from "./validation";

/**
 * @category Models
 * @since 0.1.0
 */
export type NodeEvent = Data.TaggedEnum<{
  Gossip: { readonly message: InboundMessage };
  Mined: { readonly block: Block.Block };
  PeerDiscovered: {
    readonly peer: Peer.PeerId;
    readonly source: Peer.DiscoverySource;
  };
  PeerExpired: {
    readonly peer: Peer.PeerId;
    readonly source: Peer.DiscoverySource;
  };
  Command: { readonly input: string };
  Init: {};
}>;

export const NodeEvent = Data.taggedEnum<NodeEvent>();

const fromNetwork = (event: NetworkEvent): NodeEvent => {
  switch (event._tag) {
    case "Message":
      return NodeEvent.Gossip({ message: event.message });
    case "PeerDiscovered":
      return NodeEvent.PeerDiscovered({
        peer: event.peer,
        source: event.source,
      });
    case "PeerExpired":
      return NodeEvent.PeerExpired({ peer: event.peer, source: event.source });
  }
};

/**
 * @category Services
 * @since 0.1.0
 */
export class LedgerNode extends Context.Tag("@ledger/LedgerNode")<
  LedgerNode,
  {
    readonly peerId: Peer.PeerId;

    /** Queue an event; it is processed after everything already queued. */
    readonly submit: (event: NodeEvent) => Effect.Effect<void>;

    /** Wait for the next event and process it to completion. */
    readonly processNext: Effect.Effect<void>;

    /**
     * Process queued events until the queue is empty. Succeeds with the
     * number of events processed.
     */
    readonly drain: Effect.Effect<number>;

    /** Process events forever. */
    readonly run: Effect.Effect<never>;
  }
>() {}

/**
 * Joins the GossipNetwork for the lifetime of the layer's scope.
 *
 * @category Layers
 * @since 0.1.0
 */
export const LedgerNodeLive = Layer.scoped(
  LedgerNode,
  Effect.gen(function* () {
    const identity = yield* NodeIdentity;
    const network = yield* GossipNetwork;
    const handler = yield* GossipHandler;
    const ledger = yield* LedgerStore;
    const membership = yield* PeerMembership;
    const transport = yield* Transport;
    const miner = yield* Miner;

    const scope = yield* Effect.scope;
    const queue = yield* Queue.unbounded<NodeEvent>();

    const submit = (event: NodeEvent) =>
      Effect.asVoid(Queue.offer(queue, event));

    const requestChain = (peer: Peer.PeerId) =>
      transport
        .publish(
          CHAIN_TOPIC,
          Codec.encodeChainRequest(makeChainRequest({ fromPeerId: peer }))
        )
        .pipe(
          Effect.tap(() => Effect.logInfo(`requesting chain from ${peer}`)),
          Effect.asVoid
        );

    const runCommand = (command: Command): Effect.Effect<void> => {
      switch (command._tag) {
        case "ListPeers":
          return Effect.flatMap(membership.peers, displayPeers);
        case "ListChain":
          return Effect.flatMap(ledger.blocks, displayChain);
        case "CreateBlock":
          return ledger.latest.pipe(
            Effect.flatMap((latest) => miner.mine(latest, command.data)),
            Effect.flatMap((block) => submit(NodeEvent.Mined({ block }))),
            Effect.forkIn(scope),
            Effect.asVoid
          );
        case "RequestChain":
          return requestChain(command.peer);
        case "RequestAll":
          return Effect.flatMap(membership.peers, (peers) =>
            Effect.forEach(peers, requestChain, { discard: true })
          );
      }
    };

    const processEvent = (event: NodeEvent): Effect.Effect<void> => {
      switch (event._tag) {
        case "Gossip":
          return Effect.asVoid(handler.handle(event.message));
        case "Mined":
          return ledger.appendIfValid(event.block).pipe(
            Effect.tap((block) =>
              Effect.logInfo("broadcasting new block").pipe(
                Effect.annotateLogs({ blockId: block.id })
              )
            ),
            Effect.flatMap((block) =>
              transport.publish(BLOCK_TOPIC, Codec.encodeBlock(block))
            ),
            // rejection already logged by the ledger
            Effect.catchAll(() => Effect.void),
            Effect.asVoid
          );
        case "PeerDiscovered":
          return handler.peerDiscovered(event.peer, event.source);
        case "PeerExpired":
          return handler.peerExpired(event.peer, event.source);
        case "Command":
          return Either.match(parseCommand(event.input), {
            onLeft: (error) =>
              Effect.logWarning("unknown command").pipe(
                Effect.annotateLogs({ input: error.input })
              ),
            onRight: runCommand,
          });
        case "Init":
          return Effect.flatMap(membership.peers, (peers) =>
            Option.match(Array.last(peers), {
              onNone: () => Effect.logInfo("no peers to request a chain from"),
              onSome: (peer) =>
                Effect.logInfo("sending init chain request").pipe(
                  Effect.zipRight(requestChain(peer))
                ),
            })
          );
      }
    };

    const handleEvent = (event: NodeEvent) =>
      processEvent(event).pipe(
        Effect.annotateLogs({ node: identity.peerId, event: event._tag })
      );

    const processNext = Queue.take(queue).pipe(Effect.flatMap(handleEvent));

    const drain = Effect.gen(function* () {
      let processed = 0;
      while (true) {
        const next = yield* Queue.poll(queue);
        if (Option.isNone(next)) return processed;
        yield* handleEvent(next.value);
        processed++;
      }
    });

    yield* network.join(identity.peerId, ALL_TOPICS, (event) =>
      submit(fromNetwork(event))
    );
    yield* Effect.addFinalizer(() =>
      network
        .leave(identity.peerId)
        .pipe(Effect.zipRight(Queue.shutdown(queue)))
    );

    return LedgerNode.of({
      peerId: identity.peerId,
      submit,
      processNext,
      drain,
      run: Effect.forever(processNext),
    });
  })
);

const stack = (ledger: Layer.Layer<LedgerStore, never, BlockValidator>) =>
  LedgerNodeLive.pipe(
    Layer.provideMerge(GossipHandlerLive),
    Layer.provideMerge(TransportLive),
    Layer.provideMerge(PeerMembershipLive),
    Layer.provideMerge(ledger),
    Layer.provideMerge(MinerLive),
    Layer.provideMerge(ValidationLive),
    Layer.provideMerge(HashingServiceLive)
  );

/**
 * Full service stack of one node, starting from genesis.
 *
 * Requires: NodeIdentity, GossipNetwork
 *
 * @category Layers
 * @since 0.1.0
 */
export const NodeLive = stack(LedgerStoreLive);

/**
 * Node whose ledger starts out as `initial`
 *
 * @category Layers
 * @since 0.1.0
 */
export const NodeFrom = (initial: Chain.Chain) =>
  stack(LedgerStoreFrom(initial));
