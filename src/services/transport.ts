/**
 * Transport boundary.
 *
 * Capabilities:
 * - GossipNetwork — in-process hub shared by every node of a local network:
 *   topic subscriptions, discovery events, broadcast delivery
 * - Transport — one node's outbound side: broadcast to its gossip group
 *
 * Delivery is a callback per node, so the hub never touches node state
 * directly; each node turns deliveries into events on its own queue.
 *
 * @module Transport
 * @since 0.1.0
 */

import { Context, Data, Effect, Layer, Ref } from "effect";
import * as Array from "effect/Array";
import * as HashMap from "effect/HashMap";
import * as Option from "effect/Option";
import type { InboundMessage, Topic } from "../entities/message";
import type * as Peer from "../entities/peer";
import { NodeIdentity } from "./identity";
import { PeerMembership } from "./membership";

/**
 * Everything the network hands to a node
 *
 * @category Models
 * @since 0.1.0
 */
export type NetworkEvent = Data.TaggedEnum<{
  Message: { readonly message: InboundMessage };
  PeerDiscovered: {
    readonly peer: Peer.PeerId;
    readonly source: Peer.DiscoverySource;
  };
  PeerExpired: {
    readonly peer: Peer.PeerId;
    readonly source: Peer.DiscoverySource;
  };
}>;

export const NetworkEvent = Data.taggedEnum<NetworkEvent>();

export type Deliver = (event: NetworkEvent) => Effect.Effect<void>;

interface Endpoint {
  readonly topics: ReadonlyArray<Topic>;
  readonly deliver: Deliver;
}

// ============================================================================
// CAPABILITY: GOSSIP NETWORK
// ============================================================================

/**
 * @category Services
 * @since 0.1.0
 */
export class GossipNetwork extends Context.Tag("@ledger/GossipNetwork")<
  GossipNetwork,
  {
    /**
     * Register a node subscribed to `topics`. Every node already present
     * and the newcomer discover each other through the `local` signal.
     */
    readonly join: (
      peer: Peer.PeerId,
      topics: ReadonlyArray<Topic>,
      deliver: Deliver
    ) => Effect.Effect<void>;

    /** Unregister a node; the others see its `local` signal expire. */
    readonly leave: (peer: Peer.PeerId) => Effect.Effect<void>;

    /** Both nodes gain a `direct` signal for each other. */
    readonly connect: (a: Peer.PeerId, b: Peer.PeerId) => Effect.Effect<void>;

    /** Both nodes lose their `direct` signal for each other. */
    readonly disconnect: (
      a: Peer.PeerId,
      b: Peer.PeerId
    ) => Effect.Effect<void>;

    /**
     * Deliver to every recipient that is registered and subscribed to the
     * topic. Succeeds with the number of deliveries.
     */
    readonly broadcast: (
      from: Peer.PeerId,
      topic: Topic,
      payload: Uint8Array,
      recipients: ReadonlyArray<Peer.PeerId>
    ) => Effect.Effect<number>;

    readonly members: Effect.Effect<ReadonlyArray<Peer.PeerId>>;
  }
>() {}

/**
 * @category Layers
 * @since 0.1.0
 */
export const GossipNetworkLive = Layer.effect(
  GossipNetwork,
  Effect.gen(function* () {
    const endpoints = yield* Ref.make(
      HashMap.empty<Peer.PeerId, Endpoint>()
    );

    const notify = (target: Peer.PeerId, event: NetworkEvent) =>
      Effect.gen(function* () {
        const endpoint = HashMap.get(yield* Ref.get(endpoints), target);
        if (Option.isSome(endpoint)) yield* endpoint.value.deliver(event);
      });

    const join = (
      peer: Peer.PeerId,
      topics: ReadonlyArray<Topic>,
      deliver: Deliver
    ) =>
      Effect.gen(function* () {
        const existing = yield* Ref.modify(endpoints, (current) => [
          Array.fromIterable(HashMap.keys(current)),
          HashMap.set(current, peer, { topics, deliver }),
        ]);

        yield* Effect.forEach(
          existing,
          (other) =>
            Effect.zipRight(
              notify(
                other,
                NetworkEvent.PeerDiscovered({ peer, source: "local" })
              ),
              notify(
                peer,
                NetworkEvent.PeerDiscovered({ peer: other, source: "local" })
              )
            ),
          { discard: true }
        );
      });

    const leave = (peer: Peer.PeerId) =>
      Effect.gen(function* () {
        const remaining = yield* Ref.modify(endpoints, (current) => {
          const next = HashMap.remove(current, peer);
          return [Array.fromIterable(HashMap.keys(next)), next];
        });

        yield* Effect.forEach(
          remaining,
          (other) =>
            notify(other, NetworkEvent.PeerExpired({ peer, source: "local" })),
          { discard: true }
        );
      });

    const connect = (a: Peer.PeerId, b: Peer.PeerId) =>
      Effect.zipRight(
        notify(a, NetworkEvent.PeerDiscovered({ peer: b, source: "direct" })),
        notify(b, NetworkEvent.PeerDiscovered({ peer: a, source: "direct" }))
      );

    const disconnect = (a: Peer.PeerId, b: Peer.PeerId) =>
      Effect.zipRight(
        notify(a, NetworkEvent.PeerExpired({ peer: b, source: "direct" })),
        notify(b, NetworkEvent.PeerExpired({ peer: a, source: "direct" }))
      );

    const broadcast = (
      from: Peer.PeerId,
      topic: Topic,
      payload: Uint8Array,
      recipients: ReadonlyArray<Peer.PeerId>
    ) =>
      Effect.gen(function* () {
        const current = yield* Ref.get(endpoints);
        const targets = Array.filterMap(recipients, (peer) =>
          HashMap.get(current, peer).pipe(
            Option.filter(
              (endpoint) => peer !== from && endpoint.topics.includes(topic)
            )
          )
        );

        yield* Effect.forEach(
          targets,
          (endpoint) =>
            endpoint.deliver(
              NetworkEvent.Message({
                message: { topic, source: from, payload },
              })
            ),
          { discard: true }
        );

        return targets.length;
      });

    return GossipNetwork.of({
      join,
      leave,
      connect,
      disconnect,
      broadcast,
      members: Ref.get(endpoints).pipe(
        Effect.map((current) => Array.fromIterable(HashMap.keys(current)))
      ),
    });
  })
);

// ============================================================================
// CAPABILITY: TRANSPORT
// ============================================================================

/**
 * @category Services
 * @since 0.1.0
 */
export class Transport extends Context.Tag("@ledger/Transport")<
  Transport,
  {
    /**
     * Fire-and-forget broadcast to the current gossip group. Succeeds with
     * the number of peers reached.
     */
    readonly publish: (
      topic: Topic,
      payload: Uint8Array
    ) => Effect.Effect<number>;
  }
>() {}

/**
 * Transport backed by the in-process GossipNetwork, scoped to this node's
 * gossip group.
 *
 * @category Layers
 * @since 0.1.0
 */
export const TransportLive = Layer.effect(
  Transport,
  Effect.gen(function* () {
    const network = yield* GossipNetwork;
    const identity = yield* NodeIdentity;
    const membership = yield* PeerMembership;

    return Transport.of({
      publish: (topic, payload) =>
        membership.peers.pipe(
          Effect.flatMap((peers) =>
            network.broadcast(identity.peerId, topic, payload, peers)
          ),
          Effect.tap((reached) =>
            Effect.logDebug("published").pipe(
              Effect.annotateLogs({ topic, reached, bytes: payload.length })
            )
          )
        ),
    });
  })
);
