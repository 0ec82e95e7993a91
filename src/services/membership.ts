/**
 * Peer Membership Tracker — the gossip group of a node.
 *
 * Each peer keeps the set of discovery signals currently vouching for it.
 * An expiry removes one signal; the peer only leaves the group once no
 * signal is left.
 *
 * @module PeerMembership
 * @since 0.1.0
 */

import { Context, Effect, Layer, Ref } from "effect";
import * as Array from "effect/Array";
import * as HashMap from "effect/HashMap";
import * as HashSet from "effect/HashSet";
import * as Option from "effect/Option";
import * as Order from "effect/Order";
import type * as Peer from "../entities/peer";
import { NodeIdentity } from "./identity";

interface MembershipRecord {
  readonly sources: HashSet.HashSet<Peer.DiscoverySource>;
  // discovery sequence number, orders the group
  readonly joinedAt: number;
}

interface MembershipState {
  readonly records: HashMap.HashMap<Peer.PeerId, MembershipRecord>;
  readonly sequence: number;
}

const byJoinOrder = Order.mapInput(
  Order.number,
  ([, record]: readonly [Peer.PeerId, MembershipRecord]) => record.joinedAt
);

/**
 * @category Services
 * @since 0.1.0
 */
export class PeerMembership extends Context.Tag("@ledger/PeerMembership")<
  PeerMembership,
  {
    /**
     * Record a signal for `peer`. Succeeds with `true` when the peer was
     * not in the group before.
     */
    readonly discovered: (
      peer: Peer.PeerId,
      source: Peer.DiscoverySource
    ) => Effect.Effect<boolean>;

    /**
     * Withdraw a signal for `peer`. Succeeds with `true` when the peer left
     * the group as a result.
     */
    readonly expired: (
      peer: Peer.PeerId,
      source: Peer.DiscoverySource
    ) => Effect.Effect<boolean>;

    /** Current gossip group, oldest member first */
    readonly peers: Effect.Effect<ReadonlyArray<Peer.PeerId>>;

    readonly isMember: (peer: Peer.PeerId) => Effect.Effect<boolean>;
  }
>() {}

/**
 * @category Layers
 * @since 0.1.0
 */
export const PeerMembershipLive = Layer.effect(
  PeerMembership,
  Effect.gen(function* () {
    const identity = yield* NodeIdentity;
    const state = yield* Ref.make<MembershipState>({
      records: HashMap.empty(),
      sequence: 0,
    });

    const discovered = (peer: Peer.PeerId, source: Peer.DiscoverySource) =>
      peer === identity.peerId
        ? Effect.succeed(false)
        : Ref.modify(state, (current) =>
            Option.match(HashMap.get(current.records, peer), {
              onNone: () =>
                [
                  true,
                  {
                    records: HashMap.set(current.records, peer, {
                      sources: HashSet.make(source),
                      joinedAt: current.sequence,
                    }),
                    sequence: current.sequence + 1,
                  },
                ] as const,
              onSome: (record) =>
                [
                  false,
                  {
                    ...current,
                    records: HashMap.set(current.records, peer, {
                      ...record,
                      sources: HashSet.add(record.sources, source),
                    }),
                  },
                ] as const,
            })
          ).pipe(
            Effect.tap((joined) =>
              joined
                ? Effect.logInfo("peer joined gossip group").pipe(
                    Effect.annotateLogs({ peer, source })
                  )
                : Effect.void
            )
          );

    const expired = (peer: Peer.PeerId, source: Peer.DiscoverySource) =>
      Ref.modify(state, (current) =>
        Option.match(HashMap.get(current.records, peer), {
          onNone: () => [false, current] as const,
          onSome: (record) => {
            const sources = HashSet.remove(record.sources, source);
            return HashSet.size(sources) === 0
              ? ([
                  true,
                  { ...current, records: HashMap.remove(current.records, peer) },
                ] as const)
              : ([
                  false,
                  {
                    ...current,
                    records: HashMap.set(current.records, peer, {
                      ...record,
                      sources,
                    }),
                  },
                ] as const);
          },
        })
      ).pipe(
        Effect.tap((left) =>
          left
            ? Effect.logInfo("peer left gossip group").pipe(
                Effect.annotateLogs({ peer, source })
              )
            : Effect.logDebug("peer still vouched for").pipe(
                Effect.annotateLogs({ peer, source })
              )
        )
      );

    return PeerMembership.of({
      discovered,
      expired,
      peers: Ref.get(state).pipe(
        Effect.map((current) =>
          Array.map(
            Array.sort(Array.fromIterable(current.records), byJoinOrder),
            ([peer]) => peer
          )
        )
      ),
      isMember: (peer) =>
        Ref.get(state).pipe(
          Effect.map((current) => HashMap.has(current.records, peer))
        ),
    });
  })
);
