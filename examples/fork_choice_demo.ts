import { Context, Effect, Layer } from "effect";
import * as Chunk from "effect/Chunk";
import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import * as Chain from "../src/entities/chain";
import { LoggerLive } from "../src/config";
import { HashingServiceLive } from "../src/services/hash";
import { NodeIdentityLive } from "../src/services/identity";
import { Miner, MinerLive } from "../src/services/miner";
import { LedgerNode, NodeEvent, NodeFrom } from "../src/services/node";
import { GossipNetworkLive } from "../src/services/transport";

const banner = (title: string) =>
  Effect.logInfo(`\n${"=".repeat(70)}\n${title}\n${"=".repeat(70)}\n`);

// Two ledgers sharing only genesis
const mineFork = (label: string, length: number) =>
  Effect.gen(function* () {
    const miner = yield* Miner;
    let chain = Chain.genesisOnly();
    for (let i = 1; i <= length; i++) {
      const block = yield* miner.mine(Chain.latest(chain), `${label} ${i}`);
      chain = Chunk.append(chain, block);
    }
    return chain;
  });

const startNode = (initial: Chain.Chain) =>
  Layer.build(
    NodeFrom(initial).pipe(Layer.provide(NodeIdentityLive))
  ).pipe(Effect.map(Context.get(LedgerNode)));

const program = Effect.gen(function* () {
  yield* banner("FORK CHOICE DEMONSTRATION");

  yield* Effect.log("Mining two competing forks from genesis...");
  const shortFork = yield* mineFork("alpha", 2);
  const longFork = yield* mineFork("beta", 3);

  const alpha = yield* startNode(shortFork);
  const beta = yield* startNode(longFork);
  yield* Effect.forEach([alpha, beta], (node) => Effect.forkScoped(node.run), {
    discard: true,
  });

  yield* banner("BEFORE RECONCILIATION");
  yield* alpha.submit(NodeEvent.Command({ input: "ls c" }));
  yield* beta.submit(NodeEvent.Command({ input: "ls c" }));
  yield* Effect.sleep("200 millis");

  yield* banner("REQUESTING CHAINS");
  yield* alpha.submit(NodeEvent.Command({ input: "req all" }));
  yield* beta.submit(NodeEvent.Command({ input: "req all" }));
  yield* Effect.sleep("500 millis");

  yield* banner("AFTER RECONCILIATION");
  yield* alpha.submit(NodeEvent.Command({ input: "ls c" }));
  yield* beta.submit(NodeEvent.Command({ input: "ls c" }));
  yield* Effect.sleep("200 millis");

  yield* Effect.log("Both nodes now follow the longer fork").pipe(
    Effect.annotateLogs({ latest: Chain.latest(longFork).hash })
  );
}).pipe(Effect.scoped);

program.pipe(
  Effect.provide(MinerLive),
  Effect.provide(HashingServiceLive),
  Effect.provide(GossipNetworkLive),
  Effect.provide(LoggerLive),
  NodeRuntime.runMain
);
