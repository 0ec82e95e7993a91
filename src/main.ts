import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import * as NodeTerminal from "@effect/platform-node/NodeTerminal";
import * as Terminal from "@effect/platform/Terminal";
import { Context, Effect, Layer } from "effect";
import * as Array from "effect/Array";
import { LoggerLive, NetworkConfig } from "./config";
import { NodeIdentityLive } from "./services/identity";
import { LedgerNode, NodeEvent, NodeLive } from "./services/node";
import { GossipNetworkLive } from "./services/transport";

// Each build gets its own identity, ledger and gossip group
const startNode = Layer.build(
  NodeLive.pipe(Layer.provide(NodeIdentityLive))
).pipe(Effect.map(Context.get(LedgerNode)));

const program = Effect.gen(function* () {
  const { nodeCount } = yield* NetworkConfig;

  yield* Effect.log("Starting local network").pipe(
    Effect.annotateLogs({ nodeCount }),
    Effect.withLogSpan("initialization")
  );

  const nodes = yield* Effect.forEach(Array.range(1, nodeCount), () =>
    startNode
  );
  yield* Effect.forEach(nodes, (node) => Effect.forkScoped(node.run), {
    discard: true,
  });
  yield* Effect.forEach(nodes, (node) => node.submit(NodeEvent.Init()), {
    discard: true,
  });

  const operator = yield* Array.head(nodes);
  yield* Effect.log(
    "commands: ls p | ls c | create b <data> | req <peer> | req all"
  ).pipe(Effect.annotateLogs({ operator: operator.peerId }));

  const terminal = yield* Terminal.Terminal;
  yield* terminal.readLine.pipe(
    Effect.flatMap((input) => operator.submit(NodeEvent.Command({ input }))),
    Effect.forever,
    Effect.catchTag("QuitException", () => Effect.log("Shutting down"))
  );
}).pipe(Effect.scoped, Effect.withSpan("ledger-network"));

program.pipe(
  Effect.orDie,
  Effect.provide(Layer.mergeAll(GossipNetworkLive, NodeTerminal.layer)),
  Effect.provide(LoggerLive),
  NodeRuntime.runMain
);
