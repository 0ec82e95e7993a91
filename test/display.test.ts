import { assert, describe, it } from "@effect/vitest";
import { Effect } from "effect";
import * as Block from "../src/entities/block";
import * as Chain from "../src/entities/chain";
import * as Peer from "../src/entities/peer";
import {
  displayChain,
  displayPeers,
  renderChain,
  shortenHash,
} from "../src/services/display";
import { createMockLogger } from "./utils/mock_logger";

describe("display", () => {
  describe("shortenHash", () => {
    it("keeps the head and tail of a long hash", () => {
      assert.strictEqual(shortenHash(Block.GENESIS.hash), "0000f8...4c43");
    });

    it("leaves short values alone", () => {
      assert.strictEqual(shortenHash("genesis"), "genesis");
      assert.strictEqual(shortenHash("abcdefghijklm"), "abcdefghijklm");
      assert.strictEqual(shortenHash("abcdefghijklmn"), "abcdef...klmn");
    });
  });

  it("renders one column per block", () => {
    const second = Block.make({
      id: 1,
      hash: "00001111222233334444",
      previousHash: Block.GENESIS.hash,
      timestamp: 1,
      data: "next",
      nonce: 3,
    });

    assert.strictEqual(
      renderChain(Chain.fromBlocks(Block.GENESIS, second)),
      [
        "[Block 0] → [Block 1]",
        "Hash: 0000f8...4c43 Hash: 000011...4444",
        "Data: genesis! Data: next",
      ].join("\n")
    );
  });

  it.effect("logs the chain and the peer list", () => {
    const { mockLoggerLayer, messages } = createMockLogger();

    return Effect.gen(function* () {
      yield* displayChain(Chain.genesisOnly());
      yield* displayPeers([Peer.PeerId("node-b")]);

      assert.deepStrictEqual(messages, [
        "Local Blockchain:\n[Block 0]\nHash: 0000f8...4c43\nData: genesis!",
        "Discovered Peers:",
      ]);
    }).pipe(Effect.provide(mockLoggerLayer));
  });
});
