import { Effect } from "effect";
import * as Chunk from "effect/Chunk";
import type * as Chain from "../entities/chain";
import type * as Peer from "../entities/peer";

export const shortenHash = (
  hash: string,
  prefixLen = 6,
  suffixLen = 4
): string => {
  if (hash.length <= prefixLen + suffixLen + 3) return hash;
  return `${hash.slice(0, prefixLen)}...${hash.slice(-suffixLen)}`;
};

/** Pure: ASCII rendering of a chain, one column per block */
export const renderChain = (chain: Chain.Chain): string => {
  const blocks = Chunk.toReadonlyArray(chain);

  const blockLine = blocks.map((block) => `[Block ${block.id}]`).join(" → ");
  const hashLine = blocks
    .map((block) => `Hash: ${shortenHash(block.hash)}`)
    .join(" ");
  const dataLine = blocks.map((block) => `Data: ${block.data}`).join(" ");

  return `${blockLine}\n${hashLine}\n${dataLine}`;
};

export const displayChain = (chain: Chain.Chain) =>
  Effect.log(`Local Blockchain:\n${renderChain(chain)}`).pipe(
    Effect.annotateLogs({ totalBlocks: Chunk.size(chain) }),
    Effect.withLogSpan("displayChain")
  );

export const displayPeers = (peers: ReadonlyArray<Peer.PeerId>) =>
  Effect.log("Discovered Peers:").pipe(
    Effect.annotateLogs({ count: peers.length, peers }),
    Effect.withLogSpan("displayPeers")
  );
