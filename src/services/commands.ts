/**
 * Operator commands typed at the node's terminal.
 *
 * - `ls p` — list the gossip group
 * - `ls c` — print the local chain
 * - `create b <data>` — mine a block carrying `<data>`
 * - `req <peer>` — ask one peer for its chain
 * - `req all` — ask every peer in the gossip group for its chain
 *
 * @module Commands
 * @since 0.1.0
 */

import { Data } from "effect";
import * as Either from "effect/Either";
import { UnknownCommand } from "../entities/errors";
import * as Peer from "../entities/peer";

export type Command = Data.TaggedEnum<{
  ListPeers: {};
  ListChain: {};
  CreateBlock: { readonly data: string };
  RequestChain: { readonly peer: Peer.PeerId };
  RequestAll: {};
}>;

export const Command = Data.taggedEnum<Command>();

const CREATE_BLOCK = "create b ";
const REQUEST = "req ";

export const parseCommand = (
  input: string
): Either.Either<Command, UnknownCommand> => {
  const line = input.trim();

  if (line === "ls p") return Either.right(Command.ListPeers());
  if (line === "ls c") return Either.right(Command.ListChain());

  if (line.startsWith(CREATE_BLOCK)) {
    const data = line.slice(CREATE_BLOCK.length).trim();
    if (data.length > 0) return Either.right(Command.CreateBlock({ data }));
  }

  if (line.startsWith(REQUEST)) {
    const target = line.slice(REQUEST.length).trim();
    if (target === "all") return Either.right(Command.RequestAll());
    if (target.length > 0)
      return Either.right(Command.RequestChain({ peer: Peer.PeerId(target) }));
  }

  return Either.left(new UnknownCommand({ input: line }));
};
