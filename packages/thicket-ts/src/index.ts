import type { Tree } from "./tree.js";

export type MsgId = string;

/** Unix seconds. */
export type Time = number;

export type Msg = {
  id: MsgId;
  parent: MsgId | null;
  time: Time;
  nick: string;
  content: string;
};

/**
 * Ids from the containing root down to the requested message.
 *
 * Element 0 is always the root, the last element is the message itself.
 */
export type Path = readonly [MsgId, ...MsgId[]];

export function pathRoot(path: Path): MsgId {
  return path[0];
}

/**
 * Read side of a message forest.
 *
 * Roots are ordered by id, messages chronologically by `(time, id)`. Methods that take an id
 * reject with `NotFoundError` when the id is unknown; `null` means "no such neighbour".
 */
export interface MsgStore<M extends Msg = Msg> {
  path(id: MsgId): Promise<Path>;
  tree(id: MsgId): Promise<Tree<M>>;

  firstRootId(): Promise<MsgId | null>;
  lastRootId(): Promise<MsgId | null>;
  prevRootId(root: MsgId): Promise<MsgId | null>;
  nextRootId(root: MsgId): Promise<MsgId | null>;

  olderMsgId(id: MsgId): Promise<MsgId | null>;
  newerMsgId(id: MsgId): Promise<MsgId | null>;
  newestMsgId(): Promise<MsgId | null>;

  olderUnseenMsgId(id: MsgId): Promise<MsgId | null>;
  newerUnseenMsgId(id: MsgId): Promise<MsgId | null>;
  newestUnseenMsgId(): Promise<MsgId | null>;
}

export * from "./tree.js";
export * from "./errors.js";
