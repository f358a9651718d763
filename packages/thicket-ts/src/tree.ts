import type { Msg, MsgId } from "./index.js";

/**
 * Snapshot of one root tree.
 *
 * Built from the messages of a single root tree; children keep the order in which their
 * messages were passed in. A message whose parent is not part of the snapshot is treated
 * as the root, so at most one such message may be present.
 *
 * A snapshot goes stale as soon as the store is written to. Re-fetch instead of holding
 * on to one across an `await` that could observe new messages.
 */
export class Tree<M extends Msg = Msg> {
  private readonly msgs = new Map<MsgId, M>();
  private readonly childrenById = new Map<MsgId, MsgId[]>();
  private readonly rootId: MsgId;

  constructor(root: MsgId, msgs: Iterable<M>) {
    for (const msg of msgs) this.msgs.set(msg.id, msg);
    if (!this.msgs.has(root)) throw new Error(`root ${root} is not part of the tree`);
    this.rootId = root;

    for (const msg of this.msgs.values()) {
      if (msg.id === root || msg.parent === null) continue;
      if (!this.msgs.has(msg.parent)) continue;
      const siblings = this.childrenById.get(msg.parent);
      if (siblings) siblings.push(msg.id);
      else this.childrenById.set(msg.parent, [msg.id]);
    }
  }

  root(): MsgId {
    return this.rootId;
  }

  size(): number {
    return this.msgs.size;
  }

  has(id: MsgId): boolean {
    return this.msgs.has(id);
  }

  msg(id: MsgId): M | undefined {
    return this.msgs.get(id);
  }

  parent(id: MsgId): MsgId | undefined {
    if (id === this.rootId) return undefined;
    const parent = this.msgs.get(id)?.parent;
    if (parent === null || parent === undefined || !this.msgs.has(parent)) return undefined;
    return parent;
  }

  children(id: MsgId): readonly MsgId[] | undefined {
    return this.childrenById.get(id);
  }

  /** Ids sharing `id`'s parent, including `id`. The root is its own only sibling. */
  siblings(id: MsgId): readonly MsgId[] | undefined {
    if (!this.msgs.has(id)) return undefined;
    const parent = this.parent(id);
    if (parent === undefined) return [id];
    return this.childrenById.get(parent);
  }

  prevSibling(id: MsgId): MsgId | undefined {
    const siblings = this.siblings(id);
    if (!siblings) return undefined;
    const index = siblings.indexOf(id);
    return index > 0 ? siblings[index - 1] : undefined;
  }

  nextSibling(id: MsgId): MsgId | undefined {
    const siblings = this.siblings(id);
    if (!siblings) return undefined;
    const index = siblings.indexOf(id);
    return index >= 0 ? siblings[index + 1] : undefined;
  }

  /** Depth of `id` below the root (root = 0). */
  depth(id: MsgId): number | undefined {
    if (!this.msgs.has(id)) return undefined;
    let depth = 0;
    let current = this.parent(id);
    while (current !== undefined) {
      depth += 1;
      current = this.parent(current);
    }
    return depth;
  }

  /** Pre-order walk of the whole tree. */
  *walk(): Generator<{ id: MsgId; depth: number }> {
    const stack: Array<{ id: MsgId; depth: number }> = [{ id: this.rootId, depth: 0 }];
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;
      yield entry;
      const kids = this.childrenById.get(entry.id) ?? [];
      for (let i = kids.length - 1; i >= 0; i--) {
        stack.push({ id: kids[i]!, depth: entry.depth + 1 });
      }
    }
  }
}
