import { NavigationError, NotFoundError, pathRoot } from "@thicket/interface";
import type { Msg, MsgId, MsgStore, Tree } from "@thicket/interface";

import { bottom, editorCursor, msgCursor, pseudoCursor, type Cursor } from "./cursor.js";

/** Pending request to the renderer, resolved once against the real viewport. */
export type Correction = "makeCursorVisible" | "moveCursorToVisibleArea" | "centerCursor";

/** Where a new reply attaches. `parent: null` is a new top-level message. */
export type ReplyTarget = { parent: MsgId | null };

export type TreeViewOptions = {
  /** Throw `NavigationError` on impossible states instead of ignoring the move. */
  strict?: boolean;
  log?: (line: string) => void;
};

type Position<M extends Msg> = { tree: Tree<M>; id: MsgId };

function firstChild<M extends Msg>(folded: ReadonlySet<MsgId>, tree: Tree<M>, id: MsgId): MsgId | undefined {
  if (folded.has(id)) return undefined;
  return tree.children(id)?.[0];
}

function lastChild<M extends Msg>(folded: ReadonlySet<MsgId>, tree: Tree<M>, id: MsgId): MsgId | undefined {
  if (folded.has(id)) return undefined;
  const children = tree.children(id);
  return children?.[children.length - 1];
}

function lastDescendant<M extends Msg>(folded: ReadonlySet<MsgId>, tree: Tree<M>, id: MsgId): MsgId {
  let current = id;
  for (let child = lastChild(folded, tree, current); child !== undefined; child = lastChild(folded, tree, current)) {
    current = child;
  }
  return current;
}

/**
 * Cursor, fold set and scroll state of one view onto a message forest.
 *
 * Movements are serialized: a movement started while another is still waiting on the store
 * runs after it. Each movement replaces the cursor in one step and leaves a `Correction`
 * behind; a movement with nowhere to go leaves the cursor as it was. Store failures reject
 * the movement unchanged.
 *
 * The synchronous methods (`setCursor`, folding, `cancelEditor`, `sendEditor`,
 * `confirmSent`) take effect immediately. A movement still waiting on the store when one of
 * them runs is dropped instead of overwriting the newer state.
 */
export class TreeViewState<M extends Msg = Msg> {
  readonly folded = new Set<MsgId>();

  private current: Cursor = bottom();
  private scrollOffset = 0;
  private pendingCorrection: Correction | null = null;
  private queue: Promise<void> = Promise.resolve();
  private revision = 0;
  private movementRevision = 0;
  private readonly strict: boolean;
  private readonly log: (line: string) => void;

  constructor(
    readonly store: MsgStore<M>,
    opts: TreeViewOptions = {}
  ) {
    this.strict = opts.strict ?? false;
    this.log = opts.log ?? ((line) => console.debug(line));
  }

  get cursor(): Cursor {
    return this.current;
  }

  get scroll(): number {
    return this.scrollOffset;
  }

  get correction(): Correction | null {
    return this.pendingCorrection;
  }

  setCursor(cursor: Cursor): void {
    this.revision += 1;
    this.current = cursor;
  }

  /** Hand the accumulated scroll offset to the renderer. */
  takeScroll(): number {
    const scroll = this.scrollOffset;
    this.scrollOffset = 0;
    return scroll;
  }

  takeCorrection(): Correction | null {
    const correction = this.pendingCorrection;
    this.pendingCorrection = null;
    return correction;
  }

  // Folding

  isFolded(id: MsgId): boolean {
    return this.folded.has(id);
  }

  fold(id: MsgId): void {
    this.revision += 1;
    this.folded.add(id);
    this.pendingCorrection = "makeCursorVisible";
  }

  unfold(id: MsgId): void {
    this.revision += 1;
    this.folded.delete(id);
    this.pendingCorrection = "makeCursorVisible";
  }

  toggleFold(id: MsgId): void {
    if (this.folded.has(id)) this.unfold(id);
    else this.fold(id);
  }

  // Depth-first movement

  moveCursorUp(): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      switch (cursor.type) {
        case "bottom":
          await this.moveToLastMsg();
          break;
        case "pseudo":
          if (cursor.parent === null) {
            await this.moveToLastMsg();
          } else {
            const pos = await this.position(cursor.parent);
            if (pos) this.moveTo(msgCursor(lastDescendant(this.folded, pos.tree, pos.id)));
          }
          break;
        case "msg": {
          const pos = await this.position(cursor.id);
          const prev = pos && (await this.findPrevMsg(pos));
          if (prev) this.moveTo(msgCursor(prev.id));
          break;
        }
        case "editor":
          break;
      }
      this.correct("makeCursorVisible");
    });
  }

  moveCursorDown(): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      switch (cursor.type) {
        case "msg": {
          const pos = await this.position(cursor.id);
          if (pos) {
            const next = await this.findNextMsg(pos);
            this.moveTo(next ? msgCursor(next.id) : bottom());
          }
          break;
        }
        case "pseudo":
          if (cursor.parent === null) {
            this.moveTo(bottom());
          } else {
            const pos = await this.position(cursor.parent);
            if (pos) {
              // The placeholder sits right after the parent's last descendant.
              const before = { tree: pos.tree, id: lastDescendant(this.folded, pos.tree, pos.id) };
              const next = await this.findNextMsg(before);
              this.moveTo(next ? msgCursor(next.id) : bottom());
            }
          }
          break;
        case "bottom":
        case "editor":
          break;
      }
      this.correct("makeCursorVisible");
    });
  }

  // Same-depth movement

  moveCursorUpSibling(): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      switch (cursor.type) {
        case "bottom":
          await this.moveToLastRoot();
          break;
        case "pseudo":
          if (cursor.parent === null) {
            await this.moveToLastRoot();
          } else {
            const pos = await this.position(cursor.parent);
            const children = pos?.tree.children(pos.id);
            const last = children?.[children.length - 1];
            if (last !== undefined) this.moveTo(msgCursor(last));
          }
          break;
        case "msg": {
          const pos = await this.position(cursor.id);
          const prev = pos && (await this.findPrevSibling(pos));
          if (prev) this.moveTo(msgCursor(prev.id));
          break;
        }
        case "editor":
          break;
      }
      this.correct("makeCursorVisible");
    });
  }

  moveCursorDownSibling(): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      switch (cursor.type) {
        case "msg": {
          const pos = await this.position(cursor.id);
          if (pos) {
            const next = await this.findNextSibling(pos);
            if (next) this.moveTo(msgCursor(next.id));
            else if (pos.tree.parent(pos.id) === undefined) this.moveTo(bottom());
          }
          break;
        }
        case "pseudo":
          if (cursor.parent === null) this.moveTo(bottom());
          break;
        case "bottom":
        case "editor":
          break;
      }
      this.correct("makeCursorVisible");
    });
  }

  // Structural jumps

  moveCursorToParent(): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      switch (cursor.type) {
        case "editor":
        case "pseudo":
          if (cursor.parent !== null) this.moveTo(msgCursor(cursor.parent));
          break;
        case "msg": {
          const pos = await this.position(cursor.id);
          const parent = pos?.tree.parent(pos.id);
          if (parent !== undefined) this.moveTo(msgCursor(parent));
          break;
        }
        case "bottom":
          break;
      }
      this.correct("makeCursorVisible");
    });
  }

  moveCursorToRoot(): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      switch (cursor.type) {
        case "editor":
        case "pseudo":
          if (cursor.parent !== null) this.moveTo(msgCursor(pathRoot(await this.store.path(cursor.parent))));
          break;
        case "msg":
          this.moveTo(msgCursor(pathRoot(await this.store.path(cursor.id))));
          break;
        case "bottom":
          break;
      }
      this.correct("makeCursorVisible");
    });
  }

  moveCursorToTop(): Promise<void> {
    return this.serialize(async () => {
      const first = await this.store.firstRootId();
      if (first !== null) {
        this.moveTo(msgCursor(first));
        this.correct("makeCursorVisible");
      }
    });
  }

  moveCursorToBottom(): Promise<void> {
    return this.serialize(async () => {
      this.moveTo(bottom());
      this.correct("makeCursorVisible");
    });
  }

  // Chronological movement

  moveCursorOlder(): Promise<void> {
    return this.moveChronologically(
      (id) => this.store.olderMsgId(id),
      () => this.store.newestMsgId()
    );
  }

  moveCursorNewer(): Promise<void> {
    return this.moveChronologicallyNewer((id) => this.store.newerMsgId(id));
  }

  moveCursorOlderUnseen(): Promise<void> {
    return this.moveChronologically(
      (id) => this.store.olderUnseenMsgId(id),
      () => this.store.newestUnseenMsgId()
    );
  }

  moveCursorNewerUnseen(): Promise<void> {
    return this.moveChronologicallyNewer((id) => this.store.newerUnseenMsgId(id));
  }

  // Scrolling

  scrollUp(amount: number): void {
    this.scrollOffset += amount;
    this.pendingCorrection = "moveCursorToVisibleArea";
  }

  scrollDown(amount: number): void {
    this.scrollOffset -= amount;
    this.pendingCorrection = "moveCursorToVisibleArea";
  }

  centerCursor(): void {
    this.pendingCorrection = "centerCursor";
  }

  // Replies

  /**
   * Reply target for a plain reply.
   *
   * A message with later siblings is replied to directly, so the reply does not end up far
   * below in the thread. Otherwise the reply goes to the parent to keep threads shallow. A
   * root without a parent is replied to directly. From the bottom the reply is top-level;
   * virtual cursors have no target.
   */
  parentForNormalReply(): Promise<ReplyTarget | null> {
    return this.serialize(() => this.replyTarget(false));
  }

  /** The opposite choice of `parentForNormalReply`, except at the root. */
  parentForAlternateReply(): Promise<ReplyTarget | null> {
    return this.serialize(() => this.replyTarget(true));
  }

  replyNormal(): Promise<void> {
    return this.serialize(() => this.openEditor(false));
  }

  replyAlternate(): Promise<void> {
    return this.serialize(() => this.openEditor(true));
  }

  /** Leave the editor, or give up on a placeholder, returning to where composing started. */
  cancelEditor(): void {
    const cursor = this.current;
    if (cursor.type !== "editor" && cursor.type !== "pseudo") return;
    this.revision += 1;
    this.current = cursor.comingFrom === null ? bottom() : msgCursor(cursor.comingFrom);
    this.pendingCorrection = "makeCursorVisible";
  }

  /** Turn the editor into a placeholder while the message is in flight. */
  sendEditor(): ReplyTarget | null {
    const cursor = this.current;
    if (cursor.type !== "editor") return null;
    this.revision += 1;
    this.current = pseudoCursor(cursor.comingFrom, cursor.parent);
    this.pendingCorrection = "makeCursorVisible";
    return { parent: cursor.parent };
  }

  /** The message behind the placeholder has been stored. */
  confirmSent(id: MsgId): void {
    if (this.current.type !== "pseudo") return;
    this.revision += 1;
    this.current = msgCursor(id);
    this.pendingCorrection = "makeCursorVisible";
  }

  // Internals

  private serialize<T>(op: () => Promise<T>): Promise<T> {
    const result = this.queue.then(() => {
      this.movementRevision = this.revision;
      return op();
    });
    const settle = () => {};
    this.queue = result.then(settle, settle);
    return result;
  }

  /** Whether nothing changed the view directly since the running movement started. */
  private get undisturbed(): boolean {
    return this.revision === this.movementRevision;
  }

  private moveTo(cursor: Cursor): void {
    if (this.undisturbed) this.current = cursor;
  }

  private correct(correction: Correction): void {
    if (this.undisturbed) this.pendingCorrection = correction;
  }

  private impossible(what: string): undefined {
    if (this.strict) throw new NavigationError(what);
    this.log(`ignoring impossible navigation: ${what}`);
    return undefined;
  }

  /** Fresh root tree containing `id`, located through its path. */
  private async position(id: MsgId): Promise<Position<M> | undefined> {
    const root = pathRoot(await this.store.path(id));
    const tree = await this.store.tree(root);
    if (!tree.has(id)) return this.impossible(`${id} is missing from its root tree ${root}`);
    return { tree, id };
  }

  /** Tree of a root id the store just handed out. */
  private async rootTree(root: MsgId): Promise<Tree<M> | undefined> {
    try {
      return await this.store.tree(root);
    } catch (err) {
      if (err instanceof NotFoundError) return this.impossible(`root ${root} vanished`);
      throw err;
    }
  }

  private async moveToLastMsg(): Promise<void> {
    const last = await this.store.lastRootId();
    if (last === null) return;
    const tree = await this.rootTree(last);
    if (tree) this.moveTo(msgCursor(lastDescendant(this.folded, tree, last)));
  }

  private async moveToLastRoot(): Promise<void> {
    const last = await this.store.lastRootId();
    if (last !== null) this.moveTo(msgCursor(last));
  }

  private async findPrevSibling(pos: Position<M>): Promise<Position<M> | undefined> {
    const prev = pos.tree.prevSibling(pos.id);
    if (prev !== undefined) return { tree: pos.tree, id: prev };
    if (pos.tree.parent(pos.id) !== undefined) return undefined;

    const prevRoot = await this.store.prevRootId(pos.tree.root());
    if (prevRoot === null) return undefined;
    const tree = await this.rootTree(prevRoot);
    return tree && { tree, id: prevRoot };
  }

  private async findNextSibling(pos: Position<M>): Promise<Position<M> | undefined> {
    const next = pos.tree.nextSibling(pos.id);
    if (next !== undefined) return { tree: pos.tree, id: next };
    if (pos.tree.parent(pos.id) !== undefined) return undefined;

    const nextRoot = await this.store.nextRootId(pos.tree.root());
    if (nextRoot === null) return undefined;
    const tree = await this.rootTree(nextRoot);
    return tree && { tree, id: nextRoot };
  }

  /** Pre-order predecessor, skipping folded subtrees. */
  private async findPrevMsg(pos: Position<M>): Promise<Position<M> | undefined> {
    const prev = await this.findPrevSibling(pos);
    if (prev) return { tree: prev.tree, id: lastDescendant(this.folded, prev.tree, prev.id) };
    const parent = pos.tree.parent(pos.id);
    return parent === undefined ? undefined : { tree: pos.tree, id: parent };
  }

  /** Pre-order successor, skipping folded subtrees. */
  private async findNextMsg(pos: Position<M>): Promise<Position<M> | undefined> {
    const child = firstChild(this.folded, pos.tree, pos.id);
    if (child !== undefined) return { tree: pos.tree, id: child };

    const next = await this.findNextSibling(pos);
    if (next) return next;

    let current = pos.id;
    for (let parent = pos.tree.parent(current); parent !== undefined; parent = pos.tree.parent(current)) {
      current = parent;
      const sibling = await this.findNextSibling({ tree: pos.tree, id: current });
      if (sibling) return sibling;
    }
    return undefined;
  }

  private moveChronologically(
    step: (id: MsgId) => Promise<MsgId | null>,
    newest: () => Promise<MsgId | null>
  ): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      if (cursor.type === "msg") {
        const id = await step(cursor.id);
        if (id !== null) this.moveTo(msgCursor(id));
      } else {
        const id = await newest();
        if (id !== null) this.moveTo(msgCursor(id));
      }
      this.correct("makeCursorVisible");
    });
  }

  private moveChronologicallyNewer(step: (id: MsgId) => Promise<MsgId | null>): Promise<void> {
    return this.serialize(async () => {
      const cursor = this.current;
      if (cursor.type === "msg") {
        const id = await step(cursor.id);
        this.moveTo(id === null ? bottom() : msgCursor(id));
      } else if (cursor.type === "pseudo") {
        this.moveTo(bottom());
      }
      this.correct("makeCursorVisible");
    });
  }

  private async replyTarget(alternate: boolean): Promise<ReplyTarget | null> {
    const cursor = this.current;
    if (cursor.type === "bottom") return { parent: null };
    if (cursor.type !== "msg") return null;

    const pos = await this.position(cursor.id);
    if (!pos) return null;
    const hasNextSibling = pos.tree.nextSibling(pos.id) !== undefined;
    const parent = pos.tree.parent(pos.id);
    if (hasNextSibling !== alternate || parent === undefined) return { parent: pos.id };
    return { parent };
  }

  private async openEditor(alternate: boolean): Promise<void> {
    const target = await this.replyTarget(alternate);
    if (!target) return;
    const cursor = this.current;
    const comingFrom = cursor.type === "msg" ? cursor.id : null;
    this.moveTo(editorCursor(comingFrom, target.parent));
    this.correct("makeCursorVisible");
  }
}
