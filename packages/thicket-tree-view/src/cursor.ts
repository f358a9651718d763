import type { MsgId } from "@thicket/interface";

/**
 * Where a view is focused.
 *
 * - `bottom`: the live edge below every loaded message.
 * - `msg`: a stored message.
 * - `editor`: composing a reply under `parent` (`null` = top level).
 * - `pseudo`: placeholder for a sent reply that has not arrived yet; sits in the forest as
 *   the last child of `parent`.
 *
 * `comingFrom` is the message to return to when composing is abandoned. Ids are looked up
 * again when needed; they are never references into a tree snapshot.
 */
export type Cursor =
  | { type: "bottom" }
  | { type: "msg"; id: MsgId }
  | { type: "editor"; comingFrom: MsgId | null; parent: MsgId | null }
  | { type: "pseudo"; comingFrom: MsgId | null; parent: MsgId | null };

export function bottom(): Cursor {
  return { type: "bottom" };
}

export function msgCursor(id: MsgId): Cursor {
  return { type: "msg", id };
}

export function editorCursor(comingFrom: MsgId | null, parent: MsgId | null): Cursor {
  return { type: "editor", comingFrom, parent };
}

export function pseudoCursor(comingFrom: MsgId | null, parent: MsgId | null): Cursor {
  return { type: "pseudo", comingFrom, parent };
}

export function isVirtual(cursor: Cursor): cursor is Extract<Cursor, { type: "editor" | "pseudo" }> {
  return cursor.type === "editor" || cursor.type === "pseudo";
}

export function refersTo(cursor: Cursor, id: MsgId): boolean {
  return cursor.type === "msg" && cursor.id === id;
}

/** Whether the cursor is an editor or placeholder rendered as the last child of `id`. */
export function refersToLastChildOf(cursor: Cursor, id: MsgId): boolean {
  return isVirtual(cursor) && cursor.parent === id;
}

export function sameCursor(a: Cursor, b: Cursor): boolean {
  switch (a.type) {
    case "bottom":
      return b.type === "bottom";
    case "msg":
      return b.type === "msg" && a.id === b.id;
    case "editor":
    case "pseudo":
      return isVirtual(b) && b.type === a.type && a.comingFrom === b.comingFrom && a.parent === b.parent;
  }
}
