import { ThicketError } from "@thicket/interface";
import type { RoomVault, StoredMsg, Vault } from "@thicket/sqlite-node";

import { vaultFile, type Config, type RoomsSortOrder } from "./config.js";

export type RoomSummary = { name: string; unseen: number };

export function sortRooms(rooms: readonly RoomSummary[], order: RoomsSortOrder): RoomSummary[] {
  const byName = (a: RoomSummary, b: RoomSummary) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
  const sorted = [...rooms];
  if (order === "importance") sorted.sort((a, b) => b.unseen - a.unseen || byName(a, b));
  else sorted.sort(byName);
  return sorted;
}

export async function listRooms(vault: Vault, order: RoomsSortOrder): Promise<string[]> {
  const names = await vault.rooms();
  const summaries = await Promise.all(
    names.map(async (name) => ({ name, unseen: await vault.room(name).unseenMsgsCount() }))
  );
  return sortRooms(summaries, order).map((room) =>
    room.unseen > 0 ? `${room.name} (${room.unseen} unseen)` : room.name
  );
}

async function requireRoom(vault: Vault, name: string): Promise<RoomVault> {
  const rooms = await vault.rooms();
  if (!rooms.includes(name)) throw new ThicketError(`unknown room: ${name}`);
  return vault.room(name);
}

export function formatMsg(msg: StoredMsg, depth: number): string {
  const content = msg.deleted === null ? msg.content : "(deleted)";
  return `${"  ".repeat(depth)}[${msg.id}] ${msg.nick}: ${content}`;
}

/** Every root tree of the room in root order, depth-first. */
export async function dumpRoom(vault: Vault, name: string): Promise<string[]> {
  const room = await requireRoom(vault, name);
  const lines: string[] = [];
  for (let root = await room.firstRootId(); root !== null; root = await room.nextRootId(root)) {
    const tree = await room.tree(root);
    for (const { id, depth } of tree.walk()) {
      const msg = tree.msg(id);
      if (msg) lines.push(formatMsg(msg, depth));
    }
  }
  return lines;
}

export async function markSeen(vault: Vault, name: string): Promise<string> {
  const room = await requireRoom(vault, name);
  const changed = await room.setAllSeen(true);
  return `marked ${changed} message(s) seen in ${name}`;
}

export async function runGc(vault: Vault): Promise<string> {
  const started = Date.now();
  await vault.gc();
  return `gc finished in ${Date.now() - started}ms`;
}

export function describeConfig(config: Config): string[] {
  return [
    `data dir: ${config.dataDir}`,
    `vault: ${config.ephemeral ? "in memory" : vaultFile(config)}`,
    `offline: ${config.offline}`,
    `rooms sort order: ${config.roomsSortOrder}`,
  ];
}
