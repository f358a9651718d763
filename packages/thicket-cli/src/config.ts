import os from "node:os";
import path from "node:path";

export type RoomsSortOrder = "alphabet" | "importance";

export type Config = {
  dataDir: string;
  ephemeral: boolean;
  offline: boolean;
  roomsSortOrder: RoomsSortOrder;
};

export type Env = Record<string, string | undefined>;

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

function parseBool(env: Env, name: string): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return false;
  const value = raw.trim().toLowerCase();
  if (TRUTHY.has(value)) return true;
  if (FALSY.has(value)) return false;
  throw new Error(`invalid ${name}: ${raw}`);
}

function parseSortOrder(raw: string | undefined): RoomsSortOrder {
  if (raw === undefined || raw === "") return "alphabet";
  if (raw === "alphabet" || raw === "importance") return raw;
  throw new Error(`invalid THICKET_ROOMS_SORT_ORDER: ${raw} (allowed: alphabet, importance)`);
}

export function defaultDataDir(env: Env, home: string): string {
  const xdg = env.XDG_DATA_HOME;
  return xdg ? path.join(xdg, "thicket") : path.join(home, ".local", "share", "thicket");
}

export function loadConfig(env: Env = process.env, home: string = os.homedir()): Config {
  return {
    dataDir: path.resolve(env.THICKET_DATA_DIR || defaultDataDir(env, home)),
    ephemeral: parseBool(env, "THICKET_EPHEMERAL"),
    offline: parseBool(env, "THICKET_OFFLINE"),
    roomsSortOrder: parseSortOrder(env.THICKET_ROOMS_SORT_ORDER),
  };
}

export function vaultFile(config: Config): string {
  return path.join(config.dataDir, "vault.db");
}
