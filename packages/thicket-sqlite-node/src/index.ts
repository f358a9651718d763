export { VaultActor, migrate, schemaVersion } from "./actor.js";
export type { Action, Migration, Prepare, VaultActorOptions } from "./actor.js";
export { MIGRATIONS } from "./migrate.js";
export { prepare } from "./prepare.js";
export { RoomVault } from "./room.js";
export type { AddMsgsOptions, StoredMsg } from "./room.js";
export { Vault, launchVault, launchVaultInMemory } from "./vault.js";
export type { VaultOptions } from "./vault.js";
