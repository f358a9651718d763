import { Command } from "commander";

import { launchVault, launchVaultInMemory, type Vault } from "@thicket/sqlite-node";

import { describeConfig, dumpRoom, listRooms, markSeen, runGc } from "./commands.js";
import { loadConfig, vaultFile, type Config, type Env } from "./config.js";

export type ProgramIo = {
  env?: Env;
  print?: (line: string) => void;
};

export function createProgram(io: ProgramIo = {}): Command {
  const env = io.env ?? process.env;
  const print = io.print ?? ((line) => console.log(line));

  const program = new Command()
    .name("thicket")
    .description("Inspect and maintain the local message vault.")
    .option("-v, --verbose", "log vault activity");

  async function withVault<T>(run: (vault: Vault, config: Config) => Promise<T>): Promise<T> {
    const config = loadConfig(env);
    const { verbose } = program.opts<{ verbose?: boolean }>();
    const log = verbose ? (line: string) => console.debug(line) : () => {};
    const vault = config.ephemeral
      ? await launchVaultInMemory({ log })
      : await launchVault(vaultFile(config), { log });
    try {
      return await run(vault, config);
    } finally {
      await vault.close();
    }
  }

  program
    .command("rooms")
    .description("list rooms with their unseen message counts")
    .action(async () => {
      const lines = await withVault((vault, config) => listRooms(vault, config.roomsSortOrder));
      lines.forEach(print);
    });

  program
    .command("gc")
    .description("reclaim space and refresh query statistics")
    .action(async () => {
      print(await withVault((vault) => runGc(vault)));
    });

  program
    .command("dump")
    .description("print every message of a room as an indented tree")
    .argument("<room>", "room name")
    .action(async (room: string) => {
      const lines = await withVault((vault) => dumpRoom(vault, room));
      lines.forEach(print);
    });

  program
    .command("mark-seen")
    .description("mark every message of a room as seen")
    .argument("<room>", "room name")
    .action(async (room: string) => {
      print(await withVault((vault) => markSeen(vault, room)));
    });

  program
    .command("config")
    .description("print the resolved configuration")
    .action(() => {
      describeConfig(loadConfig(env)).forEach(print);
    });

  return program;
}
