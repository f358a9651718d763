import type Database from "better-sqlite3";

import { MigrationError, StoreError, ThicketError, errorMessage } from "@thicket/interface";

/**
 * A unit of work. Runs with exclusive access to the connection.
 *
 * Units are synchronous: work after an `await` would run outside the exclusive slot, so a
 * unit returning a promise does not type-check.
 */
export type Action<T> = (db: Database.Database) => T extends PromiseLike<unknown> ? never : T;

/** Moves the schema from version N to N+1. Runs inside a transaction. */
export type Migration = (db: Database.Database) => void;

export type Prepare = (db: Database.Database) => void;

export type VaultActorOptions = {
  log?: (line: string) => void;
};

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function toStoreError(err: unknown): ThicketError {
  if (err instanceof ThicketError) return err;
  return new StoreError(errorMessage(err), { cause: err });
}

export function schemaVersion(db: Database.Database): number {
  return Number(db.pragma("user_version", { simple: true }));
}

/**
 * Apply every migration the database has not seen yet, each in its own transaction.
 *
 * `user_version` records how many migrations have been applied.
 */
export function migrate(
  db: Database.Database,
  migrations: readonly Migration[],
  log: (line: string) => void = () => {}
): number {
  let version: number;
  try {
    version = schemaVersion(db);
  } catch (err) {
    throw new MigrationError(0, `reading vault schema version failed: ${errorMessage(err)}`, { cause: err });
  }
  if (version > migrations.length) {
    throw new MigrationError(
      version,
      `vault schema version ${version} is newer than the supported version ${migrations.length}`
    );
  }

  for (let i = version; i < migrations.length; i++) {
    const migration = migrations[i]!;
    const target = i + 1;
    try {
      db.transaction(() => {
        migration(db);
        db.pragma(`user_version = ${target}`);
      })();
    } catch (err) {
      throw new MigrationError(target, `migrating vault to version ${target} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    log(`Migrated vault to version ${target}`);
  }
  return migrations.length;
}

/**
 * Sole owner of a better-sqlite3 connection.
 *
 * Units of work run one at a time, strictly in submission order, each on its own turn of the
 * event loop. A failing unit only rejects its own caller. `stop()` lets everything already
 * queued finish before the connection is closed.
 */
export class VaultActor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private stopping: Promise<void> | null = null;

  private constructor(
    private readonly db: Database.Database,
    private readonly log: (line: string) => void
  ) {}

  /**
   * Migrate, prepare and start serving the connection.
   *
   * Any failure closes the connection: a migration failure raises `MigrationError`, a
   * preparation failure `StoreError`.
   */
  static launchAndPrepare(
    db: Database.Database,
    migrations: readonly Migration[],
    prepare: Prepare,
    opts: VaultActorOptions = {}
  ): VaultActor {
    const log = opts.log ?? ((line) => console.debug(line));
    try {
      migrate(db, migrations, log);
    } catch (err) {
      db.close();
      throw err;
    }
    try {
      prepare(db);
    } catch (err) {
      db.close();
      throw new StoreError(`preparing vault failed: ${errorMessage(err)}`, { cause: err });
    }
    return new VaultActor(db, log);
  }

  get stopped(): boolean {
    return this.stopping !== null;
  }

  /** Units submitted but not finished yet. */
  get pending(): number {
    return this.queued;
  }

  execute<T>(action: Action<T>): Promise<T> {
    if (this.stopping) return Promise.reject(new StoreError("vault is stopped"));

    this.queued += 1;
    const result = this.tail.then(() => this.run(action));
    const settle = () => {
      this.queued -= 1;
    };
    this.tail = result.then(settle, settle);
    return result;
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.tail.then(() => {
        this.db.close();
        this.log("Vault closed");
      });
    }
    return this.stopping;
  }

  private async run<T>(action: Action<T>): Promise<T> {
    await nextTurn();
    try {
      return action(this.db);
    } catch (err) {
      throw toStoreError(err);
    }
  }
}
