export class ThicketError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A referenced message or root tree does not exist (possibly deleted concurrently). */
export class NotFoundError extends ThicketError {
  constructor(readonly id: string) {
    super(`message not found: ${id}`);
  }
}

/** I/O or constraint failure inside a single unit of work. */
export class StoreError extends ThicketError {}

/** Fatal: the schema could not be brought to the version this code understands. */
export class MigrationError extends ThicketError {
  constructor(
    readonly version: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Raised instead of a silent no-op when navigation runs in strict mode. */
export class NavigationError extends ThicketError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
