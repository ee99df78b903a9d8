// worldcore/world/WorldErrors.ts

export type WorldIntegrityKind = "duplicate_id" | "duplicate_name" | "invalid_definition";

/**
 * Map definitions that cannot form a consistent world.
 * Fatal to startup: the registry is left untouched when this is thrown.
 */
export class WorldIntegrityError extends Error {
  constructor(
    readonly kind: WorldIntegrityKind,
    readonly key: number | string,
    message: string
  ) {
    super(message);
    this.name = "WorldIntegrityError";
  }
}

export class WorldLifecycleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorldLifecycleError";
  }
}

export class WorldConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorldConfigError";
  }
}
