// worldcore/world/WorldManager.ts

import { Logger } from "../utils/logger";
import { IdentityAllocator } from "../core/IdentityAllocator";
import { HeartbeatScheduler, type HeartbeatBeat, type HeartbeatState } from "../core/Heartbeat";
import {
  DEFAULT_WORLD_CONFIG,
  loadDotEnv,
  loadWorldConfig,
  type WorldConfig,
} from "../config/worldConfig";
import { PartitionRegistry } from "./PartitionRegistry";
import type {
  CharacterPredicate,
  MapDefinition,
  Partition,
  PartitionFactory,
} from "./Partition";
import { WorldLifecycleError } from "./WorldErrors";

export interface WorldManagerOptions<C, P extends Partition<C>, R> {
  createPartition: PartitionFactory<C, P, R>;
  config?: WorldConfig;

  /** Heartbeat clock; tests pass a fake one. */
  now?: () => number;
}

/**
 * WorldManager
 *
 * Owns the map registry, the heartbeat and the id counters, and is the one
 * object network handlers, scripts and the game loop talk to.
 *
 * Startup order matters: maps are registered before the heartbeat is
 * started, so the first beat always sees the complete world.
 */
export class WorldManager<C, P extends Partition<C> = Partition<C>, R = unknown> {
  private readonly log = Logger.scope("WORLD");

  private readonly ids: IdentityAllocator;
  private readonly maps = new PartitionRegistry<C, P>();
  private readonly heartbeat: HeartbeatScheduler;
  private readonly createPartition: PartitionFactory<C, P, R>;

  private initialized = false;

  constructor(opts: WorldManagerOptions<C, P, R>) {
    const cfg = opts.config ?? DEFAULT_WORLD_CONFIG;

    this.createPartition = opts.createPartition;
    this.ids = IdentityAllocator.create(cfg.identityBases);
    this.heartbeat = new HeartbeatScheduler({ periodMs: cfg.heartbeatMs, now: opts.now });
  }

  /** Reads .env and WORLD_* variables, then builds the manager. */
  static fromEnv<C, P extends Partition<C>, R>(
    opts: Omit<WorldManagerOptions<C, P, R>, "config">
  ): WorldManager<C, P, R> {
    loadDotEnv();
    return new WorldManager<C, P, R>({ ...opts, config: loadWorldConfig() });
  }

  /** Number of maps in the world. */
  get count(): number {
    return this.maps.count;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get heartbeatState(): HeartbeatState {
    return this.heartbeat.status;
  }

  /** Shared counter memory, for worker threads that allocate ids too. */
  get identityBuffer(): SharedArrayBuffer {
    return this.ids.buffer;
  }

  /** New handle for a character or monster. */
  createHandle(): number {
    return Number(this.ids.next("handle"));
  }

  createSessionObjectId(): bigint {
    return this.ids.next("sessionObject");
  }

  createSkillObjectId(): bigint {
    return this.ids.next("skillObject");
  }

  /**
   * Registers all maps, then starts the heartbeat. A WorldIntegrityError
   * from the registry aborts startup with nothing registered and no
   * heartbeat running.
   */
  async initialize(mapDefinitions: readonly MapDefinition<R>[]): Promise<void> {
    if (this.initialized) {
      throw new WorldLifecycleError("World already initialized");
    }
    this.initialized = true;

    try {
      await this.maps.initialize(mapDefinitions, this.createPartition);
    } catch (err) {
      this.initialized = false;
      this.log.error("World initialization failed", { err });
      throw err;
    }

    this.heartbeat.start((beat) => this.updateEntities(beat));

    this.log.success("World initialized", {
      maps: this.maps.count,
      heartbeatMs: this.heartbeat.period,
    });
  }

  /** Stops the heartbeat and waits for a running beat to finish. */
  async shutdown(): Promise<void> {
    await this.heartbeat.stop();
  }

  /** Map by id or name, or undefined if there is none. */
  getMap(id: number): P | undefined;
  getMap(name: string): P | undefined;
  getMap(key: number | string): P | undefined {
    return this.maps.get(key);
  }

  /** Removes all scripted entities, like NPCs, from every map. */
  removeScriptedEntities(): Promise<void> {
    return this.maps.removeScriptedEntities();
  }

  /** First character with the given team name, or undefined. */
  getCharacterByTeamName(teamName: string): Promise<C | undefined> {
    return this.maps.findCharacterByTeamName(teamName);
  }

  /** Online characters, optionally filtered. */
  getCharacters(predicate?: CharacterPredicate<C>): Promise<C[]> {
    return this.maps.allCharacters(predicate);
  }

  private async updateEntities(beat: HeartbeatBeat): Promise<void> {
    const report = await this.maps.advanceAll(beat);
    if (report.failed > 0) {
      this.log.warn("Some maps failed to update this beat", {
        beat: beat.beat,
        ...report,
      });
    }
  }
}
