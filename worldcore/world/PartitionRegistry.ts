// worldcore/world/PartitionRegistry.ts

import { Logger } from "../utils/logger";
import { AsyncLock } from "../utils/AsyncLock";
import type { HeartbeatBeat } from "../core/Heartbeat";
import {
  MapDefinitionSchema,
  type CharacterPredicate,
  type MapDefinition,
  type Partition,
  type PartitionFactory,
} from "./Partition";
import { WorldIntegrityError } from "./WorldErrors";

export interface AdvanceReport {
  advanced: number;
  failed: number;
}

/**
 * PartitionRegistry
 *
 * Every partition is indexed twice, by id and by name. Invariants:
 *  - byId and byName always hold the same set of partitions
 *  - the only writer is initialize(), which validates the whole batch and
 *    then inserts it in one synchronous block
 *  - sweeps (ticks, script cleanup, character queries) hold `guard` for the
 *    whole pass, so they never interleave with each other or with a write
 *
 * Point lookups are plain synchronous reads. With a single synchronous write
 * block there is no moment at which a partition is in one map but not the
 * other, so they do not queue behind a running sweep.
 */
export class PartitionRegistry<C, P extends Partition<C> = Partition<C>> {
  private readonly log = Logger.scope("WORLD");
  private readonly guard = new AsyncLock();

  private readonly byId = new Map<number, P>();
  private readonly byName = new Map<string, P>();

  get count(): number {
    return this.byId.size;
  }

  /**
   * Builds partitions from map definitions and registers them.
   * Resolves with the number inserted. Rejects with WorldIntegrityError on a
   * malformed record or a duplicate id/name, in which case nothing is added.
   */
  initialize<R>(
    definitions: readonly MapDefinition<R>[],
    createPartition: PartitionFactory<C, P, R>
  ): Promise<number> {
    return this.guard.runExclusive(() => {
      const batch = definitions.map((def) => {
        const shape = MapDefinitionSchema.safeParse(def);
        if (!shape.success) {
          const detail = shape.error.issues
            .map((i) => `${i.path.join(".") || "definition"}: ${i.message}`)
            .join("; ");
          throw new WorldIntegrityError(
            "invalid_definition",
            def.id,
            `Invalid map definition (id ${String(def.id)}): ${detail}`
          );
        }
        return createPartition(def);
      });

      this.checkCollisions(batch);

      for (const partition of batch) {
        this.byId.set(partition.id, partition);
        this.byName.set(partition.name, partition);
      }

      this.log.info("Partitions registered", {
        added: batch.length,
        total: this.byId.size,
      });

      return batch.length;
    });
  }

  get(id: number): P | undefined;
  get(name: string): P | undefined;
  get(key: number | string): P | undefined;
  get(key: number | string): P | undefined {
    return typeof key === "number" ? this.byId.get(key) : this.byName.get(key);
  }

  /**
   * Visits every partition in registration order while holding the guard.
   * Async visitors are awaited one at a time.
   */
  forEach(visitor: (partition: P) => void | Promise<void>): Promise<void> {
    return this.guard.runExclusive(async () => {
      for (const partition of this.byId.values()) {
        await visitor(partition);
      }
    });
  }

  /**
   * Heartbeat sweep. One failing partition is logged and skipped; the rest
   * still advance this beat.
   */
  advanceAll(beat: HeartbeatBeat): Promise<AdvanceReport> {
    return this.guard.runExclusive(async () => {
      const report: AdvanceReport = { advanced: 0, failed: 0 };

      for (const partition of this.byId.values()) {
        try {
          await partition.advanceTick(beat);
          report.advanced++;
        } catch (err) {
          report.failed++;
          this.log.warn("Partition tick failed", {
            partitionId: partition.id,
            partitionName: partition.name,
            beat: beat.beat,
            err,
          });
        }
      }

      return report;
    });
  }

  removeScriptedEntities(): Promise<void> {
    return this.forEach((partition) => partition.removeScriptedEntities());
  }

  findCharacterByTeamName(teamName: string): Promise<C | undefined> {
    return this.guard.runExclusive(() => {
      for (const partition of this.byId.values()) {
        const character = partition.findCharacterByTeamName(teamName);
        if (character !== undefined) return character;
      }
      return undefined;
    });
  }

  /** Fresh array; partitions contribute in registration order. */
  allCharacters(predicate?: CharacterPredicate<C>): Promise<C[]> {
    return this.guard.runExclusive(() => {
      const result: C[] = [];
      for (const partition of this.byId.values()) {
        const found = predicate ? partition.allCharacters(predicate) : partition.allCharacters();
        // Element-wise: spreading a huge list into push() overflows the stack.
        for (const character of found) result.push(character);
      }
      return result;
    });
  }

  private checkCollisions(batch: readonly P[]): void {
    const ids = new Set<number>(this.byId.keys());
    const names = new Set<string>(this.byName.keys());

    for (const partition of batch) {
      if (ids.has(partition.id)) {
        throw new WorldIntegrityError(
          "duplicate_id",
          partition.id,
          `Duplicate map id ${partition.id} (name "${partition.name}")`
        );
      }
      if (names.has(partition.name)) {
        throw new WorldIntegrityError(
          "duplicate_name",
          partition.name,
          `Duplicate map name "${partition.name}" (id ${partition.id})`
        );
      }
      ids.add(partition.id);
      names.add(partition.name);
    }
  }
}
