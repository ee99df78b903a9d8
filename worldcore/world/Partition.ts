// worldcore/world/Partition.ts

import { z } from "zod";

import type { HeartbeatBeat } from "../core/Heartbeat";

/**
 * One map entry from the data layer. `classReference` is whatever the
 * partition factory needs to build the map (a class name, a template, ...);
 * the registry never looks at it.
 */
export interface MapDefinition<R = unknown> {
  id: number;
  name: string;
  classReference: R;
}

// Shape check only; the registry keeps the caller's objects as they are.
export const MapDefinitionSchema = z.object({
  id: z.number().int(),
  name: z.string().trim().min(1),
});

export type CharacterPredicate<C> = (character: C) => boolean;

/**
 * What the world needs from a map. Everything behind these calls (entities,
 * scripts, pathing) belongs to the map itself.
 */
export interface Partition<C> {
  readonly id: number;
  readonly name: string;

  /** Advance this map by one heartbeat. */
  advanceTick(beat: HeartbeatBeat): void | Promise<void>;

  /** Drop every script-spawned entity (NPCs, props, ...). */
  removeScriptedEntities(): void | Promise<void>;

  findCharacterByTeamName(teamName: string): C | undefined;

  allCharacters(predicate?: CharacterPredicate<C>): readonly C[];
}

export type PartitionFactory<C, P extends Partition<C> = Partition<C>, R = unknown> = (
  definition: MapDefinition<R>
) => P;
