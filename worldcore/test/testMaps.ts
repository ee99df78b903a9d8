// worldcore/test/testMaps.ts
// Shared test doubles for map partitions.

import type { HeartbeatBeat } from "../core/Heartbeat";
import type { CharacterPredicate, MapDefinition, Partition } from "../world/Partition";

export interface TestCharacter {
  name: string;
  teamName: string;
}

export class TestMap implements Partition<TestCharacter> {
  readonly beats: HeartbeatBeat[] = [];
  scriptedRemovals = 0;
  characters: TestCharacter[] = [];

  /** Runs inside advanceTick; lets a test throw, stall or record. */
  onTick: ((beat: HeartbeatBeat) => void | Promise<void>) | null = null;

  constructor(
    readonly id: number,
    readonly name: string
  ) {}

  async advanceTick(beat: HeartbeatBeat): Promise<void> {
    this.beats.push(beat);
    if (this.onTick) await this.onTick(beat);
  }

  removeScriptedEntities(): void {
    this.scriptedRemovals++;
  }

  findCharacterByTeamName(teamName: string): TestCharacter | undefined {
    return this.characters.find((c) => c.teamName === teamName);
  }

  allCharacters(predicate?: CharacterPredicate<TestCharacter>): readonly TestCharacter[] {
    return predicate ? this.characters.filter(predicate) : [...this.characters];
  }
}

export function createTestMap(def: MapDefinition): TestMap {
  return new TestMap(def.id, def.name);
}

export function defs(...entries: [number, string][]): MapDefinition<string>[] {
  return entries.map(([id, name]) => ({ id, name, classReference: `maps.${name}` }));
}

export function character(name: string, teamName = `${name}'s team`): TestCharacter {
  return { name, teamName };
}

/** Resolves when `release()` is called; for holding a sweep open. */
export function gate(): { opened: Promise<void>; release: () => void } {
  let release = (): void => {};
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { opened, release };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Heartbeat timers are unref'd, so a test awaiting a beat would otherwise
 * leave the event loop with nothing to keep it running.
 */
export async function holdOpen<T>(pending: Promise<T>): Promise<T> {
  const keepAlive = setInterval(() => {}, 1000);
  try {
    return await pending;
  } finally {
    clearInterval(keepAlive);
  }
}
