// worldcore/index.ts

export { WorldManager, type WorldManagerOptions } from "./world/WorldManager";
export { PartitionRegistry, type AdvanceReport } from "./world/PartitionRegistry";
export {
  MapDefinitionSchema,
  type CharacterPredicate,
  type MapDefinition,
  type Partition,
  type PartitionFactory,
} from "./world/Partition";
export {
  WorldConfigError,
  WorldIntegrityError,
  WorldLifecycleError,
  type WorldIntegrityKind,
} from "./world/WorldErrors";

export {
  HeartbeatScheduler,
  computeInitialDelay,
  type HeartbeatBeat,
  type HeartbeatCallback,
  type HeartbeatConfig,
  type HeartbeatState,
} from "./core/Heartbeat";
export {
  IdentityAllocator,
  COUNTER_KINDS,
  DEFAULT_IDENTITY_BASES,
  type CounterKind,
  type IdentityBases,
} from "./core/IdentityAllocator";

export {
  DEFAULT_WORLD_CONFIG,
  loadDotEnv,
  loadWorldConfig,
  type WorldConfig,
} from "./config/worldConfig";
export { HEARTBEAT_TIME_MS, MIN_HEARTBEAT_MS, Second, Minute, Hour } from "./config/time";
export { Logger } from "./utils/logger";
export { AsyncLock } from "./utils/AsyncLock";
