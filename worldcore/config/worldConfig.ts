// worldcore/config/worldConfig.ts

import dotenv from "dotenv";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { Logger } from "../utils/logger";
import { WorldConfigError } from "../world/WorldErrors";
import { HEARTBEAT_TIME_MS, MIN_HEARTBEAT_MS } from "./time";
import {
  DEFAULT_IDENTITY_BASES,
  MAX_IDENTITY_BASES,
  type IdentityBases,
} from "../core/IdentityAllocator";

const log = Logger.scope("CONFIG");

export interface WorldConfig {
  heartbeatMs: number;
  identityBases: IdentityBases;
}

export const DEFAULT_WORLD_CONFIG: WorldConfig = {
  heartbeatMs: HEARTBEAT_TIME_MS,
  identityBases: DEFAULT_IDENTITY_BASES,
};

// Accepts "1234" or "0xE1A900000000".
const INTEGER_TEXT = /^(0x[0-9a-f]+|\d+)$/i;

function idBase(name: string, fallback: bigint, max: bigint) {
  return z
    .string()
    .trim()
    .optional()
    .refine((v) => v === undefined || v === "" || INTEGER_TEXT.test(v), {
      message: `${name} must be a non-negative decimal or 0x-prefixed hex integer`,
    })
    .transform((v) => (v ? BigInt(v) : fallback))
    .refine((n) => n <= max, {
      message: `${name} must be at most ${max} (0x${max.toString(16)})`,
    });
}

const ConfigSchema = z.object({
  WORLD_HEARTBEAT_MS: z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : HEARTBEAT_TIME_MS))
    .refine((n) => Number.isInteger(n) && n >= MIN_HEARTBEAT_MS, {
      message: `WORLD_HEARTBEAT_MS must be an integer >= ${MIN_HEARTBEAT_MS}`,
    }),

  WORLD_HANDLE_BASE: idBase(
    "WORLD_HANDLE_BASE",
    DEFAULT_IDENTITY_BASES.handle,
    MAX_IDENTITY_BASES.handle
  ),
  WORLD_SESSION_OBJECT_ID_BASE: idBase(
    "WORLD_SESSION_OBJECT_ID_BASE",
    DEFAULT_IDENTITY_BASES.sessionObject,
    MAX_IDENTITY_BASES.sessionObject
  ),
  WORLD_SKILL_OBJECT_ID_BASE: idBase(
    "WORLD_SKILL_OBJECT_ID_BASE",
    DEFAULT_IDENTITY_BASES.skillObject,
    MAX_IDENTITY_BASES.skillObject
  ),
});

/**
 * Looks for a .env next to the process (or one level up, for workspaces run
 * from a subdirectory). Missing files are fine; process.env still applies.
 */
export function loadDotEnv(cwd: string = process.cwd()): string | null {
  const candidates = [path.resolve(cwd, ".env"), path.resolve(cwd, "..", ".env")];

  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p });
      log.debug("Loaded env file", { path: p });
      return p;
    }
  }

  log.debug("No .env file found (continuing with process.env)");
  return null;
}

export function loadWorldConfig(
  env: Record<string, string | undefined> = process.env
): WorldConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => i.message).join("; ");
    throw new WorldConfigError(`Invalid world configuration: ${detail}`);
  }

  const cfg: WorldConfig = {
    heartbeatMs: parsed.data.WORLD_HEARTBEAT_MS,
    identityBases: {
      handle: parsed.data.WORLD_HANDLE_BASE,
      sessionObject: parsed.data.WORLD_SESSION_OBJECT_ID_BASE,
      skillObject: parsed.data.WORLD_SKILL_OBJECT_ID_BASE,
    },
  };

  log.debug("World config loaded", {
    heartbeatMs: cfg.heartbeatMs,
    handleBase: cfg.identityBases.handle.toString(),
    sessionObjectIdBase: `0x${cfg.identityBases.sessionObject.toString(16)}`,
    skillObjectIdBase: `0x${cfg.identityBases.skillObject.toString(16)}`,
  });

  return cfg;
}
