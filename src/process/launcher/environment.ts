/**
 * Workload Environment
 *
 * The launcher assembles one complete environment map and hands it to the
 * spawn call. srun propagates that map to the workers it starts on the
 * other hosts, so every rank reads identical values.
 */

import * as fs from "node:fs";
import { LaunchError, toError } from "./errors.js";
import {
  DEFAULT_TUNING_KNOBS,
  MASTER_ADDR_ENV,
  MASTER_PORT_ENV,
  OMP_NUM_THREADS_ENV,
  WORLD_SIZE_ENV,
} from "./protocol.js";
import type {
  AllocationContext,
  AllocationEnv,
  RendezvousParameters,
  TuningKnobs,
  TuningValue,
} from "./types.js";

const DERIVED_KEYS: ReadonlySet<string> = new Set([MASTER_PORT_ENV, WORLD_SIZE_ENV, MASTER_ADDR_ENV]);

/**
 * Write the rendezvous contract and the tuning knobs into `target`. Keys are
 * assigned, never appended, so publishing the same inputs twice leaves the
 * same map. Tuning entries cannot shadow the derived keys.
 */
export function publishEnvironment(
  target: Record<string, string | undefined>,
  params: RendezvousParameters,
  extra: TuningKnobs = {},
): void {
  for (const [key, value] of Object.entries(extra)) {
    if (DERIVED_KEYS.has(key)) {
      continue;
    }
    target[key] = String(value);
  }
  target[MASTER_PORT_ENV] = String(params.coordinationPort);
  target[WORLD_SIZE_ENV] = String(params.worldSize);
  target[MASTER_ADDR_ENV] = params.coordinationAddress;
}

/** Copy of `base` with the publication applied; `base` is left untouched. */
export function buildWorkloadEnvironment(
  base: AllocationEnv,
  params: RendezvousParameters,
  extra: TuningKnobs = {},
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  publishEnvironment(env, params, extra);
  return env;
}

/** Only the keys the launcher itself publishes, in publication order. */
export function formatPublishedEnvironment(
  params: RendezvousParameters,
  extra: TuningKnobs = {},
): string[] {
  const published: Record<string, string | undefined> = {};
  publishEnvironment(published, params, extra);
  return Object.entries(published).map(([key, value]) => `${key}=${value ?? ""}`);
}

/**
 * Knobs for this allocation: the file's knobs (or the defaults), plus
 * OMP_NUM_THREADS from the CPUs per task unless already set.
 */
export function resolveTuningKnobs(ctx: AllocationContext, fileKnobs?: TuningKnobs): TuningKnobs {
  const knobs: TuningKnobs = { ...(fileKnobs ?? DEFAULT_TUNING_KNOBS) };
  if (ctx.cpusPerTask !== undefined && !Object.hasOwn(knobs, OMP_NUM_THREADS_ENV)) {
    knobs[OMP_NUM_THREADS_ENV] = ctx.cpusPerTask;
  }
  return knobs;
}

function isTuningValue(value: unknown): value is TuningValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

export function parseTuningKnobs(raw: unknown, source: string): TuningKnobs {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new LaunchError("InvalidConfiguration", `${source}: tuning file must hold a JSON object`);
  }
  const knobs: TuningKnobs = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isTuningValue(value)) {
      throw new LaunchError(
        "InvalidConfiguration",
        `${source}: "${key}" must be a string, number or boolean`,
      );
    }
    knobs[key] = value;
  }
  return knobs;
}

export function loadTuningFile(filePath: string): TuningKnobs {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new LaunchError(
      "InvalidConfiguration",
      `Failed to read tuning file ${filePath}: ${toError(err).message}`,
      toError(err),
    );
  }
  return parseTuningKnobs(raw, filePath);
}
