/**
 * Allocation Reader
 *
 * Pulls job id, hosts and task layout out of the Slurm environment. Either the
 * whole context comes back or the read fails; nothing is defaulted.
 */

import { LaunchError } from "./errors.js";
import { expandHostlist } from "./hostlist.js";
import {
  CPUS_PER_TASK_VAR,
  JOB_ID_VARS,
  NODE_COUNT_VARS,
  NODELIST_VARS,
  NTASKS_PER_NODE_VAR,
  TASKS_PER_NODE_VAR,
  TOTAL_TASKS_VARS,
} from "./protocol.js";
import type { AllocationContext, AllocationEnv } from "./types.js";

type EnvValue = { name: string; value: string };

const INTEGER_RE = /^-?\d+$/;
const TASKS_PER_NODE_RE = /^(-?\d+)(?:\(x(\d+)\))?$/;

function firstPresent(env: AllocationEnv, names: readonly string[]): EnvValue | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return { name, value };
    }
  }
  return undefined;
}

function parseInteger(raw: string): number | undefined {
  return INTEGER_RE.test(raw) ? Number.parseInt(raw, 10) : undefined;
}

/**
 * Parse SLURM_TASKS_PER_NODE ("8", "8(x4)", "8(x2),8"). Every node must run
 * the same count; undefined means the value could not be parsed.
 */
export function parseTasksPerNode(raw: string): number | undefined {
  const counts = new Set<number>();
  for (const part of raw.split(",")) {
    const match = TASKS_PER_NODE_RE.exec(part.trim());
    if (!match?.[1]) {
      return undefined;
    }
    counts.add(Number.parseInt(match[1], 10));
  }

  if (counts.size > 1) {
    throw new LaunchError(
      "InconsistentAllocation",
      `${TASKS_PER_NODE_VAR}=${raw} assigns different task counts per node`,
    );
  }
  const [count] = counts;
  return count;
}

function readTasksPerNode(env: AllocationEnv): number | undefined {
  const plain = firstPresent(env, [NTASKS_PER_NODE_VAR]);
  if (plain) {
    return parseInteger(plain.value);
  }
  const compressed = firstPresent(env, [TASKS_PER_NODE_VAR]);
  return compressed ? parseTasksPerNode(compressed.value) : undefined;
}

function describeMissing(names: readonly string[], found: EnvValue | undefined): string {
  return found ? `${found.name} (unparseable: "${found.value}")` : names.join("|");
}

export function readAllocation(env: AllocationEnv = process.env): AllocationContext {
  const jobId = firstPresent(env, JOB_ID_VARS);
  const nodelist = firstPresent(env, NODELIST_VARS);
  const nodeCountVar = firstPresent(env, NODE_COUNT_VARS);
  const nodeCount = nodeCountVar ? parseInteger(nodeCountVar.value) : undefined;
  const tasksPerNode = readTasksPerNode(env);

  if (!jobId || !nodelist || nodeCount === undefined || tasksPerNode === undefined) {
    const missing: string[] = [];
    if (!jobId) {
      missing.push(JOB_ID_VARS.join("|"));
    }
    if (!nodelist) {
      missing.push(NODELIST_VARS.join("|"));
    }
    if (nodeCount === undefined) {
      missing.push(describeMissing(NODE_COUNT_VARS, nodeCountVar));
    }
    if (tasksPerNode === undefined) {
      missing.push(
        describeMissing(
          [NTASKS_PER_NODE_VAR, TASKS_PER_NODE_VAR],
          firstPresent(env, [NTASKS_PER_NODE_VAR, TASKS_PER_NODE_VAR]),
        ),
      );
    }
    throw new LaunchError("MissingAllocationData", `Missing allocation data: ${missing.join(", ")}`);
  }

  const context: AllocationContext = {
    jobId: jobId.value,
    hostList: expandHostlist(nodelist.value, nodelist.name),
    nodeCount,
    tasksPerNode,
  };

  const totalTasksVar = firstPresent(env, TOTAL_TASKS_VARS);
  if (totalTasksVar) {
    const totalTasks = parseInteger(totalTasksVar.value);
    if (totalTasks === undefined) {
      throw new LaunchError(
        "MissingAllocationData",
        `Missing allocation data: ${describeMissing(TOTAL_TASKS_VARS, totalTasksVar)}`,
      );
    }
    context.totalTasks = totalTasks;
  }

  const cpusPerTaskVar = firstPresent(env, [CPUS_PER_TASK_VAR]);
  const cpusPerTask = cpusPerTaskVar ? parseInteger(cpusPerTaskVar.value) : undefined;
  if (cpusPerTask !== undefined && cpusPerTask > 0) {
    context.cpusPerTask = cpusPerTask;
  }

  return context;
}
