/**
 * Rendezvous Parameter Derivation
 *
 * Every host computes MASTER_PORT / WORLD_SIZE / MASTER_ADDR on its own from
 * the same allocation data, so the result must depend on nothing else: no
 * randomness, no clock, no host-local state.
 */

import { LaunchError } from "./errors.js";
import {
  DEFAULT_BASE_PORT,
  DEFAULT_PORT_OFFSET_RANGE,
  JOB_ID_PORT_DIGITS,
  MAX_COORDINATION_PORT,
  MIN_COORDINATION_PORT,
} from "./protocol.js";
import type { AllocationContext, RendezvousOptions, RendezvousParameters } from "./types.js";

const TRAILING_DIGITS_RE = /(\d+)$/;

/**
 * Check that every port basePort + [0, offsetRange) is a usable
 * unprivileged port.
 */
export function validatePortRange(basePort: number, offsetRange: number): void {
  if (!Number.isInteger(basePort) || !Number.isInteger(offsetRange) || offsetRange < 1) {
    throw new LaunchError(
      "InvalidPortRange",
      `Port range must be integers with a positive width (base=${basePort}, range=${offsetRange})`,
    );
  }
  const highest = basePort + offsetRange - 1;
  if (basePort < MIN_COORDINATION_PORT || highest > MAX_COORDINATION_PORT) {
    throw new LaunchError(
      "InvalidPortRange",
      `Ports ${basePort}-${highest} fall outside ${MIN_COORDINATION_PORT}-${MAX_COORDINATION_PORT}`,
    );
  }
}

/**
 * Offset from the last four trailing digits of the job id, reduced into
 * [0, offsetRange). Concurrent jobs land on different ports unless their ids
 * share those digits.
 */
export function jobIdPortOffset(jobId: string, offsetRange: number): number {
  const digits = TRAILING_DIGITS_RE.exec(jobId.trim())?.[1];
  if (!digits) {
    throw new LaunchError("InvalidJobId", `Job id "${jobId}" has no trailing digits`);
  }
  return Number.parseInt(digits.slice(-JOB_ID_PORT_DIGITS), 10) % offsetRange;
}

export function deriveRendezvous(
  ctx: AllocationContext,
  options: RendezvousOptions = {},
): RendezvousParameters {
  const basePort = options.basePort ?? DEFAULT_BASE_PORT;
  const offsetRange = options.portOffsetRange ?? DEFAULT_PORT_OFFSET_RANGE;
  validatePortRange(basePort, offsetRange);

  const coordinationAddress = ctx.hostList[0];
  if (!coordinationAddress) {
    throw new LaunchError("EmptyHostList", "Allocation has no hosts");
  }
  if (!Number.isInteger(ctx.nodeCount) || ctx.nodeCount <= 0) {
    throw new LaunchError("InvalidNodeCount", `Node count must be positive, got ${ctx.nodeCount}`);
  }
  if (!Number.isInteger(ctx.tasksPerNode) || ctx.tasksPerNode <= 0) {
    throw new LaunchError(
      "InvalidTaskCount",
      `Tasks per node must be positive, got ${ctx.tasksPerNode}`,
    );
  }

  const worldSize = ctx.nodeCount * ctx.tasksPerNode;
  if (ctx.totalTasks !== undefined && ctx.totalTasks !== worldSize) {
    throw new LaunchError(
      "InconsistentAllocation",
      `Scheduler reports ${ctx.totalTasks} tasks but ${ctx.nodeCount} nodes x ${ctx.tasksPerNode} tasks per node = ${worldSize}`,
    );
  }

  return {
    coordinationPort: basePort + jobIdPortOffset(ctx.jobId, offsetRange),
    worldSize,
    coordinationAddress,
  };
}
