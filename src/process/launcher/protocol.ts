/**
 * Launcher Protocol Constants
 *
 * Environment variable names on both sides of the launcher, port derivation
 * defaults and exit codes.
 */

import type { LaunchErrorKind, TuningKnobs } from "./types.js";

// =============================================================================
// Consumed: Slurm allocation context (first present wins)
// =============================================================================

export const JOB_ID_VARS = ["SLURM_JOB_ID", "SLURM_JOBID"] as const;

export const NODELIST_VARS = ["SLURM_JOB_NODELIST", "SLURM_NODELIST"] as const;

export const NODE_COUNT_VARS = ["SLURM_JOB_NUM_NODES", "SLURM_NNODES"] as const;

/** Plain integer form, set when --ntasks-per-node was requested */
export const NTASKS_PER_NODE_VAR = "SLURM_NTASKS_PER_NODE";

/** Compressed form, e.g. "8(x4)" */
export const TASKS_PER_NODE_VAR = "SLURM_TASKS_PER_NODE";

export const TOTAL_TASKS_VARS = ["SLURM_NTASKS", "SLURM_NPROCS"] as const;

export const CPUS_PER_TASK_VAR = "SLURM_CPUS_PER_TASK";

// =============================================================================
// Produced: rendezvous contract read by the workload
// =============================================================================

export const MASTER_PORT_ENV = "MASTER_PORT";

export const WORLD_SIZE_ENV = "WORLD_SIZE";

export const MASTER_ADDR_ENV = "MASTER_ADDR";

export const OMP_NUM_THREADS_ENV = "OMP_NUM_THREADS";

/** Fixed transport tuning handed to the workload untouched */
export const DEFAULT_TUNING_KNOBS: TuningKnobs = {
  NCCL_SOCKET_IFNAME: "hsn",
  NCCL_NSOCKS_PERTHREAD: 4,
  NCCL_SOCKET_NTHREADS: 2,
  NCCL_MIN_CHANNELS: 32,
};

// =============================================================================
// Port derivation
// =============================================================================

/** Default base for the coordination port */
export const DEFAULT_BASE_PORT = 10000;

/** Default width of the job-id offset window (last four digits) */
export const DEFAULT_PORT_OFFSET_RANGE = 10000;

/** Number of trailing job-id digits that feed the offset */
export const JOB_ID_PORT_DIGITS = 4;

export const MIN_COORDINATION_PORT = 1024;

export const MAX_COORDINATION_PORT = 65535;

// =============================================================================
// Supervision
// =============================================================================

/** Signals the launcher traps and forwards */
export const TERMINATION_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/** Signal sent to the workload for either trapped signal (kill -15) */
export const DEFAULT_FORWARD_SIGNAL: NodeJS.Signals = "SIGTERM";

/** Shell convention for a child killed by signal N */
export const SIGNAL_EXIT_CODE_BASE = 128;

// =============================================================================
// Exit codes
// =============================================================================

/** Launcher failures, kept clear of the 128+N range used for signalled workloads */
export const LAUNCH_EXIT_CODES: Record<LaunchErrorKind, number> = {
  MissingAllocationData: 200,
  EmptyHostList: 201,
  InvalidNodeCount: 202,
  InvalidTaskCount: 203,
  InconsistentAllocation: 204,
  InvalidJobId: 205,
  InvalidPortRange: 206,
  InvalidConfiguration: 207,
  SpawnFailure: 208,
};

/** Unexpected launcher crash */
export const INTERNAL_ERROR_EXIT_CODE = 209;

// =============================================================================
// Event plane
// =============================================================================

/** Event topic prefix for PUB/SUB */
export const EVENT_TOPIC_PREFIX = "launch:";

/** Time a closing publisher may spend flushing queued events */
export const DEFAULT_EVENT_LINGER_MS = 500;

/** Event payload version */
export const PROTOCOL_VERSION = 1;
