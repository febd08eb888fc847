/**
 * Launcher Types
 *
 * Allocation context in, rendezvous parameters out, and the record of the one
 * supervised workload process.
 */

// =============================================================================
// Allocation
// =============================================================================

/** Environment as the scheduler hands it over (process.env compatible) */
export type AllocationEnv = Readonly<Record<string, string | undefined>>;

export type AllocationContext = {
  jobId: string;
  /** Scheduler order; the first host runs the rendezvous point */
  hostList: readonly string[];
  nodeCount: number;
  tasksPerNode: number;
  /** Only when the scheduler supplies a total directly */
  totalTasks?: number;
  cpusPerTask?: number;
};

// =============================================================================
// Rendezvous
// =============================================================================

export type RendezvousParameters = {
  coordinationPort: number;
  worldSize: number;
  coordinationAddress: string;
};

export type RendezvousOptions = {
  basePort?: number;
  portOffsetRange?: number;
};

/** Opaque tuning values forwarded into the workload environment */
export type TuningValue = string | number | boolean;

export type TuningKnobs = Record<string, TuningValue>;

// =============================================================================
// Supervision
// =============================================================================

export type SupervisorState = "idle" | "running" | "signal-forwarded" | "exited";

export type TerminationReason = "exit" | "signal";

export type SupervisedProcess = {
  command: string;
  pid?: number;
  state: SupervisorState;
  /** Every state entered, in order */
  trace: SupervisorState[];
  receivedSignals: NodeJS.Signals[];
  exitCode?: number;
  exitSignal?: NodeJS.Signals | null;
};

export type SupervisedExit = {
  pid?: number;
  exitCode: number;
  exitSignal: NodeJS.Signals | null;
  reason: TerminationReason;
  trace: SupervisorState[];
  receivedSignals: NodeJS.Signals[];
};

// =============================================================================
// Errors
// =============================================================================

export type LaunchErrorKind =
  | "MissingAllocationData"
  | "EmptyHostList"
  | "InvalidNodeCount"
  | "InvalidTaskCount"
  | "InconsistentAllocation"
  | "InvalidJobId"
  | "InvalidPortRange"
  | "InvalidConfiguration"
  | "SpawnFailure";

// =============================================================================
// Event Plane (PUB/SUB)
// =============================================================================

export type LaunchStartedEvent = {
  kind: "job.started";
  jobId: string;
  pid?: number;
  command: string;
  rendezvous: RendezvousParameters;
};

export type LaunchSignalEvent = {
  kind: "job.signal";
  jobId: string;
  received: NodeJS.Signals;
  forwarded: NodeJS.Signals;
};

export type LaunchExitedEvent = {
  kind: "job.exited";
  jobId: string;
  exitCode: number;
  exitSignal: NodeJS.Signals | null;
  reason: TerminationReason;
};

export type LaunchFailedEvent = {
  kind: "job.failed";
  jobId: string;
  errorKind: LaunchErrorKind;
  error: string;
};

/** Event body before the publisher stamps it */
export type LaunchEventBody =
  | LaunchStartedEvent
  | LaunchSignalEvent
  | LaunchExitedEvent
  | LaunchFailedEvent;

export type LaunchEvent = LaunchEventBody & {
  version: number;
  seq: number;
  ts: number;
};

// =============================================================================
// Launcher Config
// =============================================================================

export type LauncherConfig = {
  /** Workload command (e.g. "srun"); absent only for a dry run */
  command?: string;
  args: string[];
  /** Base of the coordination port (default: 10000) */
  basePort: number;
  /** Width of the job-id offset window (default: 10000) */
  portOffsetRange: number;
  /** Signal sent to the workload on SIGINT/SIGTERM (default: SIGTERM) */
  forwardSignal: NodeJS.Signals;
  /** JSON file replacing the default tuning knobs */
  tuningFile?: string;
  /** PUB socket address for lifecycle events (default: disabled) */
  eventAddress?: string;
  /** Print the workload environment instead of spawning */
  dryRun: boolean;
};
