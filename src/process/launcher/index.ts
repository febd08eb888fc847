/**
 * Rendezvous Launcher Module
 *
 * Derives MASTER_PORT / WORLD_SIZE / MASTER_ADDR from a Slurm allocation and
 * supervises the distributed workload that consumes them.
 */

// Types
export type {
  AllocationContext,
  AllocationEnv,
  LaunchErrorKind,
  LaunchEvent,
  LaunchEventBody,
  LauncherConfig,
  RendezvousOptions,
  RendezvousParameters,
  SupervisedExit,
  SupervisedProcess,
  SupervisorState,
  TerminationReason,
  TuningKnobs,
} from "./types.js";

// Protocol constants
export {
  DEFAULT_BASE_PORT,
  DEFAULT_FORWARD_SIGNAL,
  DEFAULT_PORT_OFFSET_RANGE,
  DEFAULT_TUNING_KNOBS,
  EVENT_TOPIC_PREFIX,
  INTERNAL_ERROR_EXIT_CODE,
  LAUNCH_EXIT_CODES,
  MASTER_ADDR_ENV,
  MASTER_PORT_ENV,
  PROTOCOL_VERSION,
  WORLD_SIZE_ENV,
} from "./protocol.js";

export { LaunchError, isLaunchError } from "./errors.js";

export { expandHostlist } from "./hostlist.js";
export { parseTasksPerNode, readAllocation } from "./allocation.js";
export { deriveRendezvous, jobIdPortOffset, validatePortRange } from "./rendezvous.js";
export {
  buildWorkloadEnvironment,
  formatPublishedEnvironment,
  loadTuningFile,
  publishEnvironment,
  resolveTuningKnobs,
} from "./environment.js";
export {
  resolveExitCode,
  runJob,
  type RunJobOptions,
  type SignalSource,
} from "./supervisor.js";
export {
  createEventPublisher,
  eventTopic,
  type CreateEventPublisher,
  type LaunchEventPublisher,
} from "./events.js";
export { USAGE, resolveLauncherConfig } from "./config.js";
export { launch, type LaunchDeps } from "./launcher.js";
