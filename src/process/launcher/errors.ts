import { LAUNCH_EXIT_CODES } from "./protocol.js";
import type { LaunchErrorKind } from "./types.js";

/** Kinds raised before anything is spawned */
const CONFIGURATION_KINDS: ReadonlySet<LaunchErrorKind> = new Set([
  "MissingAllocationData",
  "EmptyHostList",
  "InvalidNodeCount",
  "InvalidTaskCount",
  "InconsistentAllocation",
  "InvalidJobId",
  "InvalidPortRange",
  "InvalidConfiguration",
]);

/**
 * Launcher-level failure. The exit code tells the scheduler's accounting a
 * broken launch apart from a failed workload.
 */
export class LaunchError extends Error {
  override readonly name = "LaunchError" as const;
  override readonly cause: Error | undefined;
  readonly exitCode: number;

  constructor(
    readonly kind: LaunchErrorKind,
    message: string,
    cause?: Error,
  ) {
    super(message);
    this.cause = cause;
    this.exitCode = LAUNCH_EXIT_CODES[kind];
  }

  get isConfigurationError(): boolean {
    return CONFIGURATION_KINDS.has(this.kind);
  }
}

export function isLaunchError(err: unknown): err is LaunchError {
  return err instanceof LaunchError;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
