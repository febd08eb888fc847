/**
 * Job Supervisor
 *
 * Spawns the workload, forwards termination signals the launcher receives,
 * and resolves only once the workload has actually exited:
 *
 *   idle -> running -> exited
 *   idle -> running -> signal-forwarded -> exited
 *
 * Slurm signals the batch step (time limit, scancel) and then tears down the
 * allocation; leaving before the workload is gone would orphan its ranks.
 */

import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import { constants as osConstants } from "node:os";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { LaunchError, toError } from "./errors.js";
import { DEFAULT_FORWARD_SIGNAL, SIGNAL_EXIT_CODE_BASE, TERMINATION_SIGNALS } from "./protocol.js";
import type {
  SupervisedExit,
  SupervisedProcess,
  SupervisorState,
  TerminationReason,
} from "./types.js";

const log = createSubsystemLogger("launcher/supervisor");

// =============================================================================
// Types
// =============================================================================

export type SignalListener = (signal: NodeJS.Signals) => void;

/** Where termination signals arrive from; `process` in production */
export type SignalSource = {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
};

export type RunJobOptions = {
  command: string;
  args?: readonly string[];
  env: Record<string, string>;
  cwd?: string;
  /** default: inherit */
  stdio?: StdioOptions;
  /** default: process */
  signalSource?: SignalSource;
  /** default: SIGTERM */
  forwardSignal?: NodeJS.Signals;
  onStateChange?: (state: SupervisorState, record: Readonly<SupervisedProcess>) => void;
  onSignalForwarded?: (received: NodeJS.Signals, forwarded: NodeJS.Signals) => void;
};

// =============================================================================
// Exit Status
// =============================================================================

export function signalNumber(signal: NodeJS.Signals): number {
  for (const [name, value] of Object.entries(osConstants.signals)) {
    if (name === signal && typeof value === "number") {
      return value;
    }
  }
  return 0;
}

/** Workload's own code, or 128+N when signal N killed it */
export function resolveExitCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    return SIGNAL_EXIT_CODE_BASE + signalNumber(signal);
  }
  return 1;
}

// =============================================================================
// Supervision
// =============================================================================

function spawnWorkload(
  command: string,
  args: string[],
  spawnOptions: { cwd?: string; env: Record<string, string>; stdio: StdioOptions },
): ChildProcess {
  try {
    return spawn(command, args, spawnOptions);
  } catch (err) {
    // Invalid arguments throw synchronously; a missing binary arrives as "error"
    throw new LaunchError(
      "SpawnFailure",
      `Failed to spawn ${command}: ${toError(err).message}`,
      toError(err),
    );
  }
}

export async function runJob(options: RunJobOptions): Promise<SupervisedExit> {
  const { command, env, cwd } = options;
  const args = [...(options.args ?? [])];
  const signalSource: SignalSource = options.signalSource ?? process;
  const forwardSignal = options.forwardSignal ?? DEFAULT_FORWARD_SIGNAL;

  const record: SupervisedProcess = {
    command,
    state: "idle",
    trace: ["idle"],
    receivedSignals: [],
  };

  const transition = (state: SupervisorState) => {
    record.state = state;
    record.trace.push(state);
    log.debug(`State -> ${state}`, { pid: record.pid });
    options.onStateChange?.(state, record);
  };

  const child = spawnWorkload(command, args, { cwd, env, stdio: options.stdio ?? "inherit" });

  let spawned = false;
  // Signals that arrive before the OS confirms the spawn wait here
  const pendingSignals: NodeJS.Signals[] = [];

  const forward = (received: NodeJS.Signals) => {
    if (record.state === "running") {
      transition("signal-forwarded");
    }
    log.info(`Received ${received}, forwarding ${forwardSignal} to pid ${record.pid ?? "?"}`);
    if (!child.kill(forwardSignal)) {
      log.warn(`Could not deliver ${forwardSignal} to pid ${record.pid ?? "?"}`);
    }
    options.onSignalForwarded?.(received, forwardSignal);
  };

  const onSignal: SignalListener = (signal) => {
    if (record.state === "exited") {
      return;
    }
    record.receivedSignals.push(signal);
    if (!spawned) {
      pendingSignals.push(signal);
      return;
    }
    forward(signal);
  };

  for (const signal of TERMINATION_SIGNALS) {
    signalSource.on(signal, onSignal);
  }

  try {
    return await new Promise<SupervisedExit>((resolve, reject) => {
      child.once("spawn", () => {
        spawned = true;
        record.pid = child.pid;
        log.info(`Spawned ${command} (pid ${child.pid ?? "?"})`);
        transition("running");
        for (const signal of pendingSignals.splice(0)) {
          forward(signal);
        }
      });

      child.on("error", (err) => {
        if (!spawned) {
          reject(new LaunchError("SpawnFailure", `Failed to spawn ${command}: ${err.message}`, err));
          return;
        }
        log.error(`Workload error: ${err.message}`);
      });

      child.once("close", (code, signal) => {
        if (!spawned) {
          return;
        }
        const exitCode = resolveExitCode(code, signal);
        const reason: TerminationReason = code === null && signal ? "signal" : "exit";
        record.exitCode = exitCode;
        record.exitSignal = signal;
        transition("exited");
        log.info(
          signal
            ? `Workload terminated by ${signal} (exit code ${exitCode})`
            : `Workload exited with code ${exitCode}`,
        );
        resolve({
          pid: record.pid,
          exitCode,
          exitSignal: signal,
          reason,
          trace: [...record.trace],
          receivedSignals: [...record.receivedSignals],
        });
      });
    });
  } finally {
    for (const signal of TERMINATION_SIGNALS) {
      signalSource.off(signal, onSignal);
    }
  }
}
