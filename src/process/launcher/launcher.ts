/**
 * Launch pipeline: read allocation -> derive rendezvous -> build workload
 * environment -> supervise. Configuration errors stop the pipeline before
 * anything is spawned.
 */

import type { StdioOptions } from "node:child_process";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { readAllocation } from "./allocation.js";
import {
  buildWorkloadEnvironment,
  formatPublishedEnvironment,
  loadTuningFile,
  resolveTuningKnobs,
} from "./environment.js";
import { isLaunchError, LaunchError } from "./errors.js";
import { createEventPublisher, type CreateEventPublisher } from "./events.js";
import { deriveRendezvous } from "./rendezvous.js";
import { runJob, type SignalSource } from "./supervisor.js";
import type {
  AllocationContext,
  AllocationEnv,
  LauncherConfig,
  RendezvousParameters,
} from "./types.js";

const log = createSubsystemLogger("launcher");

export type LaunchDeps = {
  /** Scheduler environment (default: process.env) */
  env?: AllocationEnv;
  signalSource?: SignalSource;
  stdio?: StdioOptions;
  /** Sink for --dry-run output (default: stdout) */
  writeLine?: (line: string) => void;
  createPublisher?: CreateEventPublisher;
};

function logAllocationBanner(ctx: AllocationContext, params: RendezvousParameters): void {
  log.info(`Job ${ctx.jobId}`, {
    nodes: ctx.hostList,
    nodeCount: ctx.nodeCount,
    tasksPerNode: ctx.tasksPerNode,
  });
  log.info(
    `MASTER_PORT=${params.coordinationPort} WORLD_SIZE=${params.worldSize} MASTER_ADDR=${params.coordinationAddress}`,
  );
}

export function describeLaunchFailure(err: LaunchError): string {
  return err.isConfigurationError
    ? `Launch aborted before spawning the workload (${err.kind}): ${err.message}`
    : `Workload could not be started (${err.kind}): ${err.message}`;
}

async function launchOrThrow(config: LauncherConfig, deps: LaunchDeps): Promise<number> {
  const env = deps.env ?? process.env;

  const ctx = readAllocation(env);
  const params = deriveRendezvous(ctx, {
    basePort: config.basePort,
    portOffsetRange: config.portOffsetRange,
  });
  const knobs = resolveTuningKnobs(
    ctx,
    config.tuningFile ? loadTuningFile(config.tuningFile) : undefined,
  );
  logAllocationBanner(ctx, params);

  if (config.dryRun) {
    const writeLine = deps.writeLine ?? ((line: string) => process.stdout.write(`${line}\n`));
    for (const line of formatPublishedEnvironment(params, knobs)) {
      writeLine(line);
    }
    return 0;
  }

  const command = config.command;
  if (!command) {
    throw new LaunchError("InvalidConfiguration", "No workload command given");
  }

  // Built once, handed to the spawn; the launcher's own environment stays as it was
  const workloadEnv = buildWorkloadEnvironment(env, params, knobs);

  const publisher = await (deps.createPublisher ?? createEventPublisher)(config.eventAddress);
  try {
    const result = await runJob({
      command,
      args: config.args,
      env: workloadEnv,
      stdio: deps.stdio,
      signalSource: deps.signalSource,
      forwardSignal: config.forwardSignal,
      onStateChange: (state, record) => {
        if (state === "running") {
          void publisher.publish({
            kind: "job.started",
            jobId: ctx.jobId,
            pid: record.pid,
            command: [command, ...config.args].join(" "),
            rendezvous: params,
          });
        }
      },
      onSignalForwarded: (received, forwarded) => {
        void publisher.publish({ kind: "job.signal", jobId: ctx.jobId, received, forwarded });
      },
    });

    void publisher.publish({
      kind: "job.exited",
      jobId: ctx.jobId,
      exitCode: result.exitCode,
      exitSignal: result.exitSignal,
      reason: result.reason,
    });
    return result.exitCode;
  } catch (err) {
    if (isLaunchError(err)) {
      void publisher.publish({
        kind: "job.failed",
        jobId: ctx.jobId,
        errorKind: err.kind,
        error: err.message,
      });
    }
    throw err;
  } finally {
    await publisher.close();
  }
}

/**
 * Run one launch and return the process exit code: the workload's own code,
 * or the code of the launcher failure that stopped it.
 */
export async function launch(config: LauncherConfig, deps: LaunchDeps = {}): Promise<number> {
  try {
    return await launchOrThrow(config, deps);
  } catch (err) {
    if (isLaunchError(err)) {
      log.error(describeLaunchFailure(err));
      return err.exitCode;
    }
    throw err;
  }
}
