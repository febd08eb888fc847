import { EventEmitter } from "node:events";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveLauncherConfig } from "./config.js";
import type { LaunchEventPublisher } from "./events.js";
import { LaunchError } from "./errors.js";
import { describeLaunchFailure, launch } from "./launcher.js";
import type { LaunchEventBody } from "./types.js";

const allocationEnv = {
  SLURM_JOB_ID: "123456",
  SLURM_JOB_NODELIST: "nodeA,nodeB",
  SLURM_JOB_NUM_NODES: "2",
  SLURM_NTASKS_PER_NODE: "4",
  SLURM_CPUS_PER_TASK: "7",
};

const REPORT_ENV = `
const fs = require("node:fs");
const keys = ["MASTER_PORT", "WORLD_SIZE", "MASTER_ADDR", "NCCL_SOCKET_IFNAME", "OMP_NUM_THREADS"];
fs.writeFileSync(process.env.REPORT_FILE, JSON.stringify(Object.fromEntries(keys.map((k) => [k, process.env[k]]))));
process.exit(3);
`;

function recordingPublisher() {
  const events: LaunchEventBody[] = [];
  const publisher: LaunchEventPublisher = {
    publish: async (event) => {
      events.push(event);
    },
    close: vi.fn(async () => {}),
  };
  return { events, publisher, createPublisher: vi.fn(async (_address?: string) => publisher) };
}

describe("launch", () => {
  let dir = "";

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "launcher-launch-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should print the workload environment on a dry run", async () => {
    const lines: string[] = [];
    const code = await launch(resolveLauncherConfig(["--dry-run"], {}), {
      env: allocationEnv,
      writeLine: (line) => lines.push(line),
    });

    expect(code).toBe(0);
    expect(lines).toEqual([
      "NCCL_SOCKET_IFNAME=hsn",
      "NCCL_NSOCKS_PERTHREAD=4",
      "NCCL_SOCKET_NTHREADS=2",
      "NCCL_MIN_CHANNELS=32",
      "OMP_NUM_THREADS=7",
      "MASTER_PORT=13456",
      "WORLD_SIZE=8",
      "MASTER_ADDR=nodeA",
    ]);
  });

  it("should keep log lines off stdout on a dry run", async () => {
    const chunks: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      chunks.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    try {
      const code = await launch(resolveLauncherConfig(["--dry-run"], {}), { env: allocationEnv });
      expect(code).toBe(0);
    } finally {
      vi.restoreAllMocks();
    }

    const written = chunks.join("");
    expect(written.split("\n")).toEqual([
      "NCCL_SOCKET_IFNAME=hsn",
      "NCCL_NSOCKS_PERTHREAD=4",
      "NCCL_SOCKET_NTHREADS=2",
      "NCCL_MIN_CHANNELS=32",
      "OMP_NUM_THREADS=7",
      "MASTER_PORT=13456",
      "WORLD_SIZE=8",
      "MASTER_ADDR=nodeA",
      "",
    ]);
  });

  it("should use a tuning file in place of the default knobs", async () => {
    const tuningFile = path.join(dir, "tuning.json");
    fs.writeFileSync(tuningFile, JSON.stringify({ WANDB_MODE: "offline" }));
    const lines: string[] = [];

    await launch(resolveLauncherConfig([`--tuning-file=${tuningFile}`, "--dry-run"], {}), {
      env: allocationEnv,
      writeLine: (line) => lines.push(line),
    });

    expect(lines).toEqual([
      "WANDB_MODE=offline",
      "OMP_NUM_THREADS=7",
      "MASTER_PORT=13456",
      "WORLD_SIZE=8",
      "MASTER_ADDR=nodeA",
    ]);
  });

  it("should run the workload with the published environment and return its exit code", async () => {
    const reportFile = path.join(dir, "report.json");
    const { events, publisher, createPublisher } = recordingPublisher();
    const masterPortBefore = process.env.MASTER_PORT;

    const code = await launch(resolveLauncherConfig([process.execPath, "-e", REPORT_ENV], {}), {
      env: { ...allocationEnv, REPORT_FILE: reportFile },
      stdio: "ignore",
      signalSource: new EventEmitter(),
      createPublisher,
    });

    expect(code).toBe(3);
    expect(JSON.parse(fs.readFileSync(reportFile, "utf-8"))).toEqual({
      MASTER_PORT: "13456",
      WORLD_SIZE: "8",
      MASTER_ADDR: "nodeA",
      NCCL_SOCKET_IFNAME: "hsn",
      OMP_NUM_THREADS: "7",
    });
    expect(process.env.MASTER_PORT).toBe(masterPortBefore);
    expect(events.map((e) => e.kind)).toEqual(["job.started", "job.exited"]);
    expect(events[1]).toEqual({
      kind: "job.exited",
      jobId: "123456",
      exitCode: 3,
      exitSignal: null,
      reason: "exit",
    });
    expect(publisher.close).toHaveBeenCalledTimes(1);
  });

  it("should forward a termination signal and report the synthesized exit code", async () => {
    const signals = new EventEmitter();
    const { events, createPublisher } = recordingPublisher();
    const config = resolveLauncherConfig([process.execPath, "-e", "setInterval(() => {}, 1000);"], {});

    const code = await launch(config, {
      env: allocationEnv,
      stdio: "ignore",
      signalSource: signals,
      createPublisher: async (address) => {
        const created = await createPublisher(address);
        return {
          publish: async (event) => {
            await created.publish(event);
            if (event.kind === "job.started") {
              setTimeout(() => signals.emit("SIGTERM", "SIGTERM"), 50);
            }
          },
          close: () => created.close(),
        };
      },
    });

    expect(code).toBe(143);
    expect(events.map((e) => e.kind)).toEqual(["job.started", "job.signal", "job.exited"]);
    expect(events[1]).toEqual({
      kind: "job.signal",
      jobId: "123456",
      received: "SIGTERM",
      forwarded: "SIGTERM",
    });
  });

  it("should stop before spawning when the allocation is incomplete", async () => {
    const reportFile = path.join(dir, "report.json");
    const { createPublisher } = recordingPublisher();
    const { SLURM_JOB_ID: _unused, ...env } = allocationEnv;

    const code = await launch(resolveLauncherConfig([process.execPath, "-e", REPORT_ENV], {}), {
      env: { ...env, REPORT_FILE: reportFile },
      stdio: "ignore",
      createPublisher,
    });

    expect(code).toBe(200);
    expect(createPublisher).not.toHaveBeenCalled();
    expect(fs.existsSync(reportFile)).toBe(false);
  });

  it("should return the InconsistentAllocation code when the task totals disagree", async () => {
    const code = await launch(resolveLauncherConfig(["--dry-run"], {}), {
      env: { ...allocationEnv, SLURM_NTASKS: "16" },
      writeLine: () => {},
    });
    expect(code).toBe(204);
  });

  it("should return the SpawnFailure code and announce the failure", async () => {
    const { events, createPublisher } = recordingPublisher();

    const code = await launch(resolveLauncherConfig([path.join(dir, "missing-binary")], {}), {
      env: allocationEnv,
      stdio: "ignore",
      signalSource: new EventEmitter(),
      createPublisher,
    });

    expect(code).toBe(208);
    expect(events.map((e) => e.kind)).toEqual(["job.failed"]);
    expect(events[0]).toMatchObject({ kind: "job.failed", jobId: "123456", errorKind: "SpawnFailure" });
  });
});

describe("describeLaunchFailure", () => {
  it("should say nothing was spawned for configuration errors", () => {
    const err = new LaunchError("InvalidJobId", "SLURM_JOB_ID has no trailing digits");
    expect(err.isConfigurationError).toBe(true);
    expect(describeLaunchFailure(err)).toBe(
      "Launch aborted before spawning the workload (InvalidJobId): SLURM_JOB_ID has no trailing digits",
    );
  });

  it("should report spawn failures as a workload that could not start", () => {
    const err = new LaunchError("SpawnFailure", "Failed to spawn srun: spawn srun ENOENT");
    expect(err.isConfigurationError).toBe(false);
    expect(describeLaunchFailure(err)).toBe(
      "Workload could not be started (SpawnFailure): Failed to spawn srun: spawn srun ENOENT",
    );
  });
});
