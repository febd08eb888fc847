/**
 * Launcher Configuration
 *
 * Precedence, lowest first: built-in defaults, LAUNCHER_* environment
 * variables, --flag=value arguments. The first argument that is not a flag
 * (or everything after "--") is the workload command line.
 */

import { constants as osConstants } from "node:os";
import { LaunchError } from "./errors.js";
import { DEFAULT_BASE_PORT, DEFAULT_FORWARD_SIGNAL, DEFAULT_PORT_OFFSET_RANGE } from "./protocol.js";
import type { AllocationEnv, LauncherConfig } from "./types.js";

export const USAGE = [
  "Usage: rendezvous-launch [options] [--] <command> [args...]",
  "",
  "Options:",
  "  --base-port=N          Base of the coordination port (default: 10000)",
  "  --port-range=N         Width of the job-id port offset window (default: 10000)",
  "  --forward-signal=SIG   Signal sent to the workload on SIGINT/SIGTERM (default: SIGTERM)",
  "  --tuning-file=PATH     JSON object replacing the default tuning variables",
  "  --events=ADDR          Publish lifecycle events on a ZeroMQ PUB socket",
  "  --dry-run              Print the workload environment and exit",
].join("\n");

function isSignalName(value: string): value is NodeJS.Signals {
  return Object.hasOwn(osConstants.signals, value);
}

function usageError(message: string): LaunchError {
  return new LaunchError("InvalidConfiguration", message);
}

function parseInteger(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw usageError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function parseSignal(name: string, raw: string): NodeJS.Signals {
  const normalized = raw.trim().toUpperCase();
  const candidate = normalized.startsWith("SIG") ? normalized : `SIG${normalized}`;
  if (!isSignalName(candidate)) {
    throw usageError(`${name} must be a signal name, got "${raw}"`);
  }
  return candidate;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveLauncherConfig(
  argv: readonly string[],
  env: AllocationEnv = process.env,
): LauncherConfig {
  const config: LauncherConfig = {
    args: [],
    basePort: DEFAULT_BASE_PORT,
    portOffsetRange: DEFAULT_PORT_OFFSET_RANGE,
    forwardSignal: DEFAULT_FORWARD_SIGNAL,
    dryRun: false,
  };

  const envBasePort = nonEmpty(env.LAUNCHER_BASE_PORT);
  if (envBasePort) {
    config.basePort = parseInteger("LAUNCHER_BASE_PORT", envBasePort);
  }
  const envPortRange = nonEmpty(env.LAUNCHER_PORT_RANGE);
  if (envPortRange) {
    config.portOffsetRange = parseInteger("LAUNCHER_PORT_RANGE", envPortRange);
  }
  const envSignal = nonEmpty(env.LAUNCHER_FORWARD_SIGNAL);
  if (envSignal) {
    config.forwardSignal = parseSignal("LAUNCHER_FORWARD_SIGNAL", envSignal);
  }
  config.tuningFile = nonEmpty(env.LAUNCHER_TUNING_FILE);
  config.eventAddress = nonEmpty(env.LAUNCHER_EVENT_ADDRESS);

  let commandStart = argv.length;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--") {
      commandStart = i + 1;
      break;
    }
    if (!arg.startsWith("--")) {
      commandStart = i;
      break;
    }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? undefined : arg.slice(eq + 1);

    if (flag === "--dry-run" && value === undefined) {
      config.dryRun = true;
      continue;
    }
    if (value === undefined) {
      throw usageError(`Unknown or incomplete option: ${arg}`);
    }
    switch (flag) {
      case "--base-port":
        config.basePort = parseInteger(flag, value);
        break;
      case "--port-range":
        config.portOffsetRange = parseInteger(flag, value);
        break;
      case "--forward-signal":
        config.forwardSignal = parseSignal(flag, value);
        break;
      case "--tuning-file":
        config.tuningFile = nonEmpty(value);
        break;
      case "--events":
        config.eventAddress = nonEmpty(value);
        break;
      default:
        throw usageError(`Unknown option: ${flag}`);
    }
  }

  const [command, ...args] = argv.slice(commandStart);
  if (command !== undefined) {
    config.command = command;
    config.args = args;
  } else if (!config.dryRun) {
    throw usageError("No workload command given");
  }

  return config;
}
