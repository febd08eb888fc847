#!/usr/bin/env node
/**
 * rendezvous-launch
 *
 * Usage: rendezvous-launch [options] [--] srun -W 0 python3 train.py [args...]
 */

import { runCli } from "./cli.js";
import { createSubsystemLogger } from "./logging/subsystem.js";
import { INTERNAL_ERROR_EXIT_CODE } from "./process/launcher/protocol.js";

const log = createSubsystemLogger("launcher/cli");

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.fatal(`Launcher crashed: ${String(err)}`);
    process.exitCode = INTERNAL_ERROR_EXIT_CODE;
  },
);
