/**
 * Command-line front end: argv -> config -> launch -> exit code.
 */

import { createSubsystemLogger } from "./logging/subsystem.js";
import { USAGE, resolveLauncherConfig } from "./process/launcher/config.js";
import { isLaunchError } from "./process/launcher/errors.js";
import { launch } from "./process/launcher/launcher.js";
import type { AllocationEnv, LauncherConfig } from "./process/launcher/types.js";

const log = createSubsystemLogger("launcher/cli");

export type CliDeps = {
  env?: AllocationEnv;
  launch?: (config: LauncherConfig) => Promise<number>;
};

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  if (argv[0] === "--help" || argv[0] === "-h") {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  let config: LauncherConfig;
  try {
    config = resolveLauncherConfig(argv, deps.env);
  } catch (err) {
    if (isLaunchError(err)) {
      log.error(err.message);
      process.stderr.write(`${USAGE}\n`);
      return err.exitCode;
    }
    throw err;
  }

  return await (deps.launch ?? launch)(config);
}
