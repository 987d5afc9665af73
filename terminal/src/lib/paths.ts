import path from "node:path";

import { defaults } from "../../../sdk/typescript/src/config.js";

export const paths = {
  configFile: defaults.DEFAULT_CONFIG_PATH,
  /** Relative log paths resolve against the directory the launcher starts in. */
  resolveLogFile(logFile: string, cwd: string = process.cwd()): string {
    return path.resolve(cwd, logFile);
  },
} as const;
