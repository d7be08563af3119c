import fs from "node:fs";
import path from "node:path";

import { defaultProjectConfig, type ProjectConfig } from "../core/config.js";
import { DEFAULT_CONFIG_FILENAME, loadProjectConfig } from "../core/config-loader.js";

// =============================================================================
// CONFIG RESOLUTION (CLI)
//
// - an explicit --config must exist
// - otherwise ./proposal-forge.yaml is used when present
// - otherwise built-in defaults, with directories under the cwd
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export type CliConfig = {
  config: ProjectConfig;
  configPath: string | null;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): CliConfig {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitConfigPath) {
    const configPath = path.resolve(cwd, args.explicitConfigPath);
    return { config: loadProjectConfig(configPath), configPath };
  }

  const discovered = path.join(cwd, DEFAULT_CONFIG_FILENAME);
  if (fs.existsSync(discovered)) {
    return { config: loadProjectConfig(discovered), configPath: discovered };
  }

  const defaults = defaultProjectConfig();
  return {
    config: {
      ...defaults,
      sessions_dir: path.resolve(cwd, defaults.sessions_dir),
      logs_dir: path.resolve(cwd, defaults.logs_dir),
    },
    configPath: null,
  };
}
