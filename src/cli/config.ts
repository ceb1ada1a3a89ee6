import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import type { ProbelineConfig } from "../core/config.js";
import { loadConfigOrDefaults, type ConfigSource } from "../core/config-loader.js";

// =============================================================================
// CONFIG RESOLUTION (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export function loadConfigForCli(args: LoadConfigForCliArgs): {
  config: ProbelineConfig;
  configPath?: string;
  source: ConfigSource;
} {
  try {
    const { config, resolution } = loadConfigOrDefaults({
      explicitPath: args.explicitConfigPath,
      cwd: args.cwd,
    });
    return { config, configPath: resolution.configPath, source: resolution.source };
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config error.",
        message: error.message,
        hint: "Check the YAML file passed with --config, or ./probeline.yaml.",
        next: "Remove unknown keys and make sure referenced environment variables are set.",
        cause: error,
      });
    }
    throw error;
  }
}
