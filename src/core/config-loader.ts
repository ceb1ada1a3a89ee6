import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import {
  DEFAULT_CONFIG_FILE,
  defaultConfig,
  ProbelineConfigSchema,
  type ProbelineConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// RESOLUTION
// =============================================================================

export type ConfigSource = "explicit" | "cwd" | "defaults";

export type ConfigResolution = {
  configPath?: string;
  source: ConfigSource;
};

export function resolveConfigPath(args: { explicitPath?: string; cwd?: string }): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const candidate = path.join(args.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  if (fs.existsSync(candidate)) {
    return { configPath: candidate, source: "cwd" };
  }

  return { source: "defaults" };
}

// =============================================================================
// LOADING
// =============================================================================

export function loadProbelineConfig(configPath: string): ProbelineConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config not found at: ${configPath}`);
  }

  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML config: ${configPath}`, err);
  }

  // An empty file means "all defaults".
  const expanded = expandEnv(doc ?? {}, { file: configPath, trail: [] });

  const parsed = ProbelineConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config: ${configPath}\n${parsed.error.toString()}`);
  }

  return normalizePaths(parsed.data, path.dirname(path.resolve(configPath)));
}

// Relative paths resolve against the config file's directory, or the cwd for defaults.
function normalizePaths(config: ProbelineConfig, baseDir: string): ProbelineConfig {
  return {
    ...config,
    output_dir: path.resolve(baseDir, config.output_dir),
    scan_dirs: config.scan_dirs.map((dir) => path.resolve(baseDir, dir)),
  };
}

export function loadConfigOrDefaults(args: { explicitPath?: string; cwd?: string }): {
  config: ProbelineConfig;
  resolution: ConfigResolution;
} {
  const resolution = resolveConfigPath(args);
  if (!resolution.configPath) {
    return {
      config: normalizePaths(defaultConfig(), args.cwd ?? process.cwd()),
      resolution,
    };
  }

  return { config: loadProbelineConfig(resolution.configPath), resolution };
}
