import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_CONFIG_FILENAME = "proposal-forge.yaml";

const ENV_REFERENCE = /\$\{([A-Z0-9_]+)\}/gi;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Reads, expands and validates a YAML project config.
 * `sessions_dir` and `logs_dir` come back absolute, relative to the config file.
 */
export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `Project config not found at ${absolutePath}.`,
      hint: `Create ${DEFAULT_CONFIG_FILENAME} or drop --config to use defaults.`,
    });
  }

  try {
    const config = parseProjectConfig(readYamlDocument(absolutePath), absolutePath);
    const configDir = path.dirname(absolutePath);
    return {
      ...config,
      sessions_dir: path.resolve(configDir, config.sessions_dir),
      logs_dir: path.resolve(configDir, config.logs_dir),
    };
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Project config at ${absolutePath} is invalid.`,
      hint: "Fix the config file and rerun.",
      cause: err,
    });
  }
}

/** Validates an already-loaded document; `${VAR}` references are expanded first. */
export function parseProjectConfig(doc: unknown, sourceLabel: string): ProjectConfig {
  const parsed = ProjectConfigSchema.safeParse(substituteEnv(doc ?? {}, sourceLabel, []));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid project config at ${sourceLabel}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }
  return parsed.data;
}

/** One line per issue, prefixed with its dotted path. */
export function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issuePath(issue.path)}: ${describeIssue(issue)}`).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function readYamlDocument(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read project config at ${filePath}`, err);
  }

  try {
    return yaml.load(raw);
  } catch (err) {
    const at =
      err instanceof yaml.YAMLException && err.mark
        ? ` (line ${err.mark.line + 1}, column ${err.mark.column + 1})`
        : "";
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML config at ${filePath}${at}: ${detail}`, err);
  }
}

function substituteEnv(value: unknown, file: string, trail: readonly (string | number)[]): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REFERENCE, (_match, name: string) => {
      const resolved = process.env[name];
      if (resolved === undefined) {
        throw new ConfigError(
          `Environment variable ${name} is not set but is referenced in ${file} (${issuePath(trail)}).`,
        );
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => substituteEnv(item, file, [...trail, index]));
  }
  if (value && typeof value === "object") {
    const expanded: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      expanded[key] = substituteEnv(child, file, [...trail, key]);
    }
    return expanded;
  }
  return value;
}

function issuePath(segments: readonly (string | number)[]): string {
  return segments.length > 0 ? segments.join(".") : "<root>";
}

function describeIssue(issue: ZodIssue): string {
  switch (issue.code) {
    case "invalid_type":
      return `Expected ${issue.expected}, received ${issue.received}`;
    case "invalid_enum_value":
      return `Expected one of ${issue.options.map((option) => JSON.stringify(option)).join(", ")}, received ${JSON.stringify(issue.received)}`;
    case "unrecognized_keys":
      return `Unrecognized keys: ${issue.keys.join(", ")}`;
    default:
      return issue.message;
  }
}
