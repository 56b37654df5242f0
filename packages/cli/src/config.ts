import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { DeployConfigSchema, type DeployConfig } from "@cf-deploy/shared-types";
import { DEFAULT_TEMP_KEY_NAME } from "./cf-api.js";
import { debug } from "./log.js";

export interface RuntimeConfig {
  cfBinary: string;
  mavenBinary: string;
  tempKeyName: string;
}

const CONFIG_PATH = join(homedir(), ".cf-deploy", "config.json");

function normalize(value?: string) {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Reads the config file; a missing or invalid file counts as empty. */
export function readConfig(path = CONFIG_PATH): DeployConfig {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch {
    return {};
  }

  try {
    const parsed = DeployConfigSchema.safeParse(JSON.parse(content));
    if (parsed.success) {
      return parsed.data;
    }
    debug(`ignoring invalid config at ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  } catch {
    debug(`ignoring unparsable config at ${path}`);
  }
  return {};
}

export function resolveRuntimeConfig(
  overrides: DeployConfig,
  env: NodeJS.ProcessEnv = process.env,
  fileConfig: DeployConfig = readConfig()
): RuntimeConfig {
  return {
    cfBinary:
      normalize(overrides.cfBinary) ??
      normalize(env.CF_DEPLOY_CF_BINARY) ??
      normalize(fileConfig.cfBinary) ??
      "cf",
    mavenBinary:
      normalize(overrides.mavenBinary) ??
      normalize(env.CF_DEPLOY_MAVEN_BINARY) ??
      normalize(fileConfig.mavenBinary) ??
      "mvn",
    tempKeyName:
      normalize(overrides.tempKeyName) ??
      normalize(env.CF_DEPLOY_TEMP_KEY_NAME) ??
      normalize(fileConfig.tempKeyName) ??
      DEFAULT_TEMP_KEY_NAME
  };
}
