import { readdir } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { realpathSync } from "node:fs";
import type { ConnectionParameters } from "@cf-deploy/shared-types";
import type { CfCli, PushOptions } from "./cf-cli.js";
import { runChecked, type CommandRunner } from "./command-runner.js";
import { normalizeApiUrl } from "./domain.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { info } from "./log.js";
import { connectionPrompt, FIELD_LABELS, type Prompter } from "./prompter.js";
import { resolveTarget, type TargetDecision } from "./target-resolver.js";

const REQUIRED_FIELDS = ["apiUrl", "user", "org", "space"] as const;

/**
 * Reads the active session, asks for whatever the overrides leave out and
 * returns the resolved decision. Fails when a required value is still empty.
 */
export async function collectTarget(
  cf: CfCli,
  overrides: Partial<ConnectionParameters>,
  prompter: Prompter
): Promise<TargetDecision> {
  const session = await cf.getTarget();
  const current = session && { ...session, apiUrl: normalizeApiUrl(session.apiUrl) };
  const ask = connectionPrompt(prompter);
  const decision = await resolveTarget(
    current,
    { ...overrides, apiUrl: overrides.apiUrl ? normalizeApiUrl(overrides.apiUrl) : overrides.apiUrl },
    async (request) => {
      const answer = await ask(request);
      return request.field === "apiUrl" ? normalizeApiUrl(answer) : answer;
    }
  );

  const missing = REQUIRED_FIELDS.filter((field) => decision.params[field] === "");
  if (missing.length > 0) {
    throw new ValidationError(
      `Missing ${missing.map((field) => FIELD_LABELS[field]).join(", ")}`,
      { fields: missing }
    );
  }
  if (decision.loginRequired && decision.params.password === "") {
    throw new ValidationError("Password is required to log in to a new API endpoint or user", {
      fields: ["password"]
    });
  }
  return decision;
}

/** Runs `mvn clean package` in `workDir`. */
export async function preparePackage(runner: CommandRunner, workDir: string, mavenBinary = "mvn") {
  info(`Building package in ${workDir}`);
  await runChecked(runner, mavenBinary, ["clean", "package"], { cwd: workDir, inherit: true });
}

/** `cf push` of the application described by `<workDir>/manifest.yml`. */
export function push(cf: CfCli, workDir: string, options: PushOptions = {}) {
  return cf.push(workDir, join(workDir, "manifest.yml"), options);
}

/** Name of the first `*-with-dependencies.jar` in `targetDir`. */
export async function findJarFile(targetDir: string) {
  const entries = await readdir(targetDir);
  const jar = entries.find((entry) => entry.endsWith("-with-dependencies.jar"));
  if (!jar) {
    throw new NotFoundError(`No *-with-dependencies.jar in ${targetDir}`, { dir: targetDir });
  }
  return jar;
}

/** Project root of a deployment script kept one level below it (e.g. `<project>/deploy/deploy.ts`). */
export function getProjectDir(scriptPath: string) {
  return resolve(dirname(realpathSync(scriptPath)), "..");
}

export interface DeployOptions {
  cf: CfCli;
  runner: CommandRunner;
  prompter: Prompter;
  overrides: Partial<ConnectionParameters>;
  appName: string;
  projectDir: string;
  skipBuild?: boolean;
  pushArgs?: string[];
  mavenBinary?: string;
}

/** Logs in or retargets as needed, builds the project and pushes it. */
export async function deployApplication(options: DeployOptions) {
  const decision = await collectTarget(options.cf, options.overrides, options.prompter);
  await options.cf.apply(decision);
  if (!options.skipBuild) {
    await preparePackage(options.runner, options.projectDir, options.mavenBinary);
  }
  await push(options.cf, options.projectDir, { appName: options.appName, extraArgs: options.pushArgs });
  info(`Deployed ${options.appName} to ${decision.params.org}/${decision.params.space}`);
  return decision;
}
