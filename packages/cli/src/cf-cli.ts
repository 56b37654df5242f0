import type { ConnectionParameters, CurrentTarget } from "@cf-deploy/shared-types";
import { runChecked, type CommandRunner } from "./command-runner.js";
import type { TargetDecision } from "./target-resolver.js";
import { debug, info } from "./log.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface CurlRequest {
  method?: HttpMethod;
  body?: string;
}

export interface PushOptions {
  appName?: string;
  /** Passed to `cf push` as they are, e.g. `["--no-start"]`. */
  extraArgs?: string[];
}

/** Anything able to send a request to the CF API and hand back the raw response body. */
export interface CfCurlTransport {
  curl(path: string, request?: CurlRequest): Promise<string>;
}

const NOT_TARGETED = /^No (org|space) targeted\b/i;

function targetedValue(value: string | undefined) {
  return value === undefined || NOT_TARGETED.test(value) ? "" : value;
}

/**
 * Parses the output of `cf target`. Returns undefined when no API endpoint is
 * set; an org or space that is missing or reported as "No ... targeted"
 * comes back empty.
 */
export function parseTargetOutput(output: string): CurrentTarget | undefined {
  const fields = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    const match = /^\s*([A-Za-z][A-Za-z ]*?):\s*(.*?)\s*$/.exec(line);
    if (match) {
      fields.set(match[1].toLowerCase(), match[2]);
    }
  }

  const endpoint = (fields.get("api endpoint") ?? "").replace(/\s*\(API version:.*\)$/i, "");
  if (!endpoint) {
    return undefined;
  }

  return {
    apiUrl: endpoint,
    user: fields.get("user") ?? "",
    org: targetedValue(fields.get("org")),
    space: targetedValue(fields.get("space"))
  };
}

export class CfCli implements CfCurlTransport {
  constructor(
    private readonly runner: CommandRunner,
    private readonly binary = "cf"
  ) {}

  private exec(args: string[], cwd?: string) {
    return runChecked(this.runner, this.binary, args, { cwd });
  }

  /** The active session, or undefined when the CLI is not logged in. */
  async getTarget(): Promise<CurrentTarget | undefined> {
    const result = await this.runner.run(this.binary, ["target"]);
    if (result.exitCode !== 0) {
      debug("no active cf session");
      return undefined;
    }
    return parseTargetOutput(result.stdout);
  }

  async login(params: ConnectionParameters) {
    info(`Logging in to ${params.apiUrl} as ${params.user}`);
    await this.exec([
      "login",
      "-a",
      params.apiUrl,
      "-u",
      params.user,
      "-p",
      params.password,
      "-o",
      params.org,
      "-s",
      params.space
    ]);
  }

  async target(org: string, space: string) {
    info(`Targeting org ${org}, space ${space}`);
    await this.exec(["target", "-o", org, "-s", space]);
  }

  /** Logs in or retargets as the decision asks; a login also selects the org and space. */
  async apply(decision: TargetDecision) {
    if (decision.loginRequired) {
      await this.login(decision.params);
      return;
    }
    if (decision.targetRequired) {
      await this.target(decision.params.org, decision.params.space);
    }
  }

  async push(workDir: string, manifestPath: string, options: PushOptions = {}) {
    info(`Pushing ${options.appName ?? "application"} from ${workDir}`);
    const args = ["push"];
    if (options.appName) {
      args.push(options.appName);
    }
    args.push("-f", manifestPath, ...(options.extraArgs ?? []));
    await this.exec(args, workDir);
  }

  async oauthToken() {
    return (await this.exec(["oauth-token"])).trim();
  }

  async getOrgGuid(orgName: string) {
    return (await this.exec(["org", orgName, "--guid"])).trim();
  }

  curl(path: string, request: CurlRequest = {}) {
    const args = ["curl", path];
    if (request.method && request.method !== "GET") {
      args.push("-X", request.method);
    }
    if (request.body !== undefined) {
      args.push("-d", request.body);
    }
    return this.exec(args);
  }
}
