import { readFile, rm, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { z } from "zod";
import type { UsersArgs } from "@cf-deploy/shared-types";
import type { CfApiClient } from "./cf-api.js";
import { ApiError, TransportError, ValidationError } from "./errors.js";
import { debug, info } from "./log.js";
import { prepareSubmitPayload } from "./payload.js";

export const GEARPUMP_COOKIE_FILE = "gpcookie";
export const REQUEST_BODY_FILE = "request_body";

const CookieFileSchema = z.object({ cookies: z.array(z.string()) });

async function send(url: string, init: RequestInit) {
  try {
    return await fetch(url, init);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unable to reach Gearpump";
    throw new TransportError(message, { url });
  }
}

/** `name=value` part of each Set-Cookie header. */
function sessionCookies(response: Response) {
  return response.headers
    .getSetCookie()
    .map((header) => header.split(";")[0]?.trim() ?? "")
    .filter(Boolean);
}

async function loadCookies(workDir: string) {
  const path = join(workDir, GEARPUMP_COOKIE_FILE);
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch {
    throw new ValidationError("No Gearpump session found, log in to Gearpump first", { path });
  }
  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch {
    value = undefined;
  }
  const parsed = CookieFileSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Corrupt Gearpump session file ${path}`, { path });
  }
  return parsed.data.cookies;
}

/**
 * Logs in to a Gearpump instance and saves the session cookie to
 * `<workDir>/gpcookie` for the next submission.
 */
export async function gearpumpLogin(
  gearpumpUrl: string,
  username: string,
  password: string,
  options: { workDir?: string } = {}
) {
  const url = `http://${gearpumpUrl}/login`;
  info(`Logging in to Gearpump at ${gearpumpUrl}`);
  const response = await send(url, {
    method: "POST",
    body: new URLSearchParams({ username, password })
  });
  const text = await response.text();
  if (!response.ok) {
    throw new ApiError(url, text, `Gearpump login failed (${response.status})`);
  }

  const cookies = sessionCookies(response);
  const path = join(options.workDir ?? process.cwd(), GEARPUMP_COOKIE_FILE);
  await writeFile(path, JSON.stringify({ cookies }), { mode: 0o600 });
  debug(`saved ${cookies.length} Gearpump cookie(s) to ${path}`);
  return text;
}

export interface DeployToGearpumpOptions {
  api: CfApiClient;
  gearpumpUrl: string;
  jarPath: string;
  instances: string[];
  usersArgs: UsersArgs;
  workDir?: string;
}

/**
 * Submits a jar to Gearpump with the credentials of the given service
 * instances. The saved session cookie and the request body file are removed
 * afterwards, also when the submission fails.
 */
export async function deployToGearpump(options: DeployToGearpumpOptions) {
  const workDir = options.workDir ?? process.cwd();
  const cookiePath = join(workDir, GEARPUMP_COOKIE_FILE);
  const bodyPath = join(workDir, REQUEST_BODY_FILE);
  const url = `http://${options.gearpumpUrl}/api/v1.0/master/submitapp`;

  try {
    const cookies = await loadCookies(workDir);
    const payload = await prepareSubmitPayload(options.api, options.instances, options.usersArgs);
    await writeFile(bodyPath, `tap=${JSON.stringify(payload)}`, { mode: 0o600 });

    const form = new FormData();
    form.set("jar", new Blob([await readFile(options.jarPath)]), basename(options.jarPath));
    form.set("configstring", new Blob([await readFile(bodyPath)]), REQUEST_BODY_FILE);

    info(`Submitting ${basename(options.jarPath)} to ${options.gearpumpUrl}`);
    const response = await send(url, {
      method: "POST",
      headers: { cookie: cookies.join("; ") },
      body: form
    });
    const text = await response.text();
    if (!response.ok) {
      throw new ApiError(url, text, `Gearpump submission failed (${response.status})`);
    }
    return text;
  } finally {
    await rm(cookiePath, { force: true });
    await rm(bodyPath, { force: true });
  }
}
