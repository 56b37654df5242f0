import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { UploadResponseSchema } from "@cf-deploy/shared-types";
import type { CfCli } from "./cf-cli.js";
import { getBaseDomain } from "./domain.js";
import { ApiError, TransportError } from "./errors.js";
import { info } from "./log.js";

export interface UploadOptions {
  cf: CfCli;
  apiUrl: string;
  orgName: string;
  filePath: string;
  title: string;
  category?: string;
}

export function uploaderUrl(apiUrl: string, orgGuid: string) {
  return `http://hdfs-uploader.${getBaseDomain(apiUrl)}/rest/upload/${orgGuid}`;
}

/**
 * Uploads a file to HDFS through the platform's uploader application and
 * returns its `<objectStoreId>/<idInObjectStore>` path.
 */
export async function uploadToHdfs(options: UploadOptions): Promise<string> {
  const orgGuid = await options.cf.getOrgGuid(options.orgName);
  const token = await options.cf.oauthToken();
  const url = uploaderUrl(options.apiUrl, orgGuid);

  const form = new FormData();
  form.set("orgUUID", orgGuid);
  form.set("category", options.category ?? "other");
  form.set("title", options.title);
  form.set("publicRequest", "false");
  form.set("file", new Blob([await readFile(options.filePath)]), basename(options.filePath));

  info(`Uploading ${options.filePath} to ${url}`);
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { authorization: token },
      body: form
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unable to reach the uploader";
    throw new TransportError(message, { url });
  }

  const raw = await response.text();
  if (!response.ok) {
    throw new ApiError(url, raw, `Upload failed (${response.status})`);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ApiError(url, raw, "Uploader returned a non-JSON body", "INVALID_RESPONSE");
  }
  const parsed = UploadResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ApiError(url, raw, "Uploader response is missing objectStoreId or idInObjectStore", "INVALID_RESPONSE");
  }
  return `${parsed.data.objectStoreId}/${parsed.data.idInObjectStore}`;
}
