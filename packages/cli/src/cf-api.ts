import {
  AppSchema,
  CfErrorBodySchema,
  ServiceBindingListSchema,
  ServiceBindingSchema,
  ServiceInstanceSchema,
  ServiceInstanceSummaryListSchema,
  ServiceKeySchema,
  UserProvidedInstanceSchema,
  type Credentials,
  type ServiceBinding,
  type ServiceInstanceSummary,
  type ServiceKey
} from "@cf-deploy/shared-types";
import type { z } from "zod";
import type { CfCurlTransport } from "./cf-cli.js";
import { ApiError, NotFoundError } from "./errors.js";
import { debug } from "./log.js";

export const SERVICE_INSTANCES_PATH = "/v2/service_instances";
export const SERVICE_KEYS_PATH = "/v2/service_keys";
export const SERVICE_BINDINGS_PATH = "/v2/service_bindings";
export const DEFAULT_TEMP_KEY_NAME = "DummyKey123";

/**
 * Client of the CF v2 REST API. Requests go through a `CfCurlTransport`
 * (normally `cf curl`), so they carry the token of the active CLI session.
 *
 * The API reports most failures in-band: `cf curl` exits 0 and the body holds
 * an `error_code`. Every response body is inspected for it.
 */
export class CfApiClient {
  constructor(
    private readonly transport: CfCurlTransport,
    private readonly options: { tempKeyName?: string } = {}
  ) {}

  private decode(path: string, raw: string): unknown {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      throw new ApiError(path, raw, `CF API returned a non-JSON body for ${path}`, "INVALID_RESPONSE");
    }

    const error = CfErrorBodySchema.safeParse(payload);
    if (error.success) {
      const description = error.data.description ?? error.data.error_code;
      throw new ApiError(path, raw, `CF API request to ${path} failed: ${description}`);
    }
    return payload;
  }

  private parse<S extends z.ZodTypeAny>(path: string, payload: unknown, schema: S): z.output<S> {
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new ApiError(
        path,
        JSON.stringify(payload),
        `Unexpected CF API response for ${path}: ${result.error.issues[0]?.message ?? "invalid shape"}`,
        "INVALID_RESPONSE"
      );
    }
    return result.data;
  }

  async get(path: string): Promise<unknown> {
    return this.decode(path, await this.transport.curl(path));
  }

  /** GET `path` and validate the body against `schema`. */
  async getParsed<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
    return this.parse(path, await this.get(path), schema);
  }

  async post(path: string, body: unknown): Promise<unknown> {
    return this.decode(path, await this.transport.curl(path, { method: "POST", body: JSON.stringify(body) }));
  }

  /** The API answers a successful DELETE with an empty body; anything else is an error. */
  async delete(path: string): Promise<void> {
    const raw = await this.transport.curl(path, { method: "DELETE" });
    if (raw.trim()) {
      throw new ApiError(path, raw, `CF API refused to delete ${path}: ${raw.trim()}`);
    }
  }

  /** Name and guid of every instance; plan details are only read by `getServiceInstance`. */
  async listServiceInstances(): Promise<ServiceInstanceSummary[]> {
    const payload = await this.get(SERVICE_INSTANCES_PATH);
    return this.parse(SERVICE_INSTANCES_PATH, payload, ServiceInstanceSummaryListSchema).resources;
  }

  async findInstanceGuidByName(name: string): Promise<string> {
    const instances = await this.listServiceInstances();
    const match = instances.find((resource) => resource.entity.name === name);
    if (!match) {
      throw new NotFoundError(`Service instance "${name}" not found`, { name });
    }
    return match.metadata.guid;
  }

  async getServiceInstance(name: string) {
    const path = `${SERVICE_INSTANCES_PATH}/${await this.findInstanceGuidByName(name)}`;
    return this.getParsed(path, ServiceInstanceSchema);
  }

  async createServiceKey(instanceGuid: string, keyName: string): Promise<ServiceKey> {
    const payload = await this.post(SERVICE_KEYS_PATH, {
      service_instance_guid: instanceGuid,
      name: keyName
    });
    return this.parse(SERVICE_KEYS_PATH, payload, ServiceKeySchema);
  }

  deleteServiceKey(keyGuid: string) {
    return this.delete(`${SERVICE_KEYS_PATH}/${keyGuid}`);
  }

  /**
   * Creates a service key for the instance, hands it to `use`, and deletes it
   * again whether `use` succeeds or throws. A failed delete propagates.
   */
  async withTemporaryServiceKey<T>(
    instanceName: string,
    use: (key: ServiceKey) => T | Promise<T>,
    keyName = this.options.tempKeyName ?? DEFAULT_TEMP_KEY_NAME
  ): Promise<T> {
    const instanceGuid = await this.findInstanceGuidByName(instanceName);
    const key = await this.createServiceKey(instanceGuid, keyName);
    debug(`created temporary key ${key.metadata.guid} for ${instanceName}`);
    try {
      return await use(key);
    } finally {
      await this.deleteServiceKey(key.metadata.guid);
      debug(`deleted temporary key ${key.metadata.guid}`);
    }
  }

  /** Reads an instance's credentials without leaving a service key behind. */
  createEphemeralCredential(instanceName: string, keyName?: string): Promise<Credentials> {
    return this.withTemporaryServiceKey(instanceName, (key) => key.entity.credentials, keyName);
  }

  async createServiceBinding(instanceGuid: string, appGuid: string): Promise<ServiceBinding> {
    const payload = await this.post(SERVICE_BINDINGS_PATH, {
      service_instance_guid: instanceGuid,
      app_guid: appGuid
    });
    return this.parse(SERVICE_BINDINGS_PATH, payload, ServiceBindingSchema);
  }

  deleteServiceBinding(binding: ServiceBinding) {
    return this.delete(binding.metadata.url);
  }

  async getAppName(appGuid: string) {
    const path = `/v2/apps/${appGuid}`;
    return (await this.getParsed(path, AppSchema)).entity.name;
  }

  async getUserProvidedCredentials(instanceGuid: string): Promise<Credentials> {
    const path = `/v2/user_provided_service_instances/${instanceGuid}`;
    return (await this.getParsed(path, UserProvidedInstanceSchema)).entity.credentials;
  }

  async getUserProvidedBindings(instanceGuid: string): Promise<ServiceBinding[]> {
    const path = `/v2/user_provided_service_instances/${instanceGuid}/service_bindings`;
    return (await this.getParsed(path, ServiceBindingListSchema)).resources;
  }
}
