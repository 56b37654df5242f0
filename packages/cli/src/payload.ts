import {
  ServicePlanSchema,
  ServiceSchema,
  type Credentials,
  type SubmitInstanceEntry,
  type SubmitPayload,
  type UsersArgs
} from "@cf-deploy/shared-types";
import type { CfApiClient } from "./cf-api.js";
import { ValidationError } from "./errors.js";

export interface InstanceData {
  label: string;
  plan: string;
  tags: string[];
  credentials: Credentials;
}

/** Plan name, service label, tags and credentials of one service instance. */
export async function getServiceInstanceData(api: CfApiClient, instanceName: string): Promise<InstanceData> {
  const instance = await api.getServiceInstance(instanceName);

  const plan = await api.getParsed(instance.entity.service_plan_url, ServicePlanSchema);
  const service = await api.getParsed(plan.entity.service_url, ServiceSchema);

  const credentials = await api.createEphemeralCredential(instanceName);

  return {
    label: service.entity.label,
    plan: plan.entity.name,
    tags: instance.entity.tags,
    credentials
  };
}

/**
 * Builds the body of a Gearpump `submitapp` request: one entry per service
 * label, plus the `usersArgs` section. Instances sharing a label overwrite
 * each other, the last one listed wins.
 */
export async function prepareSubmitPayload(
  api: CfApiClient,
  instanceNames: string[],
  usersArgs: UsersArgs
): Promise<SubmitPayload> {
  const payload: SubmitPayload = {};
  for (const name of instanceNames) {
    const data = await getServiceInstanceData(api, name);
    const entry: SubmitInstanceEntry = {
      label: data.label,
      name,
      plan: data.plan,
      tags: data.tags,
      credentials: data.credentials
    };
    payload[data.label] = [entry];
  }
  payload.usersArgs = usersArgs;
  return payload;
}

/** Parses repeated `key=value` arguments into the `usersArgs` map. */
export function parseUsersArgs(pairs: string[]): UsersArgs {
  const args: UsersArgs = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      throw new ValidationError(`Expected key=value, got "${pair}"`);
    }
    args[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return args;
}
