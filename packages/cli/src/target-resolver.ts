import type {
  ConnectionField,
  ConnectionParameters,
  CurrentTarget
} from "@cf-deploy/shared-types";

export interface PromptRequest {
  field: ConnectionField;
  /** Value shown as the default; empty when there is nothing to offer. */
  defaultValue: string;
  /** Input must not be echoed. Only set for the password. */
  secret: boolean;
}

export type PromptFn = (request: PromptRequest) => Promise<string>;

export interface TargetDecision {
  params: ConnectionParameters;
  loginRequired: boolean;
  targetRequired: boolean;
}

const VISIBLE_FIELDS = ["apiUrl", "user", "org", "space"] as const;
const LOGIN_FIELDS = ["apiUrl", "user"] as const;
const TARGET_FIELDS = ["org", "space"] as const;

type VisibleField = (typeof VISIBLE_FIELDS)[number];

function supplied(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/**
 * Works out the connection parameters to use and whether `cf login` and/or
 * `cf target` has to run, given the active session (`current`, undefined
 * when there is none) and the user's overrides. Missing overrides are asked
 * for through `prompt`, seeded with the current value; the password is never
 * seeded since the CLI does not expose it.
 */
export async function resolveTarget(
  current: CurrentTarget | undefined,
  overrides: Partial<ConnectionParameters>,
  prompt: PromptFn
): Promise<TargetDecision> {
  const ask = async (field: VisibleField) => {
    const override = overrides[field];
    if (supplied(override)) {
      return override;
    }
    return prompt({ field, defaultValue: current?.[field] ?? "", secret: false });
  };

  const apiUrl = await ask("apiUrl");
  const user = await ask("user");
  const password = supplied(overrides.password)
    ? overrides.password
    : await prompt({ field: "password", defaultValue: "", secret: true });
  const org = await ask("org");
  const space = await ask("space");

  const params: ConnectionParameters = { apiUrl, user, password, org, space };

  const differs = (field: VisibleField) => current === undefined || params[field] !== current[field];

  const loginRequired = password !== "" || LOGIN_FIELDS.some(differs);
  const targetRequired = loginRequired || TARGET_FIELDS.some(differs);

  return { params, loginRequired, targetRequired };
}
