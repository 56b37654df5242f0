import { z } from "zod";

export const GuidSchema = z.string().min(1);

export const ResourceMetadataSchema = z
  .object({
    guid: GuidSchema,
    url: z.string().min(1)
  })
  .passthrough();

export function resourceSchema<E extends z.ZodTypeAny>(entity: E) {
  return z.object({
    metadata: ResourceMetadataSchema,
    entity
  });
}

export function resourceListSchema<E extends z.ZodTypeAny>(entity: E) {
  return z.object({
    resources: z.array(resourceSchema(entity))
  });
}

export const CredentialsSchema = z.record(z.unknown());

export const ServiceInstanceEntitySchema = z
  .object({
    name: z.string().min(1),
    tags: z.array(z.string()).default([]),
    service_plan_url: z.string().min(1)
  })
  .passthrough();

export const ServicePlanEntitySchema = z
  .object({
    name: z.string().min(1),
    service_url: z.string().min(1)
  })
  .passthrough();

export const ServiceEntitySchema = z
  .object({
    label: z.string().min(1)
  })
  .passthrough();

export const ServiceKeyEntitySchema = z
  .object({
    name: z.string().min(1),
    credentials: CredentialsSchema
  })
  .passthrough();

export const ServiceBindingEntitySchema = z
  .object({
    app_guid: GuidSchema,
    service_instance_guid: GuidSchema
  })
  .passthrough();

export const AppEntitySchema = z
  .object({
    name: z.string().min(1)
  })
  .passthrough();

export const UserProvidedInstanceEntitySchema = z
  .object({
    name: z.string().min(1),
    credentials: CredentialsSchema
  })
  .passthrough();

export const ServiceInstanceSchema = resourceSchema(ServiceInstanceEntitySchema);

/** Only what a name lookup reads; the listing may hold instances of any shape. */
export const ServiceInstanceSummarySchema = z
  .object({
    metadata: z.object({ guid: GuidSchema }).passthrough(),
    entity: z.object({ name: z.string() }).passthrough()
  })
  .passthrough();

export const ServiceInstanceSummaryListSchema = z.object({
  resources: z.array(ServiceInstanceSummarySchema)
});

export const ServicePlanSchema = resourceSchema(ServicePlanEntitySchema);
export const ServiceSchema = resourceSchema(ServiceEntitySchema);
export const ServiceKeySchema = resourceSchema(ServiceKeyEntitySchema);
export const ServiceBindingSchema = resourceSchema(ServiceBindingEntitySchema);
export const ServiceBindingListSchema = resourceListSchema(ServiceBindingEntitySchema);
export const AppSchema = resourceSchema(AppEntitySchema);
export const UserProvidedInstanceSchema = resourceSchema(UserProvidedInstanceEntitySchema);

/** In-band error body returned by the CF API, with or without an HTTP error status. */
export const CfErrorBodySchema = z
  .object({
    error_code: z.string(),
    description: z.string().optional(),
    code: z.number().optional()
  })
  .passthrough();

export const UploadResponseSchema = z
  .object({
    objectStoreId: z.string().min(1),
    idInObjectStore: z.string().min(1)
  })
  .passthrough();

export const ConnectionFieldSchema = z.enum(["apiUrl", "user", "password", "org", "space"]);

export const ConnectionParametersSchema = z.object({
  apiUrl: z.string(),
  user: z.string(),
  password: z.string(),
  org: z.string(),
  space: z.string()
});

export const CurrentTargetSchema = ConnectionParametersSchema.omit({ password: true });

export const DeployConfigSchema = z
  .object({
    cfBinary: z.string().min(1).optional(),
    mavenBinary: z.string().min(1).optional(),
    tempKeyName: z.string().min(1).optional()
  });

export const SubmitInstanceEntrySchema = z.object({
  label: z.string(),
  name: z.string(),
  plan: z.string(),
  tags: z.array(z.string()),
  credentials: CredentialsSchema
});

export type ResourceMetadata = z.infer<typeof ResourceMetadataSchema>;
export type ServiceInstance = z.infer<typeof ServiceInstanceSchema>;
export type ServiceInstanceSummary = z.infer<typeof ServiceInstanceSummarySchema>;
export type ServicePlan = z.infer<typeof ServicePlanSchema>;
export type Service = z.infer<typeof ServiceSchema>;
export type ServiceKey = z.infer<typeof ServiceKeySchema>;
export type ServiceBinding = z.infer<typeof ServiceBindingSchema>;
export type App = z.infer<typeof AppSchema>;
export type Credentials = z.infer<typeof CredentialsSchema>;
export type CfErrorBody = z.infer<typeof CfErrorBodySchema>;
export type UploadResponse = z.infer<typeof UploadResponseSchema>;
export type ConnectionField = z.infer<typeof ConnectionFieldSchema>;
export type ConnectionParameters = z.infer<typeof ConnectionParametersSchema>;
export type CurrentTarget = z.infer<typeof CurrentTargetSchema>;
export type DeployConfig = z.infer<typeof DeployConfigSchema>;
export type SubmitInstanceEntry = z.infer<typeof SubmitInstanceEntrySchema>;

export type UsersArgs = Record<string, string>;

/** Gearpump submitapp body: service label -> bound instances, plus the `usersArgs` section. */
export type SubmitPayload = Record<string, SubmitInstanceEntry[] | UsersArgs>;
