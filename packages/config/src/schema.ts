import { z } from "zod";

import { CORE_LOG_LEVELS, type CoreLogLevel } from "@credential-core/telemetry";

const booleanish = z.union([
  z.boolean(),
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((value) => value === "true" || value === "1" || value === "yes"),
]);

const positiveInt = z.coerce.number().int().positive();

const logLevelSchema = z
  .string()
  .refine((value): value is CoreLogLevel => (CORE_LOG_LEVELS as ReadonlyArray<string>).includes(value), {
    message: `logLevel must be one of: ${CORE_LOG_LEVELS.join(", ")}`,
  });

export const authCoreConfigSchema = z
  .object({
    scheme: z.enum(["basic", "bearer"]).default("bearer"),
    storePath: z.string().min(1).default("./users.json"),
    minUsernameLength: positiveInt.default(3),
    minPasswordLength: positiveInt.default(6),
    salt: z.string().min(1, "salt is required"),
    signingKey: z.string().min(1).optional(),
    tokenTtlSeconds: positiveInt.default(1800),
    issuer: z.string().min(1).default("credential-core"),
    roleAware: booleanish.default(false),
    logRegistrations: booleanish.default(true),
    readFailurePolicy: z.enum(["empty", "fail"]).default("empty"),
    defaultAdmin: z
      .object({
        username: z.string().min(1),
        password: z.string().min(1),
      })
      .optional(),
    logLevel: logLevelSchema.default("info"),
  })
  .superRefine((config, context) => {
    if (config.scheme === "bearer" && !config.signingKey) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["signingKey"],
        message: "signingKey is required when scheme is bearer",
      });
    }
    if (config.defaultAdmin && !config.roleAware) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultAdmin"],
        message: "defaultAdmin requires roleAware",
      });
    }
  });

export type AuthCoreConfigInput = z.input<typeof authCoreConfigSchema>;

export type AuthCoreConfig = z.output<typeof authCoreConfigSchema>;

export type AuthScheme = AuthCoreConfig["scheme"];
