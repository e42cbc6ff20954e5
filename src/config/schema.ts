import { z } from "zod";
import type { TriggerBotConfig } from "./types.js";

const snowflake = z.string().regex(/^\d{17,20}$/, "Expected a Discord id");

const discordSchema = z.object({
  token: z.string().min(1).optional(),
  applicationId: snowflake.optional(),
  devGuildId: snowflake.optional(),
});

const triggersSchema = z.object({
  managerRoleId: snowflake.optional(),
  adminUserIds: z.array(snowflake).default([]),
  maxPerGuild: z.number().int().positive().default(100),
});

const storageSchema = z.object({
  dataDir: z.string().min(1).optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).optional(),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const healthSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().positive().default(8080),
  hostname: z.string().default("0.0.0.0"),
});

export const triggerBotConfigSchema = z.object({
  discord: discordSchema.default({}),
  triggers: triggersSchema.default({}),
  storage: storageSchema.default({}),
  logging: loggingSchema.default({}),
  health: healthSchema.default({}),
});

export function parseConfig(raw: unknown): TriggerBotConfig {
  return triggerBotConfigSchema.parse(raw);
}
