import { z } from "zod";
import type { VerseBotConfig } from "./types.js";

const HOUR_MS = 3_600_000;

const matrixSchema = z.object({
  homeserver: z.string().url().optional(),
  userId: z.string().regex(/^@[^:]+:.+$/, "must look like @user:server").optional(),
  rooms: z
    .array(z.string().regex(/^[!#][^:]+:.+$/, "must be a room id (!id:server) or alias (#alias:server)"))
    .min(1, "at least one room is required"),
  e2ee: z.object({
    enabled: z.boolean().default(false),
  }).default({}),
});

const botSchema = z.object({
  defaultTranslation: z.string().min(1).default("kjv").transform((value) => value.toLowerCase()),
  cacheEnabled: z.boolean().default(true),
  cacheMaxEntries: z.number().int().positive().default(128),
  cacheTtlMs: z.number().positive().default(12 * HOUR_MS),
  maxMessageLength: z.number().int().positive().default(2000),
  splitMessageLength: z.number().int().min(0).default(0),
  preservePoetryFormatting: z.boolean().default(false),
  detectReferencesAnywhere: z.boolean().default(false),
  unknownBookPolicy: z.enum(["lenient", "strict"]).default("lenient"),
  requestTimeoutMs: z.number().int().positive().default(10_000),
});

const apiKeysSchema = z.object({
  esv: z.string().min(1).optional(),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const verseBotConfigSchema = z.object({
  matrix: matrixSchema,
  bot: botSchema.default({}),
  apiKeys: apiKeysSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): VerseBotConfig {
  const config = verseBotConfigSchema.parse(raw);
  // Split messages can never be longer than a whole message.
  const splitMessageLength = Math.min(
    config.bot.splitMessageLength,
    config.bot.maxMessageLength,
  );
  return { ...config, bot: { ...config.bot, splitMessageLength } };
}
