import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const ListingSchema = z.object({
  api_url: z.string().url().default("https://www.kaggle.com/api/v1"),
  language: z.string().min(1).default("python"),
  kernel_type: z.enum(["all", "script", "notebook"]).default("all"),
  output_type: z.enum(["all", "visualization", "data"]).default("all"),
  sort_by: z.string().min(1).default("scoreDescending"),
  page_size: z.number().int().min(1).max(100).default(20),
});

export const WatchConfigSchema = z.object({
  competition: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, "Must be a competition slug (e.g. \"titanic\")"),
  sort_direction: z.enum(["maximize", "minimize"]).default("maximize"),
  poll_interval_seconds: z.number().int().positive().default(3600),
  request_timeout_seconds: z.number().int().positive().default(30),
  state_file: z.string().min(1).optional(),
  listing: ListingSchema.default({}),
});

export type WatchConfig = z.infer<typeof WatchConfigSchema>;

export function parseConfig(yamlContent: string): WatchConfig {
  const raw: unknown = parseYaml(yamlContent);
  return WatchConfigSchema.parse(raw);
}

export function loadConfig(filePath: string): WatchConfig {
  const content = readFileSync(filePath, "utf-8");
  return parseConfig(content);
}
