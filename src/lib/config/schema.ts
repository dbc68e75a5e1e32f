import { z } from "zod";

// ─────────────────────────────────────────────────────────────────────────────
// Unit definitions
// ─────────────────────────────────────────────────────────────────────────────

const DependsOn = z.array(z.string().min(1)).default([]);

export const PackageUnitSchema = z.object({
  kind: z.literal("package"),
  description: z.string().optional(),
  depends_on: DependsOn,
  package: z.string().min(1).optional(),
  state: z.enum(["present", "absent"]).default("present"),
  version: z.string().min(1).optional(),
});

export const ServiceUnitSchema = z.object({
  kind: z.literal("service"),
  description: z.string().optional(),
  depends_on: DependsOn,
  unit: z.string().min(1).optional(),
  state: z.enum(["running", "stopped"]).default("running"),
  enabled: z.boolean().default(true),
  restart_on: z.array(z.string().min(1)).default([]),
});

export const FileUnitSchema = z.object({
  kind: z.literal("file"),
  description: z.string().optional(),
  depends_on: DependsOn,
  path: z.string().min(1),
  state: z.enum(["present", "absent"]).default("present"),
  content: z.string().optional(),
  source: z.string().min(1).optional(),
  mode: z.string().regex(/^0?[0-7]{3}$/, "mode must be an octal permission such as 0644").optional(),
  pause: z.array(z.string().min(1)).default([]),
});

export const UnitSchema = z.discriminatedUnion("kind", [
  PackageUnitSchema,
  ServiceUnitSchema,
  FileUnitSchema,
]);

export type UnitDefinition = z.infer<typeof UnitSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
  package_manager: z.enum(["dnf", "yum", "apt"]).default("dnf"),
  command_timeout_ms: z.number().int().min(100).max(3_600_000).default(10_000),
  concurrency: z.number().int().min(1).max(32).default(1),
  rollback: z.boolean().default(true),
  backup_retention: z.number().int().min(1).max(100).default(3),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Top-level document
// ─────────────────────────────────────────────────────────────────────────────

// Parsed so inner .default() values are applied
const SETTINGS_DEFAULT = SettingsSchema.parse({});

export const DocumentSchema = z.object({
  settings: SettingsSchema.default(SETTINGS_DEFAULT),
  units: z.record(z.string(), UnitSchema).default({}),
});

export type DesiredDocument = z.infer<typeof DocumentSchema>;
