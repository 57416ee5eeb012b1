/**
 * Zod schema for feature repository descriptors.
 *
 * Validates the normalized element tree and converts attribute strings
 * (start levels, flags) into their typed form.
 */

import type { FeatureContent, RepositoryEntry, RepositoryRecord } from "@provisioner/core";
import { z } from "zod";

const RequiredText = z.string().trim().min(1);

const IntegerAttribute = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, { message: "Expected an integer" })
  .transform((value) => Number.parseInt(value, 10));

const BooleanAttribute = z
  .enum(["true", "false"], { message: "Expected 'true' or 'false'" })
  .transform((value) => value === "true");

export const DependencyContentSchema = z.object({
  kind: z.literal("dependency"),
  name: RequiredText,
  version: z.string().optional(),
});

export const BundleContentSchema = z.object({
  kind: z.literal("bundle"),
  location: RequiredText,
  startLevel: IntegerAttribute.optional(),
  start: BooleanAttribute.optional(),
  dependency: BooleanAttribute.optional(),
});

export const ConfigContentSchema = z.object({
  kind: z.literal("config"),
  pid: RequiredText,
  propertiesText: z.string(),
});

export const ConfigFileContentSchema = z.object({
  kind: z.literal("configfile"),
  source: RequiredText,
  finalName: RequiredText,
});

export const DetailsContentSchema = z.object({
  kind: z.literal("details"),
  text: z.string(),
});

export const FeatureContentSchema: z.ZodType<FeatureContent, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    DependencyContentSchema,
    BundleContentSchema,
    ConfigContentSchema,
    ConfigFileContentSchema,
    DetailsContentSchema,
  ]);

export const FeatureSchema = z.object({
  name: RequiredText,
  version: z.string().min(1).default("0.0.0"),
  resolver: z.string().optional(),
  description: z.string().optional(),
  content: z.array(FeatureContentSchema),
});

export const RepositoryEntrySchema: z.ZodType<RepositoryEntry, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("repository"), location: RequiredText }),
    z.object({ kind: z.literal("feature"), feature: FeatureSchema }),
  ]);

export const RepositoryRecordSchema: z.ZodType<RepositoryRecord, z.ZodTypeDef, unknown> =
  z.object({
    name: z.string().optional(),
    entries: z.array(RepositoryEntrySchema),
  });
