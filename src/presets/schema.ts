/**
 * Schemas for preset catalog files
 */

import { z } from "zod";
import type { Preset, PresetService } from "../types/project.js";
import { PortSchema, StringMapSchema, VolumeSchema } from "../project/schema.js";

export const PresetServiceSchema = z
  .object({
    name: z.string().min(1),
    type: z.string().min(1),
    description: z.string().default(""),
    image: z.string().optional(),
    ports: z.array(PortSchema).default([]),
    volumes: z.array(VolumeSchema).default([]),
    environment: StringMapSchema.default({}),
    depends_on: z.array(z.string()).default([]),
    optional: z.boolean().default(false),
  })
  .transform(
    (service): PresetService => ({
      name: service.name,
      type: service.type,
      description: service.description,
      image: service.image,
      ports: service.ports,
      volumes: service.volumes,
      environment: service.environment,
      dependsOn: service.depends_on,
      optional: service.optional,
    }),
  );

export const PresetSchema: z.ZodType<Preset, z.ZodTypeDef, unknown> = z.object({
  id: z
    .string()
    .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "Must be lowercase letters, numbers, and hyphens"),
  name: z.string().min(1),
  description: z.string().default(""),
  category: z.string().default("General"),
  services: z.array(PresetServiceSchema).default([]),
  variables: StringMapSchema.default({}),
  tags: z.array(z.string()).default([]),
});

export const PresetCatalogFileSchema = z.object({
  presets: z.array(PresetSchema),
});
