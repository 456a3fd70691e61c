/**
 * Schemas for the persisted project file
 *
 * The file uses snake_case field names; parsing maps them onto the
 * camelCase domain model.
 */

import { z } from "zod";
import { sortedEntries } from "../utils/strings.js";
import type { PortConfig, ProjectConfig, ServiceConfig, VolumeConfig } from "../types/project.js";

/**
 * Scalar that hand-edited YAML may have typed as a number or boolean
 */
const ScalarStringSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const StringMapSchema = z.record(z.string(), ScalarStringSchema);

export const PortSchema = z
  .object({
    host: z.number().int().positive().optional(),
    container: z.number().int(),
    protocol: z.string().optional(),
  })
  .transform((port): PortConfig => ({ ...port }));

export const VolumeSchema = z
  .object({
    source: z.string(),
    target: z.string(),
    read_only: z.boolean().default(false),
    type: z.string().optional(),
  })
  .transform(
    (volume): VolumeConfig => ({
      source: volume.source,
      target: volume.target,
      readOnly: volume.read_only,
      type: volume.type,
    }),
  );

export const ServiceSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    image: z.string().optional(),
    ports: z.array(PortSchema).default([]),
    volumes: z.array(VolumeSchema).default([]),
    environment: StringMapSchema.default({}),
    depends_on: z.array(z.string()).default([]),
    enabled: z.boolean().default(true),
  })
  .transform(
    (service): ServiceConfig => ({
      name: service.name,
      type: service.type,
      image: service.image,
      ports: service.ports,
      volumes: service.volumes,
      environment: service.environment,
      dependsOn: service.depends_on,
      enabled: service.enabled,
    }),
  );

const TimestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export const ProjectFileSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    description: z.string().optional(),
    version: ScalarStringSchema.optional(),
    environment: z.string().optional(),
    services: z.array(ServiceSchema).default([]),
    variables: StringMapSchema.default({}),
    created_at: TimestampSchema,
    updated_at: TimestampSchema,
  })
  .transform(
    (file): ProjectConfig => ({
      name: file.name,
      type: file.type,
      description: file.description,
      version: file.version,
      environment: file.environment,
      services: file.services,
      variables: file.variables,
      createdAt: file.created_at,
      updatedAt: file.updated_at,
    }),
  );

/**
 * Map the domain model onto the persisted document shape
 */
export function toProjectDocument(config: ProjectConfig): Record<string, unknown> {
  return {
    name: config.name,
    type: config.type,
    description: config.description,
    version: config.version,
    environment: config.environment,
    services: config.services.map((service) => ({
      name: service.name,
      type: service.type,
      image: service.image,
      ports: service.ports.map((port) => ({
        host: port.host,
        container: port.container,
        protocol: port.protocol,
      })),
      volumes: service.volumes.map((volume) => ({
        source: volume.source,
        target: volume.target,
        read_only: volume.readOnly,
        type: volume.type,
      })),
      environment: Object.fromEntries(sortedEntries(service.environment)),
      depends_on: [...service.dependsOn],
      enabled: service.enabled,
    })),
    variables: Object.fromEntries(sortedEntries(config.variables)),
    created_at: config.createdAt.toISOString(),
    updated_at: config.updatedAt.toISOString(),
  };
}
