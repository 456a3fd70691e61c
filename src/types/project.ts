/**
 * Domain model for infragen
 *
 * Plain data describing a project and its services. Nothing in here has
 * behavior; renderers read these values and never mutate them.
 */

/**
 * Kinds of project a preset can bootstrap
 */
export type ProjectType = "web-app" | "microservice" | "database" | "ml" | "infrastructure";

/**
 * Infrastructure targets artifacts can be generated for
 */
export type TargetKind = "docker" | "ansible" | "terraform";

/**
 * All targets, in the order `generate all` runs them
 */
export const TARGET_KINDS: readonly TargetKind[] = ["docker", "ansible", "terraform"] as const;

/**
 * A port mapping
 */
export interface PortConfig {
  /** Host side of the mapping; omitted means the runtime picks one */
  host?: number;
  container: number;
  protocol?: string;
}

/**
 * A mount mapping
 */
export interface VolumeConfig {
  source: string;
  target: string;
  readOnly: boolean;
  /** "volume" for a named volume, anything else (usually "bind") for a path */
  type?: string;
}

/**
 * One deployable unit
 */
export interface ServiceConfig {
  name: string;
  type: string;
  image?: string;
  ports: PortConfig[];
  volumes: VolumeConfig[];
  environment: Record<string, string>;
  dependsOn: string[];
  enabled: boolean;
}

/**
 * One deployable project
 */
export interface ProjectConfig {
  name: string;
  /** One of the ProjectType values for bootstrapped projects; free text when hand-written */
  type: string;
  description?: string;
  version?: string;
  environment?: string;
  services: ServiceConfig[];
  variables: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A service template inside a preset
 */
export interface PresetService {
  name: string;
  type: string;
  description: string;
  image?: string;
  ports: PortConfig[];
  volumes: VolumeConfig[];
  environment: Record<string, string>;
  dependsOn: string[];
  /** Optional services start out disabled */
  optional: boolean;
}

/**
 * A catalog template a project is instantiated from
 */
export interface Preset {
  id: string;
  name: string;
  description: string;
  category: string;
  services: PresetService[];
  variables: Record<string, string>;
  tags: string[];
}

/**
 * One rendered artifact, relative to the caller's output root
 */
export interface GeneratedFile {
  path: string;
  content: string;
  target: TargetKind;
  encoding: "utf-8";
}
