/**
 * Formatting shared by the renderers
 */

import type { PortConfig, VolumeConfig } from "../types/project.js";

/**
 * `host:container` when a host port is given, else `container`
 */
export function formatPortMapping(port: PortConfig): string {
  return port.host !== undefined && port.host > 0
    ? `${port.host}:${port.container}`
    : `${port.container}`;
}

/**
 * `source:target`, with `:ro` appended for read-only mounts when requested
 */
export function formatVolumeMapping(
  volume: VolumeConfig,
  options: { withMode?: boolean } = {},
): string {
  const mapping = `${volume.source}:${volume.target}`;
  return options.withMode && volume.readOnly ? `${mapping}:ro` : mapping;
}
