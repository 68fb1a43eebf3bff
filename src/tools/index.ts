import {
  addOperatorBundleTool,
  listOperatorBundlesTool,
  listVersionsTool,
} from "./catalog-tools.js";
import {
  clusterInfoTool,
  createClusterTool,
  installClusterTool,
  listClustersTool,
  setClusterVipsTool,
} from "./cluster-tools.js";
import {
  clusterCredentialsDownloadUrlTool,
  clusterIsoDownloadUrlTool,
} from "./download-tools.js";
import { clusterEventsTool, hostEventsTool } from "./event-tools.js";
import { infraEnvInfoTool, setHostRoleTool } from "./host-tools.js";
import { ToolRegistry, type ToolRegistryOptions } from "./registry.js";
import type { ToolDescriptor } from "./types.js";

export const allTools: readonly ToolDescriptor[] = [
  // Clusters
  listClustersTool,
  clusterInfoTool,
  createClusterTool,
  setClusterVipsTool,
  installClusterTool,

  // Events
  clusterEventsTool,
  hostEventsTool,

  // Infra-envs and hosts
  infraEnvInfoTool,
  setHostRoleTool,

  // Versions and operators
  listVersionsTool,
  listOperatorBundlesTool,
  addOperatorBundleTool,

  // Downloads
  clusterIsoDownloadUrlTool,
  clusterCredentialsDownloadUrlTool,
];

export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const registry = new ToolRegistry(options);
  for (const tool of allTools) {
    registry.register(tool);
  }
  return registry.seal();
}

export { ToolRegistry } from "./registry.js";
export type { ToolDescriptor } from "./types.js";
