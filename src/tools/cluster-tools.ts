import { z } from "zod";
import { defineTool } from "./define-tool.js";
import { clusterIdProperty } from "./properties.js";

export const listClustersTool = defineTool({
  name: "list_clusters",
  description:
    "List all assisted installer clusters for the current user. Returns the name, ID, OpenShift version and status of each cluster. Use cluster_info for full details of one cluster.",
  inputSchema: { type: "object", properties: {} },
  args: z.object({}),
  readOnly: true,
  handler: (_args, { client, session }) => client.listClusters(session),
});

export const clusterInfoTool = defineTool({
  name: "cluster_info",
  description:
    "Get comprehensive information about a cluster: configuration, status, hosts, network settings and installation progress.",
  inputSchema: {
    type: "object",
    properties: { cluster_id: clusterIdProperty },
    required: ["cluster_id"],
  },
  args: z.object({ cluster_id: z.string().min(1) }),
  readOnly: true,
  handler: ({ cluster_id }, { client, session }) =>
    client.getCluster(session, cluster_id),
});

export const createClusterTool = defineTool({
  name: "create_cluster",
  description:
    "Create a new OpenShift cluster definition and its infrastructure environment. Returns the new cluster ID and infra-env ID.",
  inputSchema: {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Name of the new cluster. Must be unique within the account.",
      },
      version: {
        type: "string",
        description:
          'OpenShift version to install, e.g. "4.18.2". Use list_versions to see available versions.',
      },
      base_domain: {
        type: "string",
        description:
          "Base DNS domain. The cluster API is reachable at api.<name>.<base_domain>.",
      },
      single_node: {
        type: "boolean",
        description:
          "true for a single-node cluster, false for a highly available cluster with three control plane nodes.",
      },
    },
    required: ["name", "version", "base_domain", "single_node"],
  },
  args: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    base_domain: z.string().min(1),
    single_node: z.boolean(),
  }),
  readOnly: false,
  handler: (args, { client, session }) =>
    client.createCluster(session, {
      name: args.name,
      version: args.version,
      baseDomain: args.base_domain,
      singleNode: args.single_node,
    }),
});

export const setClusterVipsTool = defineTool({
  name: "set_cluster_vips",
  description:
    "Set the API VIP and ingress VIP of a cluster. Both addresses must be free IPs inside the cluster machine network and are set together.",
  inputSchema: {
    type: "object",
    properties: {
      cluster_id: clusterIdProperty,
      api_vip: {
        type: "string",
        description: "IP address of the cluster API endpoint.",
      },
      ingress_vip: {
        type: "string",
        description: "IP address for ingress traffic to cluster applications.",
      },
    },
    required: ["cluster_id", "api_vip", "ingress_vip"],
  },
  args: z.object({
    cluster_id: z.string().min(1),
    api_vip: z.string().min(1),
    ingress_vip: z.string().min(1),
  }),
  readOnly: false,
  handler: (args, { client, session }) =>
    client.updateClusterVips(
      session,
      args.cluster_id,
      args.api_vip,
      args.ingress_vip,
    ),
});

export const installClusterTool = defineTool({
  name: "install_cluster",
  description:
    "Start the installation of a prepared cluster. All hosts must be discovered and ready, the network configured and cluster validations passing.",
  inputSchema: {
    type: "object",
    properties: { cluster_id: clusterIdProperty },
    required: ["cluster_id"],
  },
  args: z.object({ cluster_id: z.string().min(1) }),
  readOnly: false,
  destructive: true,
  handler: ({ cluster_id }, { client, session }) =>
    client.installCluster(session, cluster_id),
});
