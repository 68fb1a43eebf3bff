import { z } from "zod";
import { defineTool } from "./define-tool.js";
import { clusterIdProperty } from "./properties.js";

export const listVersionsTool = defineTool({
  name: "list_versions",
  description:
    "List the OpenShift versions available for installation, with release and support metadata.",
  inputSchema: { type: "object", properties: {} },
  args: z.object({}),
  readOnly: true,
  handler: (_args, { client, session }) =>
    client.getOpenshiftVersions(session, true),
});

export const listOperatorBundlesTool = defineTool({
  name: "list_operator_bundles",
  description:
    "List the operator bundles that can be installed together with a cluster, such as virtualization or AI bundles.",
  inputSchema: { type: "object", properties: {} },
  args: z.object({}),
  readOnly: true,
  handler: (_args, { client, session }) => client.getOperatorBundles(session),
});

export const addOperatorBundleTool = defineTool({
  name: "add_operator_bundle_to_cluster",
  description:
    "Configure an operator bundle to be installed with the cluster. Use list_operator_bundles to see bundle names.",
  inputSchema: {
    type: "object",
    properties: {
      cluster_id: clusterIdProperty,
      bundle_name: {
        type: "string",
        description: "Name of the operator bundle to add.",
      },
    },
    required: ["cluster_id", "bundle_name"],
  },
  args: z.object({
    cluster_id: z.string().min(1),
    bundle_name: z.string().min(1),
  }),
  readOnly: false,
  handler: (args, { client, session }) =>
    client.addOperatorBundleToCluster(
      session,
      args.cluster_id,
      args.bundle_name,
    ),
});
