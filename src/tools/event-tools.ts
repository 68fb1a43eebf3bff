import { z } from "zod";
import { defineTool } from "./define-tool.js";
import { clusterIdProperty, hostIdProperty } from "./properties.js";

export const clusterEventsTool = defineTool({
  name: "cluster_events",
  description:
    "Get the events of a cluster: installation progress, configuration changes and status updates, in chronological order.",
  inputSchema: {
    type: "object",
    properties: { cluster_id: clusterIdProperty },
    required: ["cluster_id"],
  },
  args: z.object({ cluster_id: z.string().min(1) }),
  readOnly: true,
  handler: ({ cluster_id }, { client, session }) =>
    client.getEvents(session, { clusterId: cluster_id }),
});

export const hostEventsTool = defineTool({
  name: "host_events",
  description:
    "Get the events of one host in a cluster: hardware validation, installation steps, role assignment and errors.",
  inputSchema: {
    type: "object",
    properties: {
      cluster_id: clusterIdProperty,
      host_id: hostIdProperty,
    },
    required: ["cluster_id", "host_id"],
  },
  args: z.object({
    cluster_id: z.string().min(1),
    host_id: z.string().min(1),
  }),
  readOnly: true,
  handler: (args, { client, session }) =>
    client.getEvents(session, {
      clusterId: args.cluster_id,
      hostId: args.host_id,
    }),
});
