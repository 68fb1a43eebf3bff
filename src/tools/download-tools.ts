import { z } from "zod";
import { CREDENTIAL_FILES } from "../types/inventory.js";
import { defineTool } from "./define-tool.js";
import { clusterIdProperty } from "./properties.js";

export const clusterIsoDownloadUrlTool = defineTool({
  name: "cluster_iso_download_url",
  description:
    "Get the discovery ISO download URLs for every infrastructure environment of a cluster, with expiration times when known.",
  inputSchema: {
    type: "object",
    properties: { cluster_id: clusterIdProperty },
    required: ["cluster_id"],
  },
  args: z.object({ cluster_id: z.string().min(1) }),
  readOnly: true,
  handler: ({ cluster_id }, { client, session }) =>
    client.getClusterIsoDownloadUrls(session, cluster_id),
});

export const clusterCredentialsDownloadUrlTool = defineTool({
  name: "cluster_credentials_download_url",
  description:
    "Get a time-limited download URL for a cluster credentials file. Prefer kubeconfig over kubeconfig-noingress for an installed cluster, and tell the user when the URL expires.",
  inputSchema: {
    type: "object",
    properties: {
      cluster_id: clusterIdProperty,
      file_name: {
        type: "string",
        description: "Credentials file to download.",
        enum: [...CREDENTIAL_FILES],
      },
    },
    required: ["cluster_id", "file_name"],
  },
  args: z.object({
    cluster_id: z.string().min(1),
    file_name: z.enum(CREDENTIAL_FILES),
  }),
  readOnly: true,
  handler: (args, { client, session }) =>
    client.getCredentialsDownloadUrl(session, args.cluster_id, args.file_name),
});
