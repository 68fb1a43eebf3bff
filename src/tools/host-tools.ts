import { z } from "zod";
import { HOST_ROLES } from "../types/inventory.js";
import { defineTool } from "./define-tool.js";
import { hostIdProperty, infraEnvIdProperty } from "./properties.js";

export const infraEnvInfoTool = defineTool({
  name: "infraenv_info",
  description:
    "Get information about an infrastructure environment, including its discovery ISO settings and the cluster it belongs to.",
  inputSchema: {
    type: "object",
    properties: { infraenv_id: infraEnvIdProperty },
    required: ["infraenv_id"],
  },
  args: z.object({ infraenv_id: z.string().min(1) }),
  readOnly: true,
  handler: ({ infraenv_id }, { client, session }) =>
    client.getInfraEnv(session, infraenv_id),
});

export const setHostRoleTool = defineTool({
  name: "set_host_role",
  description:
    "Assign a role to a host discovered through an infrastructure environment: auto-assign, master (control plane), arbiter or worker.",
  inputSchema: {
    type: "object",
    properties: {
      host_id: hostIdProperty,
      infraenv_id: infraEnvIdProperty,
      role: {
        type: "string",
        description: "Role to assign to the host.",
        enum: [...HOST_ROLES],
      },
    },
    required: ["host_id", "infraenv_id", "role"],
  },
  args: z.object({
    host_id: z.string().min(1),
    infraenv_id: z.string().min(1),
    role: z.enum(HOST_ROLES),
  }),
  readOnly: false,
  handler: (args, { client, session }) =>
    client.updateHostRole(session, args.host_id, args.infraenv_id, args.role),
});
