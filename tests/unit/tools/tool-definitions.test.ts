import { describe, expect, it } from "vitest";
import { allTools, type ToolDescriptor } from "../../../src/tools/index.js";

const toolCases = allTools.map(
  (tool): [string, ToolDescriptor] => [tool.name, tool],
);

describe("tool definitions", () => {
  it("exposes every installer capability once", () => {
    const names = allTools.map((tool) => tool.name);

    expect(new Set(names).size).toBe(names.length);
    expect([...names].sort()).toEqual([
      "add_operator_bundle_to_cluster",
      "cluster_credentials_download_url",
      "cluster_events",
      "cluster_info",
      "cluster_iso_download_url",
      "create_cluster",
      "host_events",
      "infraenv_info",
      "install_cluster",
      "list_clusters",
      "list_operator_bundles",
      "list_versions",
      "set_cluster_vips",
      "set_host_role",
    ]);
  });

  it.each(toolCases)(
    "%s declares every required property",
    (_name, tool) => {
      for (const field of tool.inputSchema.required ?? []) {
        expect(tool.inputSchema.properties).toHaveProperty(field);
      }
    },
  );

  it.each(toolCases)(
    "%s accepts the arguments its schema requires",
    (_name, tool) => {
      const sample: Record<string, unknown> = {};
      for (const field of tool.inputSchema.required ?? []) {
        const property = tool.inputSchema.properties[field];
        sample[field] =
          property.type === "boolean" ? true : (property.enum?.[0] ?? "value");
      }

      expect(() => tool.prepare(sample)).not.toThrow();
    },
  );

  it("offers the enumerated host roles", () => {
    const setHostRole = allTools.find((tool) => tool.name === "set_host_role");

    expect(setHostRole?.inputSchema.properties.role.enum).toEqual([
      "auto-assign",
      "master",
      "arbiter",
      "worker",
    ]);
  });

  it("marks only installation as destructive", () => {
    expect(
      allTools.filter((tool) => tool.destructive).map((tool) => tool.name),
    ).toEqual(["install_cluster"]);
  });
});
