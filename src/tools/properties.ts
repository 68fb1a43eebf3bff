import type { JsonSchemaProperty } from "./types.js";

export const clusterIdProperty: JsonSchemaProperty = {
  type: "string",
  description: "The unique identifier (UUID) of the cluster.",
};

export const hostIdProperty: JsonSchemaProperty = {
  type: "string",
  description: "The unique identifier (UUID) of the host.",
};

export const infraEnvIdProperty: JsonSchemaProperty = {
  type: "string",
  description: "The unique identifier (UUID) of the infrastructure environment.",
};
