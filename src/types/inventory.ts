import { z } from "zod";

// Backend resources are passed through as-is; only the fields the server
// reads are declared.

const backendRecordSchema = z.record(z.unknown());
export type BackendRecord = z.infer<typeof backendRecordSchema>;

export const clusterSchema = z
  .object({
    id: z.string().nullish(),
    name: z.string().nullish(),
    openshift_version: z.string().nullish(),
    status: z.string().nullish(),
  })
  .passthrough();
export type Cluster = z.infer<typeof clusterSchema>;

export const clusterListSchema = z.array(clusterSchema);

export const infraEnvSchema = z
  .object({
    id: z.string().nullish(),
    cluster_id: z.string().nullish(),
  })
  .passthrough();
export type InfraEnv = z.infer<typeof infraEnvSchema>;

export const infraEnvListSchema = z.array(infraEnvSchema);

export const hostSchema = z
  .object({
    id: z.string().nullish(),
    role: z.string().nullish(),
  })
  .passthrough();
export type Host = z.infer<typeof hostSchema>;

export const eventListSchema = z.array(backendRecordSchema);

export const openshiftVersionsSchema = backendRecordSchema;

export const operatorBundleSchema = z
  .object({
    id: z.string().nullish(),
    operators: z.array(z.string()).nullish(),
  })
  .passthrough();
export type OperatorBundle = z.infer<typeof operatorBundleSchema>;

export const operatorBundleListSchema = z.array(operatorBundleSchema);

export const presignedUrlSchema = z
  .object({
    url: z.string().nullish(),
    expires_at: z.string().nullish(),
  })
  .passthrough();
export type PresignedUrl = z.infer<typeof presignedUrlSchema>;

export interface ClusterSummary {
  name: string | null;
  id: string | null;
  openshift_version: string | null;
  status: string | null;
}

export interface CreatedCluster {
  cluster_id: string;
  infraenv_id: string;
}

export interface DownloadLink {
  url: string;
  expires_at?: string;
}

export interface InfraEnvDownloadLink extends DownloadLink {
  infraenv_id: string;
}

export const HOST_ROLES = ["auto-assign", "master", "arbiter", "worker"] as const;
export type HostRole = (typeof HOST_ROLES)[number];

export const CREDENTIAL_FILES = [
  "kubeconfig",
  "kubeconfig-noingress",
  "kubeadmin-password",
] as const;
export type CredentialFile = (typeof CREDENTIAL_FILES)[number];

export interface CreateClusterParams {
  name: string;
  version: string;
  baseDomain: string;
  singleNode: boolean;
}
