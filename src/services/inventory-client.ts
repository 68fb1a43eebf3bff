import type { AxiosInstance } from "axios";
import type { z } from "zod";
import type { SsoTokenManager } from "../auth/sso-token-manager.js";
import { describeTransportFailure } from "../auth/token-manager-base.js";
import { credentialFingerprint } from "../constants/naming.js";
import {
  AuthError,
  BackendUnavailableError,
  ServiceError,
  ServiceErrorCode,
  ValidationError,
} from "../types/errors.js";
import {
  CREDENTIAL_FILES,
  HOST_ROLES,
  clusterListSchema,
  clusterSchema,
  eventListSchema,
  hostSchema,
  infraEnvListSchema,
  infraEnvSchema,
  openshiftVersionsSchema,
  operatorBundleListSchema,
  operatorBundleSchema,
  presignedUrlSchema,
  type BackendRecord,
  type Cluster,
  type ClusterSummary,
  type CreateClusterParams,
  type CreatedCluster,
  type DownloadLink,
  type Host,
  type InfraEnv,
  type InfraEnvDownloadLink,
  type OperatorBundle,
  type PresignedUrl,
} from "../types/inventory.js";
import type { ServerConfig, SessionContext } from "../types/session.js";
import { getLogger } from "../utils/logger.js";

const logger = getLogger("inventory-client");

const CLUSTER_TAG = "chatbot";
const UNSET_EXPIRY_PREFIX = "0001-01-01";

type HttpMethod = "GET" | "POST" | "PATCH";

interface RequestSpec {
  method: HttpMethod;
  url: string;
  params?: Record<string, string | boolean>;
  data?: unknown;
  responseType?: "json" | "text";
}

interface RawResponse {
  status: number;
  data: unknown;
}

function isAuthFailure(status: number): boolean {
  return status === 401 || status === 403;
}

function backendReason(data: unknown, status: number): string {
  if (typeof data === "string" && data.trim()) {
    return data.trim();
  }
  if (typeof data === "object" && data !== null) {
    for (const field of ["reason", "message", "error"]) {
      const value: unknown = Reflect.get(data, field);
      if (typeof value === "string" && value) {
        return value;
      }
    }
  }
  return `status ${status}`;
}

function parseBody<Schema extends z.ZodTypeAny>(
  schema: Schema,
  data: unknown,
  what: string,
): z.output<Schema> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new ServiceError(
      ServiceErrorCode.UNEXPECTED_RESPONSE,
      `Malformed ${what}${where}: ${issue?.message ?? "unknown issue"}`,
    );
  }
  return result.data;
}

function toDownloadLink(presigned: PresignedUrl): DownloadLink | undefined {
  if (!presigned.url) {
    return undefined;
  }
  const link: DownloadLink = { url: presigned.url };
  if (
    presigned.expires_at &&
    !presigned.expires_at.startsWith(UNSET_EXPIRY_PREFIX)
  ) {
    link.expires_at = presigned.expires_at;
  }
  return link;
}

function segment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Client for the Assisted Installer inventory API. Every call authenticates
 * with the credential carried by the session. A rejected token is refreshed
 * and the request retried, at most once per session across all the requests
 * an operation makes.
 */
export class InventoryClient {
  private config: ServerConfig;
  private tokens: SsoTokenManager;
  private http: AxiosInstance;

  constructor(
    config: ServerConfig,
    tokens: SsoTokenManager,
    http: AxiosInstance,
  ) {
    this.config = config;
    this.tokens = tokens;
    this.http = http;
  }

  async listClusters(session: SessionContext): Promise<ClusterSummary[]> {
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("clusters"),
    });
    const clusters = parseBody(clusterListSchema, data, "cluster list");
    return clusters.map((cluster) => ({
      name: cluster.name ?? null,
      id: cluster.id ?? null,
      openshift_version: cluster.openshift_version ?? null,
      status: cluster.status ?? null,
    }));
  }

  async getCluster(session: SessionContext, clusterId: string): Promise<Cluster> {
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("clusters", clusterId),
    });
    return parseBody(clusterSchema, data, "cluster");
  }

  async createCluster(
    session: SessionContext,
    params: CreateClusterParams,
  ): Promise<CreatedCluster> {
    const pullSecret = await this.getPullSecret(session);

    const clusterParams: Record<string, unknown> = {
      name: params.name,
      openshift_version: params.version,
      base_dns_domain: params.baseDomain,
      pull_secret: pullSecret,
      tags: CLUSTER_TAG,
    };
    if (params.singleNode) {
      clusterParams.high_availability_mode = "None";
      clusterParams.control_plane_count = 1;
      clusterParams.user_managed_networking = true;
    }

    logger.info("Registering cluster", {
      name: params.name,
      version: params.version,
      baseDomain: params.baseDomain,
      singleNode: params.singleNode,
    });
    const cluster = parseBody(
      clusterSchema,
      await this.send(session, {
        method: "POST",
        url: this.endpoint("clusters"),
        data: clusterParams,
      }),
      "cluster",
    );
    if (!cluster.id) {
      throw new ServiceError(
        ServiceErrorCode.UNEXPECTED_RESPONSE,
        `Cluster ${params.name} was created without an ID`,
      );
    }

    const infraEnv = parseBody(
      infraEnvSchema,
      await this.send(session, {
        method: "POST",
        url: this.endpoint("infra-envs"),
        data: {
          name: params.name,
          pull_secret: pullSecret,
          cluster_id: cluster.id,
          openshift_version: cluster.openshift_version ?? params.version,
        },
      }),
      "infra-env",
    );
    if (!infraEnv.id) {
      throw new ServiceError(
        ServiceErrorCode.UNEXPECTED_RESPONSE,
        `InfraEnv for cluster ${cluster.id} was created without an ID`,
      );
    }

    logger.info("Cluster registered", {
      clusterId: cluster.id,
      infraEnvId: infraEnv.id,
    });
    return { cluster_id: cluster.id, infraenv_id: infraEnv.id };
  }

  async updateClusterVips(
    session: SessionContext,
    clusterId: string,
    apiVip: string,
    ingressVip: string,
  ): Promise<Cluster> {
    if (!apiVip || !ingressVip) {
      throw new ValidationError(
        "api_vip and ingress_vip must be set together",
        !apiVip ? "api_vip" : "ingress_vip",
      );
    }
    return this.patchCluster(session, clusterId, {
      api_vips: [{ ip: apiVip }],
      ingress_vips: [{ ip: ingressVip }],
    });
  }

  async installCluster(
    session: SessionContext,
    clusterId: string,
  ): Promise<Cluster> {
    logger.info("Installing cluster", { clusterId });
    const data = await this.send(session, {
      method: "POST",
      url: this.endpoint("clusters", clusterId, "actions", "install"),
    });
    return parseBody(clusterSchema, data, "cluster");
  }

  async getEvents(
    session: SessionContext,
    filter: { clusterId: string; hostId?: string },
  ): Promise<BackendRecord[]> {
    const params: Record<string, string> = {
      cluster_id: filter.clusterId,
      categories: "user",
    };
    if (filter.hostId) {
      params.host_id = filter.hostId;
    }
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("events"),
      params,
    });
    return parseBody(eventListSchema, data, "event list");
  }

  async getInfraEnv(
    session: SessionContext,
    infraEnvId: string,
  ): Promise<InfraEnv> {
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("infra-envs", infraEnvId),
    });
    return parseBody(infraEnvSchema, data, "infra-env");
  }

  async listInfraEnvs(
    session: SessionContext,
    clusterId: string,
  ): Promise<InfraEnv[]> {
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("infra-envs"),
      params: { cluster_id: clusterId },
    });
    return parseBody(infraEnvListSchema, data, "infra-env list");
  }

  async getInfraEnvDownloadUrl(
    session: SessionContext,
    infraEnvId: string,
  ): Promise<PresignedUrl> {
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("infra-envs", infraEnvId, "downloads", "image-url"),
    });
    return parseBody(presignedUrlSchema, data, "image URL");
  }

  async getClusterIsoDownloadUrls(
    session: SessionContext,
    clusterId: string,
  ): Promise<InfraEnvDownloadLink[]> {
    const infraEnvs = await this.listInfraEnvs(session, clusterId);
    const links: InfraEnvDownloadLink[] = [];

    for (const infraEnv of infraEnvs) {
      if (!infraEnv.id) {
        continue;
      }
      const link = toDownloadLink(
        await this.getInfraEnvDownloadUrl(session, infraEnv.id),
      );
      if (link) {
        links.push({ infraenv_id: infraEnv.id, ...link });
      } else {
        logger.warn("No ISO download URL for infra env", {
          infraEnvId: infraEnv.id,
        });
      }
    }

    return links;
  }

  async getCredentialsDownloadUrl(
    session: SessionContext,
    clusterId: string,
    fileName: string,
  ): Promise<DownloadLink> {
    if (!CREDENTIAL_FILES.find((candidate) => candidate === fileName)) {
      throw new ValidationError(
        `file_name must be one of ${CREDENTIAL_FILES.join(", ")}`,
        "file_name",
      );
    }
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint(
        "clusters",
        clusterId,
        "downloads",
        "credentials-presigned",
      ),
      params: { file_name: fileName },
    });
    const link = toDownloadLink(parseBody(presignedUrlSchema, data, "presigned URL"));
    if (!link) {
      throw new ServiceError(
        ServiceErrorCode.UNEXPECTED_RESPONSE,
        `No download URL returned for ${fileName}`,
      );
    }
    return link;
  }

  async updateHostRole(
    session: SessionContext,
    hostId: string,
    infraEnvId: string,
    role: string,
  ): Promise<Host> {
    const hostRole = HOST_ROLES.find((candidate) => candidate === role);
    if (!hostRole) {
      throw new ValidationError(
        `role must be one of ${HOST_ROLES.join(", ")}, got "${role}"`,
        "role",
      );
    }
    logger.info("Setting host role", { hostId, infraEnvId, role: hostRole });
    const data = await this.send(session, {
      method: "PATCH",
      url: this.endpoint("infra-envs", infraEnvId, "hosts", hostId),
      data: { host_role: hostRole },
    });
    return parseBody(hostSchema, data, "host");
  }

  async getOpenshiftVersions(
    session: SessionContext,
    onlyLatest: boolean,
  ): Promise<BackendRecord> {
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("openshift-versions"),
      params: { only_latest: onlyLatest },
    });
    return parseBody(openshiftVersionsSchema, data, "version list");
  }

  async getOperatorBundles(session: SessionContext): Promise<OperatorBundle[]> {
    const data = await this.send(session, {
      method: "GET",
      url: this.endpoint("operators", "bundles"),
    });
    return parseBody(operatorBundleListSchema, data, "operator bundle list");
  }

  async addOperatorBundleToCluster(
    session: SessionContext,
    clusterId: string,
    bundleName: string,
  ): Promise<Cluster> {
    const bundle = parseBody(
      operatorBundleSchema,
      await this.send(session, {
        method: "GET",
        url: this.endpoint("operators", "bundles", bundleName),
      }),
      "operator bundle",
    );
    const operators = bundle.operators ?? [];
    logger.info("Adding operator bundle to cluster", {
      clusterId,
      bundleName,
      operators,
    });
    return this.patchCluster(session, clusterId, {
      olm_operators: operators.map((name) => ({ name })),
    });
  }

  async getPullSecret(session: SessionContext): Promise<string> {
    const data = await this.send(session, {
      method: "POST",
      url: this.config.inventory.pullSecretUrl,
      responseType: "text",
    });
    const pullSecret = typeof data === "string" ? data : JSON.stringify(data);
    if (!pullSecret) {
      throw new ServiceError(
        ServiceErrorCode.UNEXPECTED_RESPONSE,
        "Empty pull secret returned",
      );
    }
    return pullSecret;
  }

  private async patchCluster(
    session: SessionContext,
    clusterId: string,
    updateParams: Record<string, unknown>,
  ): Promise<Cluster> {
    logger.info("Updating cluster", {
      clusterId,
      fields: Object.keys(updateParams),
    });
    const data = await this.send(session, {
      method: "PATCH",
      url: this.endpoint("clusters", clusterId),
      data: updateParams,
    });
    return parseBody(clusterSchema, data, "cluster");
  }

  private endpoint(...segments: string[]): string {
    return [this.config.inventory.url, ...segments.map(segment)].join("/");
  }

  private async send(
    session: SessionContext,
    request: RequestSpec,
  ): Promise<unknown> {
    const { credential } = session;

    let token =
      credential.kind === "offline"
        ? await this.tokens.getAccessToken(credential.token)
        : credential.token;
    let response = await this.execute(request, token);

    if (isAuthFailure(response.status) && credential.kind === "offline") {
      const rejectedToken = token;
      const refreshed = session.refreshBudget.spend(rejectedToken, () =>
        this.tokens.refreshAccessToken(credential.token, rejectedToken),
      );
      if (refreshed) {
        logger.info("Access token rejected, retrying with a refreshed token", {
          method: request.method,
          url: request.url,
          status: response.status,
          credential: credentialFingerprint(credential.token),
        });
        token = await refreshed;
        response = await this.execute(request, token);
      } else {
        logger.warn("Access token rejected after the forced refresh was spent", {
          method: request.method,
          url: request.url,
          status: response.status,
          credential: credentialFingerprint(credential.token),
        });
      }
    }

    return this.unwrap(request, response);
  }

  private async execute(request: RequestSpec, token: string): Promise<RawResponse> {
    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: request.url,
        params: request.params,
        data: request.data,
        responseType: request.responseType ?? "json",
        headers: { Authorization: `Bearer ${token}` },
        timeout: this.config.requestTimeoutMs,
        validateStatus: () => true,
      });
      return { status: response.status, data: response.data };
    } catch (error) {
      throw new BackendUnavailableError(
        `${request.method} ${request.url} failed: ${describeTransportFailure(error)}`,
        { cause: error },
      );
    }
  }

  private unwrap(request: RequestSpec, response: RawResponse): unknown {
    const { status, data } = response;
    if (status >= 200 && status < 300) {
      return data;
    }

    const reason = backendReason(data, status);
    logger.warn("Backend request failed", {
      method: request.method,
      url: request.url,
      status,
      reason,
    });

    if (isAuthFailure(status)) {
      throw new AuthError(
        `Access token rejected by the assisted installer service (${status}): ${reason}`,
      );
    }
    if (status >= 500) {
      throw new BackendUnavailableError(
        `Assisted installer service returned ${status}: ${reason}`,
      );
    }
    throw new ValidationError(`Request rejected (${status}): ${reason}`);
  }
}
