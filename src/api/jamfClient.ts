import https from "node:https";
import axios from "axios";
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { collectPages, isRecord } from "../core/pagination.js";
import { toPatchSummary } from "../core/compliance.js";
import type { PatchSummary } from "../core/compliance.js";
import type { TrackedItem } from "../core/baselines.js";
import { toBasicAuthHeader } from "../utils/auth.js";
import type { ApiCredentials } from "../utils/auth.js";
import { ApiRequestError, AuthenticationError } from "../utils/errors.js";
import { silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export const TITLES_PATH = "/api/v2/patch-software-title-configurations";
export const INVENTORY_PATH = "/api/v1/computers-inventory";
export const OAUTH_TOKEN_PATH = "/api/oauth/token";
export const BASIC_TOKEN_PATHS = ["/api/v1/auth/token", "/uapi/auth/tokens"] as const;

const MAX_ERROR_BODY = 500;

export interface JamfClientOptions {
  baseUrl: string;
  credentials: ApiCredentials;
  timeoutMs: number;
  pageSize: number;
  inventoryPageSize: number;
  /** Skip TLS certificate verification (self-signed on-prem servers). */
  insecure?: boolean;
  logger?: Logger;
  /** Replaces the HTTP transport; used by tests. */
  adapter?: AxiosAdapter;
}

/** The server operations a report run needs; tests substitute a fake. */
export interface PatchApi {
  listPatchTitles(): Promise<TrackedItem[]>;
  patchSummary(titleId: string): Promise<PatchSummary>;
  patchReport(titleId: string): Promise<unknown[]>;
  listInventory(sections?: string[]): Promise<unknown[]>;
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) {
    return "";
  }
  const text = typeof data === "string" ? data : JSON.stringify(data);
  return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...` : text;
}

function isSuccess(response: AxiosResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

function readTokenField(data: unknown, keys: readonly string[]): string | null {
  if (!isRecord(data)) {
    return null;
  }
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }
  return null;
}

/** Display name fallbacks for a catalog entry. */
export function toTrackedItem(raw: unknown): TrackedItem | null {
  if (!isRecord(raw)) {
    return null;
  }
  const id = raw.id;
  const identifier = typeof id === "string" || typeof id === "number" ? String(id) : "";
  if (!identifier) {
    return null;
  }
  const name = [raw.displayName, raw.softwareTitleName, raw.name].find(
    (value): value is string => typeof value === "string" && value.length > 0
  );
  return { identifier, displayName: name ?? `Title ${identifier}` };
}

/**
 * Jamf Pro API client. Requests are issued one at a time; any non-2xx
 * response raises {@link ApiRequestError}. The bearer token is acquired on
 * first use and reused for the rest of the run.
 */
export class JamfProClient implements PatchApi {
  private readonly http: AxiosInstance;
  private readonly options: JamfClientOptions;
  private readonly logger: Logger;
  private token: string | null = null;

  constructor(options: JamfClientOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { accept: "application/json" },
      validateStatus: () => true,
      paramsSerializer: { indexes: null },
      ...(options.insecure ? { httpsAgent: new https.Agent({ rejectUnauthorized: false }) } : {}),
      ...(options.adapter ? { adapter: options.adapter } : {})
    });
  }

  private async fetchOAuthToken(): Promise<string | null> {
    const oauth = this.options.credentials.oauth;
    if (!oauth) {
      return null;
    }
    const form = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: oauth.clientId,
      client_secret: oauth.clientSecret
    });
    const response = await this.http.post(OAUTH_TOKEN_PATH, form.toString(), {
      headers: { "Content-Type": "application/x-www-form-urlencoded" }
    });
    if (response.status !== 200) {
      this.logger.debug("OAuth token request rejected", { status: response.status });
      return null;
    }
    return readTokenField(response.data, ["access_token"]);
  }

  private async fetchBasicToken(): Promise<string | null> {
    const basic = this.options.credentials.basic;
    if (!basic) {
      return null;
    }
    for (const path of BASIC_TOKEN_PATHS) {
      const response = await this.http.post(path, undefined, {
        headers: { Authorization: toBasicAuthHeader(basic) }
      });
      if (response.status === 200) {
        return readTokenField(response.data, ["token", "bearerToken"]);
      }
      this.logger.debug("Basic token request rejected", { path, status: response.status });
    }
    return null;
  }

  private async bearerToken(): Promise<string> {
    if (this.token) {
      return this.token;
    }
    const token = (await this.fetchOAuthToken()) ?? (await this.fetchBasicToken());
    if (!token) {
      throw new AuthenticationError(
        "Failed to obtain a bearer token (check credentials and API permissions)"
      );
    }
    this.token = token;
    return token;
  }

  private async getJson(
    path: string,
    params: Record<string, unknown>,
    failure: string
  ): Promise<unknown> {
    const token = await this.bearerToken();
    const response = await this.http.get(path, {
      params,
      headers: { Authorization: `Bearer ${token}` }
    });
    if (!isSuccess(response)) {
      throw new ApiRequestError(failure, response.status, bodyText(response.data), path);
    }
    return response.data;
  }

  /** Catalog of patch titles with an ID, sorted by display name (case-insensitive). */
  async listPatchTitles(): Promise<TrackedItem[]> {
    const raw = await collectPages(
      (page, pageSize) =>
        this.getJson(TITLES_PATH, { page, "page-size": pageSize }, "Failed to list patch titles"),
      { pageSize: this.options.pageSize }
    );
    return raw
      .map(toTrackedItem)
      .filter((item): item is TrackedItem => item !== null)
      .sort((left, right) =>
        left.displayName.toLowerCase().localeCompare(right.displayName.toLowerCase())
      );
  }

  async patchSummary(titleId: string): Promise<PatchSummary> {
    const path = `${TITLES_PATH}/${encodeURIComponent(titleId)}/patch-summary`;
    const data = await this.getJson(path, {}, `Failed to get patch summary for ${titleId}`);
    return toPatchSummary(data);
  }

  /** Every device row of one title's patch report. */
  async patchReport(titleId: string): Promise<unknown[]> {
    const path = `${TITLES_PATH}/${encodeURIComponent(titleId)}/patch-report`;
    return collectPages(
      (page, pageSize) =>
        this.getJson(
          path,
          { page, "page-size": pageSize },
          `Failed to get patch report for ${titleId}`
        ),
      {
        pageSize: this.options.pageSize,
        onPage: (pageIndex, collected, total) =>
          this.logger.debug("Patch report page", { titleId, page: pageIndex, collected, total })
      }
    );
  }

  async listInventory(sections: string[] = ["GENERAL"]): Promise<unknown[]> {
    return collectPages(
      (page, pageSize) =>
        this.getJson(
          INVENTORY_PATH,
          { page, "page-size": pageSize, section: sections },
          "Failed inventory fetch"
        ),
      { pageSize: this.options.inventoryPageSize }
    );
  }
}
