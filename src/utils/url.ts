import { UsageError } from "./errors.js";

export interface ServerUrl {
  /** Origin plus any path prefix, without a trailing slash. */
  baseUrl: string;
  /** True when credentials would travel over plain http. */
  plaintext: boolean;
}

export function normalizeServerUrl(raw: string | undefined): ServerUrl {
  const trimmed = (raw ?? "").trim();
  if (!trimmed) {
    throw new UsageError("Server URL is required (--url or PBR_URL)");
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new UsageError(`Invalid server URL: ${raw}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new UsageError(`Invalid server URL: ${raw}`);
  }
  if (parsed.search || parsed.hash) {
    throw new UsageError(`Server URL must not contain a query or fragment: ${raw}`);
  }

  const path = parsed.pathname.replace(/\/+$/, "");
  return {
    baseUrl: `${parsed.origin}${path}`,
    plaintext: parsed.protocol === "http:"
  };
}
