import { UsageError } from "./errors.js";

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export interface BasicCredentials {
  username: string;
  password: string;
}

/**
 * Credentials for token acquisition. OAuth client credentials are tried
 * first; basic credentials are the fallback when both are supplied.
 */
export interface ApiCredentials {
  oauth: ClientCredentials | null;
  basic: BasicCredentials | null;
}

export interface CredentialFlags {
  clientId?: string;
  clientSecret?: string;
  username?: string;
  password?: string;
}

function pick(cli: string | undefined, env: string | undefined): string {
  return (cli ?? env ?? "").trim();
}

function pair<T>(
  first: string,
  second: string,
  names: [string, string],
  build: (a: string, b: string) => T
): T | null {
  if (!first && !second) {
    return null;
  }
  if (!first || !second) {
    throw new UsageError(`Both ${names[0]} and ${names[1]} must be provided together`);
  }
  return build(first, second);
}

/** Merges CLI flags over `PBR_*` environment variables. */
export function parseCredentials(
  flags: CredentialFlags,
  env: NodeJS.ProcessEnv = process.env
): ApiCredentials {
  const oauth = pair(
    pick(flags.clientId, env.PBR_CLIENT_ID),
    pick(flags.clientSecret, env.PBR_CLIENT_SECRET),
    ["--client-id", "--client-secret"],
    (clientId, clientSecret) => ({ clientId, clientSecret })
  );
  const basic = pair(
    pick(flags.username, env.PBR_USERNAME),
    pick(flags.password, env.PBR_PASSWORD),
    ["--username", "--password"],
    (username, password) => ({ username, password })
  );

  if (!oauth && !basic) {
    throw new UsageError(
      "No API credentials: pass --client-id/--client-secret or --username/--password"
    );
  }

  return { oauth, basic };
}

export function toBasicAuthHeader(credentials: BasicCredentials): string {
  const encoded = Buffer.from(`${credentials.username}:${credentials.password}`, "utf8").toString(
    "base64"
  );
  return `Basic ${encoded}`;
}
