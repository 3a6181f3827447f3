import { z } from "zod";

import { Uint8ArrayToBase64, stringToUint8Array } from "../encoding.js";
import { TransportError, UnauthorizedError } from "../errors.js";
import type { Credentials } from "./registry.js";

/** Parameters of a `WWW-Authenticate: Bearer ...` challenge. */
export interface Challenge {
  realm: string;
  service?: string;
}

export interface Authenticator {
  /**
   * Exchanges credentials for a bearer token scoped to `scope`, e.g.
   * `repository:library/app:pull,push`.
   */
  authenticate(
    credentials: Credentials,
    scope: string,
    challenge: Challenge,
  ): Promise<string>;
}

const tokenResponseSchema = z
  .object({
    token: z.string().optional(),
    access_token: z.string().optional(),
  })
  .refine((value) => value.token || value.access_token, {
    message: "Token response carries no token",
  });

export function parseChallenge(header: string | null): Challenge | undefined {
  if (!header || !/^bearer\s/i.test(header)) {
    return undefined;
  }

  const params: Record<string, string> = {};
  for (const match of header.matchAll(/(\w+)="([^"]*)"/g)) {
    params[match[1].toLowerCase()] = match[2];
  }

  if (!params.realm) {
    return undefined;
  }
  return { realm: params.realm, service: params.service };
}

export interface TokenAuthenticatorOptions {
  /** Replaces the host of the challenge realm. */
  authHost?: string;
  insecure?: boolean;
}

/**
 * Docker token authentication: basic credentials are exchanged at the realm
 * named in the registry's challenge for a bearer token.
 */
export class TokenAuthenticator implements Authenticator {
  constructor(private readonly options: TokenAuthenticatorOptions = {}) {}

  private realmUrl(challenge: Challenge): URL {
    const url = new URL(challenge.realm);
    if (this.options.authHost) {
      url.host = this.options.authHost;
      url.protocol = this.options.insecure ? "http:" : "https:";
    }
    return url;
  }

  async authenticate(
    credentials: Credentials,
    scope: string,
    challenge: Challenge,
  ): Promise<string> {
    const url = this.realmUrl(challenge);
    if (challenge.service) {
      url.searchParams.set("service", challenge.service);
    }
    url.searchParams.set("scope", scope);

    const headers: Record<string, string> = {};
    if (credentials.username !== undefined) {
      const basic = `${credentials.username}:${credentials.password ?? ""}`;
      headers.Authorization = `Basic ${Uint8ArrayToBase64(stringToUint8Array(basic))}`;
    }

    let response: Response;
    try {
      response = await fetch(url, { headers });
    } catch (error) {
      throw new TransportError(
        `Network error calling ${url.origin}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (response.status === 401 || response.status === 403) {
      throw new UnauthorizedError(
        `Authentication for ${scope} was refused`,
        response.status,
      );
    }
    if (!response.ok) {
      throw new TransportError(
        `Token request failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    const parsed = tokenResponseSchema.parse(await response.json());
    return parsed.token ?? parsed.access_token ?? "";
  }
}
