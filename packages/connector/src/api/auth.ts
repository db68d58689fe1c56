import type { OAuthRefreshConfig } from "../types";

type FetchLike = typeof fetch;

export interface AuthProvider {
  headers: () => Promise<Record<string, string>>;
  /** Absent when the credential cannot be renewed. */
  refresh?: () => Promise<void>;
}

export function createApiKeyAuth(apiKey: string): AuthProvider {
  return {
    async headers(): Promise<Record<string, string>> {
      return { "X-API-Key": apiKey };
    }
  };
}

export async function exchangeRefreshToken(
  config: OAuthRefreshConfig,
  fetchImpl: FetchLike = fetch
): Promise<string> {
  const body = new URLSearchParams({
    client_id: config.clientId,
    client_secret: config.clientSecret,
    refresh_token: config.refreshToken,
    grant_type: "refresh_token"
  });

  const response = await fetchImpl(config.tokenUrl, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(
      `Token refresh failed with status ${response.status}${text ? `: ${text}` : ""}`
    );
  }

  const payload: unknown = await response.json();
  if (
    typeof payload !== "object" ||
    payload === null ||
    !("access_token" in payload) ||
    typeof payload.access_token !== "string"
  ) {
    throw new Error("Invalid token response: missing access_token");
  }

  return payload.access_token;
}

export function createRefreshTokenAuth(
  config: OAuthRefreshConfig,
  fetchImpl: FetchLike = fetch
): AuthProvider {
  let accessToken: string | null = null;
  let pending: Promise<string> | null = null;

  const renew = async (): Promise<string> => {
    if (!pending) {
      pending = exchangeRefreshToken(config, fetchImpl).finally(() => {
        pending = null;
      });
    }

    accessToken = await pending;
    return accessToken;
  };

  return {
    async headers(): Promise<Record<string, string>> {
      const token = accessToken ?? (await renew());
      return { Authorization: `Bearer ${token}` };
    },
    async refresh(): Promise<void> {
      accessToken = null;
      await renew();
    }
  };
}
