import jwt from "jsonwebtoken";

import { err, ok, type Result } from "./result";

export type HandshakeRequest = Readonly<{
  url?: string;
  headers: Readonly<Record<string, string | ReadonlyArray<string> | undefined>>;
}>;

export type IdentitySource = "query_user_id" | "query_token" | "gateway_header" | "bearer_token" | "auth_frame";

export type ResolvedIdentity = Readonly<{
  userId: number;
  source: IdentitySource;
}>;

export type IdentityResolverDeps = Readonly<{
  /**
   * When set, tokens must carry a valid HS256 signature. When absent, tokens are only decoded:
   * the upstream gateway has already verified them.
   */
  jwtSecret?: string;
  userIdHeader?: string;
}>;

export type IdentityResolver = Readonly<{
  resolveHandshake(request: HandshakeRequest): Result<ResolvedIdentity>;
  resolveAuthFrame(userId: unknown): Result<ResolvedIdentity>;
  resolveToken(token: string): Result<number>;
}>;

const DEFAULT_USER_ID_HEADER = "x-user-id";

export function parseUserId(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value === "string" && /^[0-9]{1,16}$/.test(value.trim())) {
    return parseUserId(Number(value.trim()));
  }
  return undefined;
}

function firstHeader(value: string | ReadonlyArray<string> | undefined): string | undefined {
  if (typeof value === "string") return value;
  return value?.[0];
}

function readQuery(url: string | undefined): URLSearchParams {
  if (!url) return new URLSearchParams();
  const queryStart = url.indexOf("?");
  return new URLSearchParams(queryStart === -1 ? "" : url.slice(queryStart + 1));
}

export function createIdentityResolver(deps: IdentityResolverDeps = {}): IdentityResolver {
  const jwtSecret = deps.jwtSecret;
  const userIdHeader = (deps.userIdHeader ?? DEFAULT_USER_ID_HEADER).toLowerCase();

  if (jwtSecret !== undefined && jwtSecret.trim() === "") {
    throw new Error("identityResolver requires a non-empty jwtSecret when one is provided.");
  }

  function resolveToken(token: string): Result<number> {
    const trimmed = token.trim();
    if (trimmed === "") return err("UNAUTHENTICATED", "Missing token.");

    let claims: unknown;
    try {
      claims = jwtSecret ? jwt.verify(trimmed, jwtSecret, { algorithms: ["HS256"] }) : jwt.decode(trimmed);
    } catch {
      return err("UNAUTHENTICATED", "Invalid token.");
    }
    if (typeof claims !== "object" || claims === null) {
      return err("UNAUTHENTICATED", "Invalid token.");
    }

    const userId = parseUserId((claims as Record<string, unknown>).userId);
    if (userId === undefined) {
      return err("UNAUTHENTICATED", "Token does not carry a userId claim.");
    }
    return ok(userId);
  }

  return {
    resolveHandshake(request: HandshakeRequest): Result<ResolvedIdentity> {
      const query = readQuery(request.url);

      const queryUserId = query.get("userId");
      if (queryUserId !== null) {
        const userId = parseUserId(queryUserId);
        if (userId !== undefined) return ok({ userId, source: "query_user_id" });
      }

      const queryToken = query.get("token");
      if (queryToken !== null) {
        const resolved = resolveToken(queryToken);
        if (resolved.ok) return ok({ userId: resolved.value, source: "query_token" });
      }

      const headerUserId = parseUserId(firstHeader(request.headers[userIdHeader]));
      if (headerUserId !== undefined) return ok({ userId: headerUserId, source: "gateway_header" });

      const authorization = firstHeader(request.headers.authorization);
      if (authorization && authorization.startsWith("Bearer ")) {
        const resolved = resolveToken(authorization.slice("Bearer ".length));
        if (resolved.ok) return ok({ userId: resolved.value, source: "bearer_token" });
      }

      return err("UNAUTHENTICATED", "No resolvable identity on connection.");
    },

    resolveAuthFrame(userId: unknown): Result<ResolvedIdentity> {
      const parsed = parseUserId(userId);
      if (parsed === undefined) return err("UNAUTHENTICATED", "Invalid userId format");
      return ok({ userId: parsed, source: "auth_frame" });
    },

    resolveToken
  };
}
