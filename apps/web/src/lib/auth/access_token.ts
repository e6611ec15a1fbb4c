import { SignJWT, errors, jwtVerify } from "jose";

import { env } from "@/lib/env";
import { AppError } from "@/lib/errors";

const TOKEN_ALGORITHM = "HS256";
const DEFAULT_EXPIRES_MINUTES = 120;

export type AccessTokenClaims = {
  sub: string;
};

const resolveSigningKey = (): Uint8Array => {
  const secret = env.JWT_SECRET;
  if (!secret) {
    throw new AppError(
      "configuration_error",
      500,
      "Missing required environment variable JWT_SECRET."
    );
  }

  return new TextEncoder().encode(secret);
};

export const signAccessToken = async (subject: string, now: Date = new Date()): Promise<string> => {
  const issuedAt = Math.floor(now.getTime() / 1000);
  const expiresMinutes = env.JWT_ACCESS_TOKEN_EXPIRES_MINUTES ?? DEFAULT_EXPIRES_MINUTES;

  return new SignJWT({})
    .setProtectedHeader({ alg: TOKEN_ALGORITHM })
    .setSubject(subject)
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + expiresMinutes * 60)
    .sign(resolveSigningKey());
};

export const verifyAccessToken = async (token: string): Promise<AccessTokenClaims> => {
  const key = resolveSigningKey();

  let subject: string | undefined;
  try {
    const { payload } = await jwtVerify(token, key, { algorithms: [TOKEN_ALGORITHM] });
    subject = payload.sub;
  } catch (error) {
    if (error instanceof errors.JWTExpired) {
      throw new AppError("unauthorized", 401, "Token expired");
    }

    if (error instanceof errors.JOSEError) {
      throw new AppError("unauthorized", 401, "Invalid token");
    }

    throw error;
  }

  if (!subject) {
    throw new AppError("unauthorized", 401, "Invalid token subject");
  }

  return { sub: subject };
};

export const readBearerToken = (request: Request): string | null => {
  const header = request.headers.get("authorization");
  if (!header) {
    return null;
  }

  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1]?.trim() || null;
};
