import bcrypt from "bcryptjs";
import { SignJWT, jwtVerify } from "jose";

export const SESSION_COOKIE_NAME = "session";

const issuer = "doubles-scoreboard";
const audience = "scoreboard-session";

export interface SessionClaims {
  userId: string;
  name: string;
}

export async function hashPin(pin: string, rounds = 12) {
  return bcrypt.hash(pin, rounds);
}

export async function verifyPin(pin: string, hash: string) {
  return bcrypt.compare(pin, hash);
}

export async function signSessionToken({
  secret,
  name,
  ttlSeconds = 60 * 60 * 24
}: {
  secret: string;
  name: string;
  ttlSeconds?: number;
}) {
  const exp = Math.floor(Date.now() / 1000) + ttlSeconds;
  const userId = toUserId(name);

  const token = await new SignJWT({ name, role: "recorder" })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(userId)
    .setIssuer(issuer)
    .setAudience(audience)
    .setIssuedAt()
    .setExpirationTime(exp)
    .sign(encodeSecret(secret));

  return {
    token,
    userId,
    expiresAt: new Date(exp * 1000).toISOString()
  };
}

export async function verifySessionToken(token: string, secret: string): Promise<SessionClaims> {
  const verified = await jwtVerify(token, encodeSecret(secret), { issuer, audience });
  const { sub, name, role } = verified.payload;

  if (typeof sub !== "string" || typeof name !== "string" || role !== "recorder") {
    throw new Error("Invalid token claims");
  }

  return { userId: sub, name };
}

export function getBearerToken(header: string | undefined | null) {
  if (!header) {
    return null;
  }

  const [scheme, token] = header.split(" ");
  if (scheme !== "Bearer" || !token) {
    return null;
  }

  return token;
}

/** Stable recorder id derived from a display name, e.g. "Sam Lee" -> "sam-lee". */
export function toUserId(name: string) {
  const slug = name
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug.length > 0 ? slug : "anonymous";
}

function encodeSecret(secret: string) {
  return new TextEncoder().encode(secret);
}
