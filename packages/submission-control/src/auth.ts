import { timingSafeEqual } from "node:crypto";

function sameToken(presented: string, expected: string): boolean {
  const a = Buffer.from(presented, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Checks the `Authorization: Bearer <token>` header guarding document submission. */
export function assertControlAuth(headerValue: string | undefined, expectedToken: string): void {
  const [scheme, token, ...rest] = (headerValue ?? "").trim().split(/\s+/);
  if (scheme?.toLowerCase() !== "bearer" || !token || rest.length > 0 || !sameToken(token, expectedToken)) {
    throw new Error("Unauthorized");
  }
}
