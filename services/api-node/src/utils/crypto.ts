import crypto from "node:crypto";

export function uid(prefix: string): string {
  return `${prefix}_${crypto.randomBytes(6).toString("hex")}_${Date.now().toString(36)}`;
}

export function hashValue(value: string): string {
  const hash = crypto.createHash("sha256");
  hash.update(value);
  return hash.digest("hex");
}

export function signValue(value: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(value).digest("hex");
}

export function safeEqual(left: string, right: string): boolean {
  const a = Buffer.from(left);
  const b = Buffer.from(right);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function randomIndex(upperExclusive: number): number {
  return crypto.randomInt(upperExclusive);
}
