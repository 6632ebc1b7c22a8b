import type { IncomingMessage } from "node:http";
import { timingSafeEqual } from "node:crypto";

export const API_SECRET_HEADER = "x-api-secret";

export function hasValidApiSecret(req: IncomingMessage, configuredSecret?: string): boolean {
  if (!configuredSecret) return true;
  const provided = req.headers[API_SECRET_HEADER];
  return typeof provided === "string" && safeEqual(provided, configuredSecret);
}

function safeEqual(left: string, right: string): boolean {
  const leftBuf = Buffer.from(left);
  const rightBuf = Buffer.from(right);
  if (leftBuf.length !== rightBuf.length) return false;
  return timingSafeEqual(leftBuf, rightBuf);
}
