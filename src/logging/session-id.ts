/**
 * Render session identifiers.
 * Every render session gets a short id so interleaved log lines can be told apart.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique session ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateSessionId(date: Date = new Date()): string {
  const datePart = date.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}
