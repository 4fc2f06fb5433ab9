import * as crypto from "crypto";

const MAX_JOB_NAME_LENGTH = 63;

/**
 * Turns arbitrary text into a platform-legal job name.
 *
 * The steps run in a fixed order; truncation is last so the 63-character
 * cut is applied to an already valid name.
 */
export function sanitizeJobName(name: string): string {
  let sanitized = name.toLowerCase();
  sanitized = sanitized.replace(/[^a-z0-9-]/g, "-");
  sanitized = sanitized.replace(/-+/g, "-");
  sanitized = sanitized.replace(/^-+|-+$/g, "");

  if (!sanitized) {
    return `job-${crypto.randomBytes(4).toString("hex")}`;
  }
  if (!/^[a-z]/.test(sanitized)) {
    sanitized = `job-${sanitized}`;
  }
  if (!/[a-z0-9]$/.test(sanitized)) {
    sanitized = sanitized.slice(0, -1);
  }
  // A cut can land right after a hyphen.
  return sanitized.slice(0, MAX_JOB_NAME_LENGTH).replace(/-+$/, "");
}
