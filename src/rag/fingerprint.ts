import { createHash } from "crypto";

/**
 * Content fingerprint: lowercase hex SHA-256 of the UTF-8 bytes
 */
export function fingerprint(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}
