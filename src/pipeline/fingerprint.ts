// pattern: Functional Core
import { createHash } from "node:crypto";

const ID_LENGTH = 32;

/**
 * Stable identity for an article: the same (title, link) pair always yields
 * the same id across fetches and restarts.
 */
export function fingerprintArticle(title: string, link: string): string {
  return createHash("sha256")
    .update(`${title}_${link}`, "utf8")
    .digest("hex")
    .slice(0, ID_LENGTH);
}
