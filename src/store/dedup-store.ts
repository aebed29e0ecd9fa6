// pattern: Imperative Shell
import { copyFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import pLimit from "p-limit";
import { z } from "zod/v3";
import type { Logger } from "pino";
import type { Article } from "../pipeline/types";

export type DedupRecord = {
  readonly id: string;
  readonly title: string;
  readonly link: string;
  readonly firstSeenAt: string;
  readonly lastSourceTimestamp: string | null;
};

const dedupRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  link: z.string(),
  firstSeenAt: z.string().datetime({ offset: true }),
  lastSourceTimestamp: z.string().nullable(),
});

const snapshotSchema = z.object({
  version: z.literal(1),
  lastUpdated: z.string(),
  records: z.array(dedupRecordSchema),
});

export type DedupSnapshot = z.infer<typeof snapshotSchema>;

export type LoadOutcome = {
  readonly source: "primary" | "backup" | "empty";
  readonly count: number;
};

export type DedupStore = {
  readonly load: () => Promise<LoadOutcome>;
  readonly has: (id: string) => boolean;
  /**
   * Records a delivered article. Returns null when the id is already known.
   * Resolves once the snapshot write has been attempted; a failed write is
   * logged and does not reject.
   */
  readonly commit: (article: Article) => Promise<DedupRecord | null>;
  readonly size: () => number;
  readonly recent: (limit: number) => ReadonlyArray<DedupRecord>;
  readonly flush: () => Promise<boolean>;
  readonly lastWriteError: () => string | null;
};

export type DedupStoreOptions = {
  readonly path: string;
  readonly maxRecords: number;
  readonly logger: Logger;
  readonly now?: () => Date;
};

type ReadOutcome =
  | { readonly success: true; readonly snapshot: DedupSnapshot }
  | { readonly success: false; readonly missing: boolean; readonly error: string };

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
  );
}

async function readSnapshot(path: string): Promise<ReadOutcome> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, missing: isMissingFile(err), error: message };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, missing: false, error: `invalid JSON: ${message}` };
  }

  const result = snapshotSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return { success: false, missing: false, error: `invalid snapshot: ${issues}` };
  }

  return { success: true, snapshot: result.data };
}

function sourceTimestamp(article: Article): string | null {
  const time = article.publishedAt?.getTime();
  if (time === undefined || isNaN(time)) return null;
  return new Date(time).toISOString();
}

/**
 * Oldest first by `firstSeenAt`; records seen at the same instant keep their
 * insertion order.
 */
function byFirstSeen(records: Iterable<DedupRecord>): Array<DedupRecord> {
  return [...records].sort(
    (a, b) => Date.parse(a.firstSeenAt) - Date.parse(b.firstSeenAt),
  );
}

/**
 * Persisted set of delivered article ids. Memory is authoritative; every
 * change is written as a whole JSON snapshot, with the previous file kept as
 * `<path>.backup` and the new one moved into place from `<path>.tmp`.
 * Writes run one at a time.
 */
export function createDedupStore(options: DedupStoreOptions): DedupStore {
  const { path, maxRecords, logger } = options;
  const now = options.now ?? (() => new Date());
  const writeQueue = pLimit(1);

  let records = new Map<string, DedupRecord>();
  let writeError: string | null = null;

  const evictOverflow = (): number => {
    const excess = records.size - maxRecords;
    if (excess <= 0) return 0;
    for (const record of byFirstSeen(records.values()).slice(0, excess)) {
      records.delete(record.id);
    }
    return excess;
  };

  const writeSnapshot = async (): Promise<void> => {
    const snapshot: DedupSnapshot = {
      version: 1,
      lastUpdated: now().toISOString(),
      records: [...records.values()],
    };

    await mkdir(dirname(path), { recursive: true });
    try {
      await copyFile(path, `${path}.backup`);
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
    await writeFile(`${path}.tmp`, JSON.stringify(snapshot, null, 2), "utf-8");
    await rename(`${path}.tmp`, path);
  };

  const persist = (): Promise<boolean> =>
    writeQueue(async () => {
      try {
        await writeSnapshot();
        writeError = null;
        return true;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        writeError = message;
        logger.error(
          { path, error: message, records: records.size },
          "dedup snapshot write failed, keeping in-memory state",
        );
        return false;
      }
    });

  return {
    load: async () => {
      const candidates = [
        { file: path, source: "primary" as const },
        { file: `${path}.backup`, source: "backup" as const },
      ];

      for (const candidate of candidates) {
        const result = await readSnapshot(candidate.file);
        if (result.success) {
          records = new Map(
            result.snapshot.records.map((record) => [record.id, record]),
          );
          const evicted = evictOverflow();
          logger.info(
            { path: candidate.file, count: records.size, evicted },
            "dedup snapshot loaded",
          );
          return { source: candidate.source, count: records.size };
        }

        if (!result.missing) {
          logger.warn(
            { path: candidate.file, error: result.error },
            "dedup snapshot unreadable",
          );
        }
      }

      records = new Map();
      logger.info({ path }, "no usable dedup snapshot, starting empty");
      return { source: "empty", count: 0 };
    },

    has: (id) => records.has(id),

    commit: async (article) => {
      if (records.has(article.id)) return null;

      const record: DedupRecord = {
        id: article.id,
        title: article.title,
        link: article.link,
        firstSeenAt: now().toISOString(),
        lastSourceTimestamp: sourceTimestamp(article),
      };
      records.set(record.id, record);

      const evicted = evictOverflow();
      if (evicted > 0) {
        logger.debug({ evicted, size: records.size }, "dedup store trimmed");
      }

      await persist();
      return record;
    },

    size: () => records.size,

    recent: (limit) => byFirstSeen(records.values()).reverse().slice(0, limit),

    flush: () => persist(),

    lastWriteError: () => writeError,
  };
}
