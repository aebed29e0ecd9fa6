import { z } from "zod/v3";

const isValidPattern = (pattern: string): boolean => {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
};

const fetchStrategySchema = z.object({
  timeoutMs: z.number().int().positive().default(15000),
  headers: z.record(z.string(), z.string()).default({}),
  userAgent: z.enum(["desktop", "mobile", "bot"]).default("desktop"),
  rewrite: z
    .object({
      pattern: z.string().min(1).refine(isValidPattern, {
        message: "must be a valid regular expression",
      }),
      replacement: z.string(),
    })
    .optional(),
});

const htmlSelectorsSchema = z.object({
  blocks: z.array(z.string().min(1)).min(1),
  title: z.array(z.string().min(1)).min(1).optional(),
  summary: z.string().min(1).optional(),
  image: z.array(z.string().min(1)).min(1).optional(),
});

const sourceConfigSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(["rss", "html"]),
  endpoints: z.array(z.string().url()).min(1),
  enabled: z.boolean().default(true),
  section: z.string().min(1).optional(),
  enforceFreshness: z.boolean().default(false),
  toleranceMinutes: z.number().int().positive().default(180),
  futureSkewMinutes: z.number().int().nonnegative().default(30),
  categoryToleranceMinutes: z
    .record(z.string(), z.number().int().positive())
    .default({}),
  maxArticlesPerCycle: z.number().int().positive().default(5),
  strategies: z.array(z.string().min(1)).min(1).optional(),
  selectors: htmlSelectorsSchema.optional(),
  minMatches: z.number().int().nonnegative().default(3),
});

const groupConfigSchema = z.object({
  name: z.string().min(1),
  schedule: z.string().min(1),
  fetchConcurrency: z.number().int().positive().default(2),
  sources: z.array(sourceConfigSchema).min(1),
  fallbackSources: z.array(sourceConfigSchema).default([]),
});

const taxonomyGroupSchema = z.object({
  weight: z.number().positive(),
  keywords: z.array(z.string().min(1)).min(1),
});

export const appConfigSchema = z
  .object({
    groups: z.array(groupConfigSchema).min(1),
    fetch: z
      .object({
        strategies: z
          .record(z.string(), fetchStrategySchema)
          .default({ direct: {} }),
        chains: z
          .object({
            rss: z.array(z.string().min(1)).min(1).default(["direct"]),
            html: z.array(z.string().min(1)).min(1).default(["direct"]),
          })
          .default({}),
        minPayloadBytes: z
          .object({
            rss: z.number().int().nonnegative().default(200),
            html: z.number().int().nonnegative().default(1000),
          })
          .default({}),
        backoffBaseMs: z.number().int().nonnegative().default(1000),
        backoffMaxMs: z.number().int().positive().default(8000),
        sessionRotateAfter: z.number().int().positive().default(5),
      })
      .default({}),
    relevance: z
      .object({
        minScore: z.number().positive().default(1),
        taxonomy: z.record(z.string(), taxonomyGroupSchema).optional(),
      })
      .default({}),
    pipeline: z
      .object({
        maxArticlesPerCycle: z.number().int().positive().default(10),
      })
      .default({}),
    store: z
      .object({
        path: z.string().min(1).default("./data/seen-articles.json"),
        maxRecords: z.number().int().positive().default(1000),
      })
      .default({}),
    delivery: z.object({
      destinationId: z.string().min(1),
      maxRetries: z.number().int().nonnegative().default(2),
      backoffBaseMs: z.number().int().nonnegative().default(1000),
      backoffFactor: z.number().min(1).default(2),
      minIntervalMs: z.number().int().nonnegative().default(6000),
      requestTimeoutMs: z.number().int().positive().default(30000),
      parseMode: z.enum(["HTML"]).optional(),
      disablePreview: z.boolean().default(true),
      startupMessage: z.string().min(1).optional(),
    }),
    circuitBreaker: z
      .object({
        failureThreshold: z.number().int().positive().default(5),
        cooldownMs: z.number().int().positive().default(60000),
      })
      .default({}),
    health: z
      .object({
        maxConsecutiveFailures: z.number().int().positive().default(5),
        staleFetchMinutes: z.number().int().positive().default(60),
        errorWindowMinutes: z.number().int().positive().default(10),
        maxErrorRatePerMinute: z.number().positive().default(10),
      })
      .default({}),
    translation: z
      .object({
        enabled: z.boolean().default(false),
        provider: z
          .enum(["anthropic", "openai", "gemini", "ollama", "lmstudio", "groq"])
          .default("groq"),
        model: z.string().min(1).default("llama-3.1-8b-instant"),
        targetLanguage: z.string().min(1).default("Arabic"),
        timeoutMs: z.number().int().positive().default(10000),
        maxInputLength: z.number().int().positive().default(1000),
      })
      .default({}),
    message: z
      .object({
        footer: z.string().optional(),
        includeSummary: z.boolean().default(true),
        includeImages: z.boolean().default(true),
        includeFlags: z.boolean().default(true),
      })
      .default({}),
    shutdown: z
      .object({
        graceMs: z.number().int().nonnegative().default(10000),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const known = new Set(Object.keys(config.fetch.strategies));

    for (const kind of ["rss", "html"] as const) {
      config.fetch.chains[kind].forEach((name, index) => {
        if (!known.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["fetch", "chains", kind, index],
            message: `unknown fetch strategy "${name}"`,
          });
        }
      });
    }

    const groupNames = new Set<string>();
    const sourceNames = new Set<string>();

    config.groups.forEach((group, groupIndex) => {
      if (groupNames.has(group.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["groups", groupIndex, "name"],
          message: `duplicate group name "${group.name}"`,
        });
      }
      groupNames.add(group.name);

      for (const list of ["sources", "fallbackSources"] as const) {
        group[list].forEach((source, sourceIndex) => {
          if (sourceNames.has(source.name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["groups", groupIndex, list, sourceIndex, "name"],
              message: `duplicate source name "${source.name}"`,
            });
          }
          sourceNames.add(source.name);

          source.strategies?.forEach((name, strategyIndex) => {
            if (!known.has(name)) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [
                  "groups",
                  groupIndex,
                  list,
                  sourceIndex,
                  "strategies",
                  strategyIndex,
                ],
                message: `unknown fetch strategy "${name}"`,
              });
            }
          });
        });
      }
    });
  });

export type AppConfig = z.infer<typeof appConfigSchema>;
export type GroupConfig = AppConfig["groups"][number];
export type SourceConfig = GroupConfig["sources"][number];
export type FetchStrategyConfig = z.infer<typeof fetchStrategySchema>;
export type HtmlSelectors = z.infer<typeof htmlSelectorsSchema>;
export type TaxonomyGroup = z.infer<typeof taxonomyGroupSchema>;
export type Taxonomy = Readonly<Record<string, TaxonomyGroup>>;
