import { z } from "zod";

const limitsSchema = z.object({
  maxFeedsPerDestination: z.number().int().nonnegative().default(10),
  maxTotalFeedsByOwner: z.number().int().nonnegative().default(200),
  maxActiveFeedsByOwner: z.number().int().nonnegative().default(20),
});

const notifierConfigSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("webhook"),
    url: z.string().url(),
  }),
  z.object({
    kind: z.literal("mailgun"),
    domain: z.string().min(1),
    from: z.string().min(1),
  }),
]);

export const appConfigSchema = z.object({
  limits: limitsSchema.default({}),
  schedule: z
    .object({
      update: z.string().min(1).default("0 * * * *"),
      runOnStart: z.boolean().default(false),
    })
    .default({}),
  update: z
    .object({
      passTimeoutSeconds: z.number().int().positive().default(60),
      fetchTimeoutSeconds: z.number().int().positive().default(20),
      pageSize: z.number().int().positive().default(100),
    })
    .default({}),
  quarantine: z
    .object({
      windowHours: z.number().positive().default(12),
      failureThreshold: z.number().int().positive().default(9),
      notifyConcurrency: z.number().int().positive().default(4),
    })
    .default({}),
  commands: z
    .object({
      allowList: z.array(z.string().min(1)).default([]),
      fetchTimeoutSeconds: z.number().int().positive().default(20),
      rateLimit: z
        .object({
          maxRequests: z.number().int().nonnegative().default(0),
          windowMinutes: z.number().positive().default(1),
        })
        .default({}),
    })
    .default({}),
  notifier: notifierConfigSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type QuotaLimits = AppConfig["limits"];
export type NotifierConfig = z.infer<typeof notifierConfigSchema>;
