import { z } from "zod";

const scanConfigSchema = z.object({
  days: z.number().int().positive().default(7),
  replyDepth: z.number().int().nonnegative().default(6),
  includeReposts: z.boolean().default(false),
  postPageSize: z.number().int().min(1).max(100).default(50),
  engagementPageSize: z.number().int().min(1).max(100).default(100),
});

const profilesConfigSchema = z.object({
  postLimit: z.number().int().min(1).max(100).default(15),
});

export const appConfigSchema = z.object({
  scan: scanConfigSchema.default({}),
  profiles: profilesConfigSchema.default({}),
});

export const credentialsSchema = z.object({
  BLUESKY_HANDLE: z.string().trim().min(1),
  BLUESKY_APP_PASSWORD: z.string().trim().min(1),
  BLUESKY_SERVICE: z.string().url().default("https://bsky.social"),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ScanConfig = z.infer<typeof scanConfigSchema>;

export type Credentials = {
  readonly identifier: string;
  readonly password: string;
  readonly service: string;
};
