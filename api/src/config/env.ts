import { z } from "zod";

/**
 * Settings owned by the HTTP transport. Capture settings live in
 * `@shotbatch/core` so every entry point consumes the same contract.
 */
const apiEnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65_535).catch(3000),
    HOSTNAME: z.string().trim().min(1).catch("0.0.0.0"),
    CAPTURE_ROOT_DIR: z.string().trim().min(1).optional(),
  })
  .passthrough();

export type ApiEnv = z.infer<typeof apiEnvSchema>;

let cachedEnv: ApiEnv | null = null;

export const getApiEnv = (): ApiEnv => {
  if (!cachedEnv) {
    cachedEnv = apiEnvSchema.parse(process.env);
  }
  return cachedEnv;
};
