import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  MAINTENANCE_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
});

export const env = envSchema.parse(process.env);
