import dotenv from "dotenv";
import { z } from "zod";

// Load environment variables from .env files
// Priority: .env.<env>.local > .env.<env> > .env.local > .env
const env = process.env.NODE_ENV || "development";
const envFiles = [
  `.env.${env}.local`,
  `.env.${env}`,
  ".env.local",
  ".env",
];

for (const file of envFiles) {
  dotenv.config({ path: file });
}

const booleanFlag = (defaultValue: "true" | "false") =>
  z
    .string()
    .default(defaultValue)
    .transform((v) => v === "true");

// Define the environment variable schema
const envSchema = z
  .object({
    // Application
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // Logging Configuration
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    LOG_FILE: z.string().optional(),
    LOG_FORMAT: z.enum(["json", "text"]).default("json"),

    // Self-healing engine
    HEALING_ENABLED: booleanFlag("true"),
    HEALING_CACHE_ENABLED: booleanFlag("true"),
    HEALING_CACHE_FILE: z.string().default("reports/healing_cache.json"),
    HEALING_CACHE_TTL_MS: z.coerce.number().int().min(0).default(30 * 24 * 60 * 60 * 1000),
    HEALING_DEFAULT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    HEALING_RECENT_CAPACITY: z.coerce.number().int().positive().default(50),

    // Strategy thresholds
    HEALING_ATTRIBUTE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
    HEALING_NEARBY_RADIUS: z.coerce.number().int().positive().default(3),
    HEALING_POSITION_MAX_DISTANCE: z.coerce.number().positive().default(150),
    HEALING_VISUAL_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  })
  .passthrough();

// Type for validated environment variables
export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate a set of environment variables
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formattedErrors: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "unknown";
      formattedErrors.push(`  - ${path}: ${issue.message}`);
    }

    const errors = formattedErrors.length > 0 ? formattedErrors.join("\n") : "  - Unknown validation error";

    throw new Error(
      `Environment variable validation failed:\n${errors}\n\n` +
        `Please check your .env file or set the required environment variables.`
    );
  }

  return result.data;
}

// Export validated configuration
export const config = parseEnv();
