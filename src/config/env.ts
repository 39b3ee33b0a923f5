import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const headersSchema = z
  .string()
  .optional()
  .transform((raw, ctx): Record<string, string> => {
    if (!raw) return {};
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      ctx.addIssue({
        code: "custom",
        message: `Must be valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        input: raw
      });
      return z.NEVER;
    }
    const parsed = z.record(z.string(), z.string()).safeParse(value);
    if (!parsed.success) {
      ctx.addIssue({ code: "custom", message: "Must be a JSON object of header names to string values.", input: raw });
      return z.NEVER;
    }
    return parsed.data;
  });

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default("*"),
  LOLALYTICS_BASE_URL: z.string().url().default("https://lolalytics.com/"),
  // setTimeout caps delays at a signed 32-bit millisecond count.
  LOLALYTICS_TIMEOUT_MS: z.coerce.number().int().positive().max(2_147_483_647).default(30_000),
  LOLALYTICS_USER_AGENT: z.string().min(1).optional(),
  LOLALYTICS_HEADERS: headersSchema
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
    throw new Error("Environment variable validation failed.");
  }
  return parsed.data;
}

/** Headers for the HTTP transport: LOLALYTICS_HEADERS plus the user-agent override. */
export function transportHeaders(config: Env): Record<string, string> {
  return {
    ...config.LOLALYTICS_HEADERS,
    ...(config.LOLALYTICS_USER_AGENT ? { "user-agent": config.LOLALYTICS_USER_AGENT } : {})
  };
}

export const env = parseEnv(process.env);
