import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().trim().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  MONGODB_URI: z
    .string()
    .trim()
    .regex(/^mongodb(\+srv)?:\/\//, "must be a mongodb:// or mongodb+srv:// URI")
    .default("mongodb://127.0.0.1:27017/hr_ats"),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024)
});

export type AppConfig = {
  nodeEnv: "development" | "test" | "production";
  host: string;
  port: number;
  mongoUri: string;
  uploadMaxBytes: number;
};

type EnvSource = Record<string, string | undefined>;

// Blank values count as unset so that `PORT=` in a .env file falls back to the default.
function withoutBlanks(env: EnvSource): EnvSource {
  return Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim().length > 0)
  );
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join("; ")}`);
  }
  const data = parsed.data;
  return {
    nodeEnv: data.NODE_ENV,
    host: data.HOST,
    port: data.PORT,
    mongoUri: data.MONGODB_URI,
    uploadMaxBytes: data.UPLOAD_MAX_BYTES
  };
}
