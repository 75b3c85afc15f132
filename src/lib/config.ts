import { z } from "zod";

export const DEFAULT_BASE_URL = "https://services.ecourts.gov.in/ecourtindia_v6/";

const optionalString = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : null;
  });

const envSchema = z.object({
  ECOURTS_OUT_DIR: z.string().trim().min(1).default("outputs"),
  ECOURTS_DOWNLOAD_DIR: z.string().trim().min(1).default("downloads"),
  ECOURTS_BASE_URL: z.string().trim().url().default(DEFAULT_BASE_URL),
  ECOURTS_COOKIE: optionalString,
  TURSO_DATABASE_URL: optionalString,
  TURSO_AUTH_TOKEN: optionalString,
  RESEND_API_KEY: optionalString,
  ALERT_EMAIL: optionalString,
  ALERT_FROM: z.string().trim().min(1).default("Cause List Checker <alerts@example.com>"),
});

export interface AppConfig {
  outDir: string;
  downloadDir: string;
  baseUrl: string;
  cookie: string | null;
  database: { url: string; authToken: string | null } | null;
  alert: { apiKey: string; to: string; from: string } | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration: ${issue.path.join(".")} ${issue.message}`);
  }
  const e = parsed.data;

  return {
    outDir: e.ECOURTS_OUT_DIR,
    downloadDir: e.ECOURTS_DOWNLOAD_DIR,
    baseUrl: e.ECOURTS_BASE_URL,
    cookie: e.ECOURTS_COOKIE,
    database: e.TURSO_DATABASE_URL ? { url: e.TURSO_DATABASE_URL, authToken: e.TURSO_AUTH_TOKEN } : null,
    alert:
      e.RESEND_API_KEY && e.ALERT_EMAIL ? { apiKey: e.RESEND_API_KEY, to: e.ALERT_EMAIL, from: e.ALERT_FROM } : null,
  };
}
