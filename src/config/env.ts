import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  GOOGLE_CREDENTIALS_FILE: z.string().default('credenciais.json'),
  GOOGLE_CREDENTIALS_JSON: z.string().optional(),
  SPREADSHEET_ID: z.string().optional(),
  SPREADSHEET_NAME: z.string().default('Controle de custos'),
  CACHE_TTL_SECONDS: z.string().default('300').transform(Number),
  REPORT_TITLE: z.string().default('CONTROLE DE CUSTOS'),
  HEALTH_PORT: z.string().default('5000').transform(Number),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  dotenv.config();

  return envSchema.parse(process.env);
}

export const env = loadEnv();
