import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';

// Load .env from the working directory first, then the project root
const possiblePaths = [
  resolve(process.cwd(), '.env'),
  resolve(__dirname, '../../.env'),
  resolve(__dirname, '../../../.env'),
];

for (const envPath of possiblePaths) {
  if (existsSync(envPath)) {
    const result = dotenv.config({ path: envPath });
    if (result.error) {
      console.log(`Failed to load ${envPath}:`, result.error.message);
    } else {
      break;
    }
  }
}

const envSchema = z.object({
  // Database (optional; the thank-you store is disabled without it)
  DATABASE_URL: z.string().url().optional(),

  // Input and output directories for the command scripts
  DATA_DIR: z.string().min(1).default('data/slips'),
  MEMBERS_DIR: z.string().min(1).default('data/members'),
  REPORTS_DIR: z.string().min(1).default('reports'),

  // Analysis rules
  WITHIN_ORGANIZATION_RULE: z.enum(['empty-detail', 'always', 'never']).default('empty-detail'),
  TOP_MOVERS_LIMIT: z.string().regex(/^\d+$/).transform(Number).default('5'),

  // Runtime
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).transform(Number).default('3000'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function validateEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = envSchema.parse(process.env);
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Environment validation failed:');
      error.errors.forEach((err) => {
        const varName = err.path.join('.');
        console.error(`  - ${varName}: ${err.message}`);
      });
      console.error('\nSee .env.example for the expected configuration.\n');
      process.exit(1);
    }
    throw error;
  }
}

export const env = validateEnv();

export function isDatabaseConfigured(): boolean {
  return Boolean(env.DATABASE_URL);
}
