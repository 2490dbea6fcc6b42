import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

// Define environment variable schema with Zod for type-safe validation
const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server configuration
  PORT: z.string().default('3000').transform(Number),
  REQUEST_BODY_LIMIT: z.string().default('1mb'),

  // Allocation configuration
  MAX_DESIGNS_PER_RUN: z
    .string()
    .default('1000')
    .transform(Number)
    .pipe(z.number().int('MAX_DESIGNS_PER_RUN must be an integer').positive()),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // CORS configuration
  ALLOWED_ORIGINS: z.string().default('*'),
});

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

// '*' allows any origin, otherwise a comma-separated allow-list
export const CORS_ORIGINS: string[] | true =
  env.ALLOWED_ORIGINS.trim() === '*'
    ? true
    : env.ALLOWED_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);
