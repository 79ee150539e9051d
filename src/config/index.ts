import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const ENVIRONMENTS = ['development', 'test', 'production'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z
  .object({
    NODE_ENV: z.enum(ENVIRONMENTS).default('development'),
    PORT: z.coerce.number().int().positive().default(3001),
    DATABASE_URI: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && !env.DATABASE_URI) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URI'],
        message: 'DATABASE_URI is required in production',
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => envSchema.parse(env);

const config = loadConfig();

export default config;
