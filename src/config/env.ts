import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.string().default('3005'),
    MONGO_URI: z.string().default('mongodb://localhost:27017/savings-governance'),
    JWT_SECRET: z.string().default('dev-secret'),
    CORS_ORIGIN: z.string().default('*'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // 'memory' keeps every store in-process (local runs without MongoDB)
    STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),

    // Twilio SMS API - messages are only logged when credentials are missing
    TWILIO_ACCOUNT_SID: z.string().optional(),
    TWILIO_AUTH_TOKEN: z.string().optional(),
    TWILIO_PHONE_NUMBER: z.string().optional(),
    SMS_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

    // Scheduled jobs
    DEADLINE_CHECK_CRON: z.string().default('* * * * *'),
    OTP_SWEEP_CRON: z.string().default('*/5 * * * *'),
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
