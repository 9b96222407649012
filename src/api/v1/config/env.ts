import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
    DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
    PORT: z.coerce.number().int().positive().default(4000),
    JWT_SECRET: z.string().min(1, "JWT_SECRET is required"),
    JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(86400),
    AUTO_ORDER_DEFAULT_QUANTITY: z.coerce.number().int().positive().default(100),
    PURCHASE_ORDER_LEAD_DAYS: z.coerce.number().int().nonnegative().default(7),
    TRANSACTION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
    SYSTEM_ACTOR_ID: z.string().uuid().default("00000000-0000-0000-0000-000000000000"),
});

const env = envSchema.parse(process.env);

export const DATABASE_URL = env.DATABASE_URL;
export const PORT = env.PORT;
export const JWT_SECRET = env.JWT_SECRET;
export const JWT_EXPIRES_IN_SECONDS = env.JWT_EXPIRES_IN_SECONDS;
export const AUTO_ORDER_DEFAULT_QUANTITY = env.AUTO_ORDER_DEFAULT_QUANTITY;
export const PURCHASE_ORDER_LEAD_DAYS = env.PURCHASE_ORDER_LEAD_DAYS;
export const TRANSACTION_MAX_ATTEMPTS = env.TRANSACTION_MAX_ATTEMPTS;
export const SYSTEM_ACTOR_ID = env.SYSTEM_ACTOR_ID;
