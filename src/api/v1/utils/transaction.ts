import { db, type Transaction } from "../drizzle/db";
import { MAX_TRANSACTION_ATTEMPTS } from "../config/policy";
import { AppError, ConcurrencyConflictError } from "./AppError";

const SERIALIZATION_FAILURE = "40001";
const DEADLOCK_DETECTED = "40P01";
export const UNIQUE_VIOLATION = "23505";

/**
 * SQLSTATE of a driver error. Drizzle wraps query failures, so the code may
 * sit on the error itself or on its `cause`.
 */
export function getPgErrorCode(error: unknown): string | undefined {
    let current: unknown = error;
    for (let depth = 0; depth < 3; depth++) {
        if (!(current instanceof Error) || current instanceof AppError) {
            return undefined;
        }
        if ("code" in current && typeof current.code === "string") {
            return current.code;
        }
        current = current.cause;
    }
    return undefined;
}

function isRetryableConflict(error: unknown): boolean {
    if (error instanceof ConcurrencyConflictError) {
        return true;
    }
    const code = getPgErrorCode(error);
    return code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED;
}

/**
 * Run `work` in a repeatable-read transaction. Serialization failures and
 * deadlocks abort the attempt and the whole unit is replayed, up to
 * MAX_TRANSACTION_ATTEMPTS, after which ConcurrencyConflictError surfaces.
 */
export async function withTransaction<T>(operation: string, work: (tx: Transaction) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
        try {
            return await db.transaction(work, { isolationLevel: "repeatable read" });
        } catch (error) {
            if (!isRetryableConflict(error)) {
                throw error;
            }
            if (attempt >= MAX_TRANSACTION_ATTEMPTS) {
                console.error(`❌ [${operation}] Giving up after ${attempt} conflicting attempts`);
                throw new ConcurrencyConflictError(operation);
            }
            console.warn(`⚠️ [${operation}] Transaction conflict on attempt ${attempt}, retrying`);
        }
    }
}
