import type { AlertSeverity } from "../drizzle/schema/alert";
import {
    AUTO_ORDER_DEFAULT_QUANTITY,
    PURCHASE_ORDER_LEAD_DAYS,
    TRANSACTION_MAX_ATTEMPTS,
} from "./env";

/**
 * Fixed inventory rules. Alert banding and procurement thresholds are policy,
 * not derived values; change them here rather than in the services.
 */

export interface ExpiryBand {
    /** Inclusive upper bound on days remaining until expiry */
    maxDays: number;
    severity: AlertSeverity;
}

// Evaluated once when a batch is received
export const RECEIPT_EXPIRY_BANDS: readonly ExpiryBand[] = [
    { maxDays: 7, severity: "critical" },
    { maxDays: 30, severity: "high" },
    { maxDays: 90, severity: "medium" },
];

// Default bands for the scheduled expiry scan; anything further out is "low"
export const SCAN_EXPIRY_BANDS: readonly ExpiryBand[] = [
    { maxDays: 7, severity: "high" },
    { maxDays: 30, severity: "medium" },
];
export const SCAN_EXPIRY_FALLBACK_SEVERITY: AlertSeverity = "low";

// Remaining stock at or below floor(reorderPoint / divisor) raises a high reorder alert and triggers an auto order; zero is critical
export const REORDER_HALF_DIVISOR = 2;

export const DEFAULT_AUTO_ORDER_QUANTITY = AUTO_ORDER_DEFAULT_QUANTITY;
export const PURCHASE_ORDER_LEAD_TIME_DAYS = PURCHASE_ORDER_LEAD_DAYS;

export const CRITICAL_EXPIRY_DAYS = 7;
export const NEAR_EXPIRY_DAYS = 30;
export const SALES_TRAILING_WINDOW_DAYS = 30;

export const MAX_TRANSACTION_ATTEMPTS = TRANSACTION_MAX_ATTEMPTS;
