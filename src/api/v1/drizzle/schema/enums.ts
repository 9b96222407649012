import { pgEnum } from 'drizzle-orm/pg-core';

// Shared by alerts and recalls
export const severityEnum = pgEnum('severity', [
    'low',
    'medium',
    'high',
    'critical',
]);

export type Severity = (typeof severityEnum.enumValues)[number];
