import { date, pgEnum, pgTable, text, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';

export const prescriptionStatusEnum = pgEnum('prescription_status', [
    'active',
    'fulfilled',
    'expired',
]);

export const prescriptionTable = pgTable('prescription', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    createdBy: uuid('created_by'),
    prescriptionNumber: varchar('prescription_number', { length: 50 }).notNull().unique(),
    patientName: varchar('patient_name', { length: 100 }).notNull(),
    patientPhone: varchar('patient_phone', { length: 20 }),
    doctorName: varchar('doctor_name', { length: 100 }).notNull(),
    doctorLicense: varchar('doctor_license', { length: 50 }),
    issueDate: date('issue_date', { mode: 'string' }).notNull(),
    expiryDate: date('expiry_date', { mode: 'string' }),
    status: prescriptionStatusEnum('status').default('active').notNull(),
    notes: text('notes'),
});

export type PrescriptionStatus = (typeof prescriptionStatusEnum.enumValues)[number];
export type PrescriptionTable = typeof prescriptionTable.$inferSelect;
export type NewPrescription = typeof prescriptionTable.$inferInsert;
