import { z } from "zod";

// ─── Teacher credential (query string) ──────────────────────────────────────

export const teacherQuerySchema = z.object({
  teacher_username: z.string({ required_error: "teacher_username is required" }),
});

// ─── Create / update fields ─────────────────────────────────────────────────

// Date syntax is checked by the service so that a bad date maps to 400.
export const announcementFieldsSchema = z
  .object({
    message: z.string({ required_error: "message is required" }),
    expiration_date: z.string({ required_error: "expiration_date is required" }),
    // null is what responses carry for an absent start date
    start_date: z.string().nullish(),
  })
  .transform((data) => ({
    message: data.message,
    expirationDate: data.expiration_date,
    startDate: data.start_date ?? undefined,
  }));

export type AnnouncementFieldsInput = z.output<typeof announcementFieldsSchema>;
