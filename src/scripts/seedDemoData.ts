/**
 * Seeds the teacher directory and a couple of sample announcements.
 *
 * Idempotent: teachers are upserted by username, announcements are only
 * inserted into an empty collection.
 * Run with: npm run build && npm run seed
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { TeacherModel } from "../models/teacher";
import { AnnouncementModel } from "../models/announcement";
import { isCalendarDate } from "../utils/calendarDate";

const calendarDate = z.string().refine(isCalendarDate, "Invalid date format. Use YYYY-MM-DD");

export const demoDataSchema = z.object({
  teachers: z.array(
    z.object({
      username: z.string().min(1),
      displayName: z.string().min(1),
      role: z.enum(["teacher", "admin"]).default("teacher"),
    })
  ),
  announcements: z.array(
    z.object({
      message: z.string().min(1),
      startDate: calendarDate.optional(),
      expirationDate: calendarDate,
      createdBy: z.string().min(1),
    })
  ),
});

export type DemoData = z.infer<typeof demoDataSchema>;

export const DEMO_DATA_PATH = path.resolve(process.cwd(), "data", "demoData.json");

export function loadDemoData(file: string = DEMO_DATA_PATH): DemoData {
  return demoDataSchema.parse(JSON.parse(fs.readFileSync(file, "utf8")));
}

export async function seedDemoData(
  data: DemoData
): Promise<{ teachersUpserted: number; announcementsInserted: number }> {
  for (const teacher of data.teachers) {
    await TeacherModel.updateOne(
      { _id: teacher.username },
      { $set: { displayName: teacher.displayName, role: teacher.role } },
      { upsert: true }
    );
  }

  const existing = await AnnouncementModel.countDocuments();
  if (existing > 0) {
    return { teachersUpserted: data.teachers.length, announcementsInserted: 0 };
  }

  await AnnouncementModel.insertMany(data.announcements);
  return {
    teachersUpserted: data.teachers.length,
    announcementsInserted: data.announcements.length,
  };
}

async function main() {
  const { connectMongo, disconnectMongo } = await import("../db/mongoose");
  const { logger } = await import("../shared/logger");

  await connectMongo();
  const result = await seedDemoData(loadDemoData());
  logger.info({ msg: "Demo data seeded", ...result });
  await disconnectMongo();
}

if (require.main === module) {
  main().catch((err) => {
    console.error("Seed failed:", err);
    process.exit(1);
  });
}
