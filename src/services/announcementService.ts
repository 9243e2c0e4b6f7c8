import type { Logger } from "pino";
import { logger as defaultLogger } from "../shared/logger";
import {
  announcementNotFound,
  invalidAnnouncementId,
  invalidDate,
  unauthorized,
  updateFailed,
} from "../shared/errors/serviceError";
import { formatLocalDate, isCalendarDate } from "../utils/calendarDate";
import type {
  Announcement,
  AnnouncementFields,
  AnnouncementRepository,
} from "../repositories/announcementRepository";
import type { TeacherDirectory } from "../repositories/teacherDirectory";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface AnnouncementServiceDeps {
  announcements: AnnouncementRepository;
  teachers: TeacherDirectory;
  /** Current local date as `YYYY-MM-DD`. */
  today?: () => string;
  logger?: Logger;
}

export interface AnnouncementInput {
  message: string;
  expirationDate: string;
  startDate?: string;
}

export type AnnouncementService = ReturnType<typeof createAnnouncementService>;

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Active when today lies in `[startDate, expirationDate]`, both inclusive and
 * a missing start open-ended. Compares the `YYYY-MM-DD` text directly.
 */
export function isActiveOn(announcement: AnnouncementFields, today: string): boolean {
  if (announcement.startDate && today < announcement.startDate) return false;
  return today <= announcement.expirationDate;
}

function toFields(input: AnnouncementInput): AnnouncementFields {
  const startDate = input.startDate ? input.startDate : undefined;
  if (!isCalendarDate(input.expirationDate)) throw invalidDate();
  if (startDate !== undefined && !isCalendarDate(startDate)) throw invalidDate();

  const fields: AnnouncementFields = {
    message: input.message,
    expirationDate: input.expirationDate,
  };
  if (startDate !== undefined) fields.startDate = startDate;
  return fields;
}

// ─── Service ────────────────────────────────────────────────────────────────

export function createAnnouncementService(deps: AnnouncementServiceDeps) {
  const { announcements, teachers } = deps;
  const today = deps.today ?? (() => formatLocalDate());
  const log = (deps.logger ?? defaultLogger).child({ module: "announcements" });

  async function requireTeacher(teacherUsername: string): Promise<void> {
    if (!(await teachers.exists(teacherUsername))) {
      log.warn({ msg: "Rejected unknown teacher", teacherUsername });
      throw unauthorized();
    }
  }

  function requireValidId(announcementId: string): void {
    if (!announcements.isValidId(announcementId)) throw invalidAnnouncementId();
  }

  // ─── 1. List active announcements ─────────────────────────────────────────

  async function listActive(): Promise<Announcement[]> {
    const current = today();
    const all = await announcements.findAll();
    return all.filter((announcement) => isActiveOn(announcement, current));
  }

  // ─── 2. List all announcements ────────────────────────────────────────────

  async function listAll(teacherUsername: string): Promise<Announcement[]> {
    await requireTeacher(teacherUsername);
    return announcements.findAll("expirationDesc");
  }

  // ─── 3. Create announcement ───────────────────────────────────────────────

  async function create(teacherUsername: string, input: AnnouncementInput): Promise<Announcement> {
    await requireTeacher(teacherUsername);
    const fields = toFields(input);

    const created = await announcements.insert({ ...fields, createdBy: teacherUsername });
    log.info({ msg: "Announcement created", announcementId: created.id, teacherUsername });
    return created;
  }

  // ─── 4. Update announcement ───────────────────────────────────────────────

  async function update(
    announcementId: string,
    teacherUsername: string,
    input: AnnouncementInput
  ): Promise<Announcement> {
    await requireTeacher(teacherUsername);
    requireValidId(announcementId);

    const existing = await announcements.findById(announcementId);
    if (!existing) throw announcementNotFound();

    const fields = toFields(input);
    const outcome = await announcements.update(announcementId, fields);
    if (outcome.matchedCount === 0 && outcome.modifiedCount === 0) {
      log.error({ msg: "Announcement update matched nothing", announcementId });
      throw updateFailed();
    }

    log.info({ msg: "Announcement updated", announcementId, teacherUsername });
    return { id: announcementId, ...fields, createdBy: existing.createdBy };
  }

  // ─── 5. Delete announcement ───────────────────────────────────────────────

  async function remove(announcementId: string, teacherUsername: string): Promise<void> {
    await requireTeacher(teacherUsername);
    requireValidId(announcementId);

    const deleted = await announcements.deleteById(announcementId);
    if (!deleted) throw announcementNotFound();

    log.info({ msg: "Announcement deleted", announcementId, teacherUsername });
  }

  return { listActive, listAll, create, update, remove };
}
