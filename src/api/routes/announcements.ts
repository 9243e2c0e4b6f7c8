import { Router, Request } from "express";
import type { AnnouncementService } from "../../services/announcementService";
import type { Announcement } from "../../repositories/announcementRepository";
import {
  announcementFieldsSchema,
  teacherQuerySchema,
} from "../../shared/validation/announcementValidation";

// ─── Wire shape ─────────────────────────────────────────────────────────────

export interface AnnouncementResponse {
  id: string;
  message: string;
  start_date: string | null;
  expiration_date: string;
  created_by: string;
}

export function toAnnouncementResponse(announcement: Announcement): AnnouncementResponse {
  return {
    id: announcement.id,
    message: announcement.message,
    start_date: announcement.startDate ?? null,
    expiration_date: announcement.expirationDate,
    created_by: announcement.createdBy,
  };
}

// Fields may come from the query string or the body; body values win.
function readFields(req: Request) {
  const body: unknown = req.body;
  const fromBody = typeof body === "object" && body !== null ? body : {};
  return announcementFieldsSchema.parse({ ...req.query, ...fromBody });
}

function readTeacher(req: Request): string {
  return teacherQuerySchema.parse(req.query).teacher_username;
}

export function createAnnouncementsRouter(service: AnnouncementService): Router {
  const router = Router();

  // ─── GET / — Active announcements ─────────────────────────────────────────

  router.get("/", async (_req, res, next) => {
    try {
      const items = await service.listActive();
      return res.ok("announcements listed", items.map(toAnnouncementResponse));
    } catch (err) {
      return next(err);
    }
  });

  // ─── GET /all — Every announcement, newest expiration first ───────────────

  router.get("/all", async (req, res, next) => {
    try {
      const items = await service.listAll(readTeacher(req));
      return res.ok("announcements listed", items.map(toAnnouncementResponse));
    } catch (err) {
      return next(err);
    }
  });

  // ─── POST / — Create announcement ─────────────────────────────────────────

  router.post("/", async (req, res, next) => {
    try {
      const teacherUsername = readTeacher(req);
      const created = await service.create(teacherUsername, readFields(req));
      return res.status(201).ok("announcement created", toAnnouncementResponse(created));
    } catch (err) {
      return next(err);
    }
  });

  // ─── PUT /:announcementId — Update announcement ───────────────────────────

  router.put("/:announcementId", async (req, res, next) => {
    try {
      const teacherUsername = readTeacher(req);
      const updated = await service.update(
        req.params.announcementId,
        teacherUsername,
        readFields(req)
      );
      return res.ok("announcement updated", toAnnouncementResponse(updated));
    } catch (err) {
      return next(err);
    }
  });

  // ─── DELETE /:announcementId — Delete announcement ────────────────────────

  router.delete("/:announcementId", async (req, res, next) => {
    try {
      await service.remove(req.params.announcementId, readTeacher(req));
      return res.ok("announcement deleted", { message: "Announcement deleted successfully" });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
