import { Types } from "mongoose";
import { AnnouncementAttrs, AnnouncementModel, LeanAnnouncement } from "../models/announcement";

// ─── Domain types ───────────────────────────────────────────────────────────

export interface AnnouncementFields {
  message: string;
  startDate?: string;
  expirationDate: string;
}

export interface Announcement extends AnnouncementFields {
  id: string;
  createdBy: string;
}

export type NewAnnouncement = Omit<Announcement, "id">;

export type AnnouncementOrder = "store" | "expirationDesc";

export interface UpdateOutcome {
  matchedCount: number;
  modifiedCount: number;
}

/**
 * Store for announcement records. `update` replaces the editable fields; a
 * missing `startDate` removes the stored one.
 */
export interface AnnouncementRepository {
  isValidId(id: string): boolean;
  findAll(order?: AnnouncementOrder): Promise<Announcement[]>;
  findById(id: string): Promise<Announcement | null>;
  insert(input: NewAnnouncement): Promise<Announcement>;
  update(id: string, fields: AnnouncementFields): Promise<UpdateOutcome>;
  deleteById(id: string): Promise<boolean>;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function toAnnouncement(doc: LeanAnnouncement): Announcement {
  const announcement: Announcement = {
    id: doc._id.toHexString(),
    message: doc.message,
    expirationDate: doc.expirationDate,
    createdBy: doc.createdBy,
  };
  if (doc.startDate) announcement.startDate = doc.startDate;
  return announcement;
}

function toAttrs(input: NewAnnouncement): AnnouncementAttrs {
  const attrs: AnnouncementAttrs = {
    message: input.message,
    expirationDate: input.expirationDate,
    createdBy: input.createdBy,
  };
  if (input.startDate) attrs.startDate = input.startDate;
  return attrs;
}

// ─── Mongo implementation ───────────────────────────────────────────────────

export class MongoAnnouncementRepository implements AnnouncementRepository {
  isValidId(id: string): boolean {
    return Types.ObjectId.isValid(id);
  }

  async findAll(order: AnnouncementOrder = "store"): Promise<Announcement[]> {
    const docs =
      order === "expirationDesc"
        ? await AnnouncementModel.find().sort({ expirationDate: -1 }).lean<LeanAnnouncement[]>()
        : await AnnouncementModel.find().lean<LeanAnnouncement[]>();
    return docs.map(toAnnouncement);
  }

  async findById(id: string): Promise<Announcement | null> {
    if (!this.isValidId(id)) return null;
    const doc = await AnnouncementModel.findById(new Types.ObjectId(id)).lean<LeanAnnouncement>();
    return doc ? toAnnouncement(doc) : null;
  }

  async insert(input: NewAnnouncement): Promise<Announcement> {
    const attrs = toAttrs(input);
    const doc = await AnnouncementModel.create(attrs);
    return toAnnouncement({ ...attrs, _id: doc._id });
  }

  async update(id: string, fields: AnnouncementFields): Promise<UpdateOutcome> {
    const $set = { message: fields.message, expirationDate: fields.expirationDate };
    const result = await AnnouncementModel.updateOne(
      { _id: new Types.ObjectId(id) },
      fields.startDate
        ? { $set: { ...$set, startDate: fields.startDate } }
        : { $set, $unset: { startDate: "" } }
    );
    return { matchedCount: result.matchedCount, modifiedCount: result.modifiedCount };
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await AnnouncementModel.deleteOne({ _id: new Types.ObjectId(id) });
    return result.deletedCount > 0;
  }
}
