import { Document, Model, Schema, Types, model, models } from "mongoose";

// ─── Stored shape ───────────────────────────────────────────────────────────

/** Dates are kept as the literal `YYYY-MM-DD` strings they arrived as. */
export interface AnnouncementAttrs {
  message: string;
  startDate?: string;
  expirationDate: string;
  createdBy: string;
}

export type LeanAnnouncement = AnnouncementAttrs & { _id: Types.ObjectId };

// ─── Document interface ─────────────────────────────────────────────────────

export interface AnnouncementDocument extends AnnouncementAttrs, Document<Types.ObjectId> {}

// ─── Main schema ────────────────────────────────────────────────────────────

const AnnouncementSchema = new Schema<AnnouncementDocument>(
  {
    message: { type: String, required: true },
    // no default: an absent start date must stay absent in the document
    startDate: { type: String },
    expirationDate: { type: String, required: true },
    createdBy: { type: String, required: true },
  },
  { collection: "announcements", versionKey: false }
);

// ─── Indexes ────────────────────────────────────────────────────────────────

AnnouncementSchema.index({ expirationDate: -1 });

// ─── Export ─────────────────────────────────────────────────────────────────

export const AnnouncementModel =
  (models.Announcement as Model<AnnouncementDocument>) ||
  model<AnnouncementDocument>("Announcement", AnnouncementSchema);
