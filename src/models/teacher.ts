import { Document, Model, Schema, model, models } from "mongoose";

export type TeacherRole = "teacher" | "admin";

// ─── Document interface ─────────────────────────────────────────────────────

/** Teacher directory entry, keyed by username. */
export interface TeacherDocument extends Document<string> {
  displayName: string;
  role: TeacherRole;
}

// ─── Main schema ────────────────────────────────────────────────────────────

const TeacherSchema = new Schema<TeacherDocument>(
  {
    _id: { type: String, required: true },
    displayName: { type: String, required: true, trim: true },
    role: { type: String, enum: ["teacher", "admin"], default: "teacher" },
  },
  { collection: "teachers", versionKey: false }
);

// ─── Export ─────────────────────────────────────────────────────────────────

export const TeacherModel =
  (models.Teacher as Model<TeacherDocument>) ||
  model<TeacherDocument>("Teacher", TeacherSchema);
