import { TeacherModel } from "../models/teacher";

/** Read-only view of the teacher directory; existence is the only signal. */
export interface TeacherDirectory {
  exists(username: string): Promise<boolean>;
}

export class MongoTeacherDirectory implements TeacherDirectory {
  async exists(username: string): Promise<boolean> {
    const found = await TeacherModel.exists({ _id: username });
    return found !== null;
  }
}
