import type { Logger } from "pino";
import { Container } from "./container";
import { logger } from "./logger";
import { env, AppEnv } from "./config/env";
import {
  AnnouncementRepository,
  MongoAnnouncementRepository,
} from "../repositories/announcementRepository";
import { MongoTeacherDirectory, TeacherDirectory } from "../repositories/teacherDirectory";
import {
  AnnouncementService,
  createAnnouncementService,
} from "../services/announcementService";

export interface AppRegistry {
  env: AppEnv;
  logger: Logger;
  announcementRepository: AnnouncementRepository;
  teacherDirectory: TeacherDirectory;
  announcementService: AnnouncementService;
}

export const container = new Container<AppRegistry>();

container.register("env", () => env);
container.register("logger", () => logger);
container.register("announcementRepository", () => new MongoAnnouncementRepository());
container.register("teacherDirectory", () => new MongoTeacherDirectory());
container.register("announcementService", () =>
  createAnnouncementService({
    announcements: container.resolve("announcementRepository"),
    teachers: container.resolve("teacherDirectory"),
    logger: container.resolve("logger"),
  })
);
