import { describe, it, expect, vi, beforeEach } from "vitest";
import mongoose from "mongoose";

// ─── Mocks ────────────────────────────────────────────────────────────────

const mockFind = vi.fn();
const mockFindById = vi.fn();
const mockCreate = vi.fn();
const mockUpdateOne = vi.fn();
const mockDeleteOne = vi.fn();
const mockTeacherExists = vi.fn();

function chainable(resolvedValue: unknown) {
  const obj: Record<string, unknown> = {};
  obj.sort = vi.fn().mockReturnValue(obj);
  obj.lean = vi.fn().mockResolvedValue(resolvedValue);
  return obj;
}

vi.mock("../../../src/models/announcement", () => ({
  AnnouncementModel: {
    find: (...args: unknown[]) => mockFind(...args),
    findById: (...args: unknown[]) => mockFindById(...args),
    create: (...args: unknown[]) => mockCreate(...args),
    updateOne: (...args: unknown[]) => mockUpdateOne(...args),
    deleteOne: (...args: unknown[]) => mockDeleteOne(...args),
  },
}));

vi.mock("../../../src/models/teacher", () => ({
  TeacherModel: {
    exists: (...args: unknown[]) => mockTeacherExists(...args),
  },
}));

import { MongoAnnouncementRepository } from "../../../src/repositories/announcementRepository";
import { MongoTeacherDirectory } from "../../../src/repositories/teacherDirectory";

const ID = "507f1f77bcf86cd799439011";

function oid(hex: string = ID): mongoose.Types.ObjectId {
  return new mongoose.Types.ObjectId(hex);
}

let repo: MongoAnnouncementRepository;

beforeEach(() => {
  vi.clearAllMocks();
  repo = new MongoAnnouncementRepository();
});

// ─── isValidId ───────────────────────────────────────────────────────────────

describe("MongoAnnouncementRepository.isValidId", () => {
  it("accepts a 24-char hex ObjectId", () => {
    expect(repo.isValidId(ID)).toBe(true);
  });

  it("rejects other strings", () => {
    expect(repo.isValidId("not-an-id")).toBe(false);
    expect(repo.isValidId("")).toBe(false);
  });
});

// ─── findAll ─────────────────────────────────────────────────────────────────

describe("MongoAnnouncementRepository.findAll", () => {
  it("maps lean documents in store order", async () => {
    const chain = chainable([
      { _id: oid(), message: "Hi", expirationDate: "2024-06-30", createdBy: "t1" },
    ]);
    mockFind.mockReturnValue(chain);

    const items = await repo.findAll();

    expect(chain.sort).not.toHaveBeenCalled();
    expect(items).toEqual([
      { id: ID, message: "Hi", expirationDate: "2024-06-30", createdBy: "t1" },
    ]);
    expect(items[0]).not.toHaveProperty("startDate");
  });

  it("sorts by expiration descending on request", async () => {
    const chain = chainable([]);
    mockFind.mockReturnValue(chain);

    await repo.findAll("expirationDesc");

    expect(chain.sort).toHaveBeenCalledWith({ expirationDate: -1 });
  });
});

// ─── findById ────────────────────────────────────────────────────────────────

describe("MongoAnnouncementRepository.findById", () => {
  it("skips the query for a malformed id", async () => {
    expect(await repo.findById("nope")).toBeNull();
    expect(mockFindById).not.toHaveBeenCalled();
  });

  it("maps a found document including its start date", async () => {
    mockFindById.mockReturnValue(
      chainable({
        _id: oid(),
        message: "Hi",
        startDate: "2024-06-01",
        expirationDate: "2024-06-30",
        createdBy: "t1",
      })
    );

    expect(await repo.findById(ID)).toEqual({
      id: ID,
      message: "Hi",
      startDate: "2024-06-01",
      expirationDate: "2024-06-30",
      createdBy: "t1",
    });
  });

  it("returns null when nothing matches", async () => {
    mockFindById.mockReturnValue(chainable(null));
    expect(await repo.findById(ID)).toBeNull();
  });
});

// ─── insert ──────────────────────────────────────────────────────────────────

describe("MongoAnnouncementRepository.insert", () => {
  it("leaves an absent start date out of the document", async () => {
    mockCreate.mockResolvedValue({ _id: oid() });

    const created = await repo.insert({
      message: "Hi",
      expirationDate: "2099-01-01",
      createdBy: "t1",
    });

    expect(mockCreate).toHaveBeenCalledWith({
      message: "Hi",
      expirationDate: "2099-01-01",
      createdBy: "t1",
    });
    expect(mockCreate.mock.calls[0][0]).not.toHaveProperty("startDate");
    expect(created.id).toBe(ID);
  });
});

// ─── update ──────────────────────────────────────────────────────────────────

describe("MongoAnnouncementRepository.update", () => {
  it("unsets the start date in the same call when it is cleared", async () => {
    mockUpdateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 1 });

    const outcome = await repo.update(ID, { message: "New", expirationDate: "2099-01-01" });

    expect(outcome).toEqual({ matchedCount: 1, modifiedCount: 1 });
    expect(mockUpdateOne).toHaveBeenCalledTimes(1);
    const [filter, update] = mockUpdateOne.mock.calls[0];
    expect(filter._id.toHexString()).toBe(ID);
    expect(update).toEqual({
      $set: { message: "New", expirationDate: "2099-01-01" },
      $unset: { startDate: "" },
    });
  });

  it("sets a supplied start date", async () => {
    mockUpdateOne.mockResolvedValue({ matchedCount: 1, modifiedCount: 0 });

    const outcome = await repo.update(ID, {
      message: "New",
      startDate: "2024-06-01",
      expirationDate: "2099-01-01",
    });

    expect(outcome).toEqual({ matchedCount: 1, modifiedCount: 0 });
    expect(mockUpdateOne.mock.calls[0][1]).toEqual({
      $set: { message: "New", expirationDate: "2099-01-01", startDate: "2024-06-01" },
    });
  });
});

// ─── deleteById ──────────────────────────────────────────────────────────────

describe("MongoAnnouncementRepository.deleteById", () => {
  it("reports whether a document was removed", async () => {
    mockDeleteOne.mockResolvedValueOnce({ deletedCount: 1 }).mockResolvedValueOnce({ deletedCount: 0 });

    expect(await repo.deleteById(ID)).toBe(true);
    expect(await repo.deleteById(ID)).toBe(false);
  });
});

// ─── MongoTeacherDirectory ───────────────────────────────────────────────────

describe("MongoTeacherDirectory.exists", () => {
  it("looks the teacher up by username", async () => {
    mockTeacherExists.mockResolvedValueOnce({ _id: "t1" }).mockResolvedValueOnce(null);
    const directory = new MongoTeacherDirectory();

    expect(await directory.exists("t1")).toBe(true);
    expect(await directory.exists("t9")).toBe(false);
    expect(mockTeacherExists).toHaveBeenNthCalledWith(1, { _id: "t1" });
  });
});
