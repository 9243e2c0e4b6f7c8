export type ServiceErrorKind = "Unauthorized" | "InvalidInput" | "NotFound" | "InternalError";

const STATUS_BY_KIND: Record<ServiceErrorKind, number> = {
  Unauthorized: 401,
  InvalidInput: 400,
  NotFound: 404,
  InternalError: 500,
};

const CODE_BY_KIND: Record<ServiceErrorKind, string> = {
  Unauthorized: "UNAUTHORIZED",
  InvalidInput: "INVALID_INPUT",
  NotFound: "NOT_FOUND",
  InternalError: "INTERNAL_ERROR",
};

/**
 * Terminal failure of a service operation. Messages are static strings and
 * never carry store diagnostics.
 */
export class ServiceError extends Error {
  readonly kind: ServiceErrorKind;

  readonly status: number;

  readonly code: string;

  constructor(kind: ServiceErrorKind, message: string) {
    super(message);
    this.name = "ServiceError";
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
    this.code = CODE_BY_KIND[kind];
  }
}

export const unauthorized = () => new ServiceError("Unauthorized", "Authentication required");
export const invalidDate = () =>
  new ServiceError("InvalidInput", "Invalid date format. Use YYYY-MM-DD");
export const invalidAnnouncementId = () =>
  new ServiceError("InvalidInput", "Invalid announcement ID");
export const announcementNotFound = () => new ServiceError("NotFound", "Announcement not found");
export const updateFailed = () =>
  new ServiceError("InternalError", "Failed to update announcement");
