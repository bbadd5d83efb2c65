// Numeric status codes returned across the binding boundary

export const Status = {
  Ok: 0,
  UnknownScheme: 1,
  ConfigInvalid: 2,
  NotFound: 3,
  PermissionDenied: 4,
  Io: 5,
  QuotaExceeded: 6,
  UsedAfterRelease: 7,
  HandleInvalid: 8,
  Unsupported: 9,
} as const;

export type Status = (typeof Status)[keyof typeof Status];

const STATUS_BY_CODE: Readonly<Record<string, Status>> = {
  BACKEND_UNKNOWN_SCHEME: Status.UnknownScheme,
  BACKEND_CONFIG_INVALID: Status.ConfigInvalid,
  STORAGE_NOT_FOUND: Status.NotFound,
  STORAGE_PERMISSION_DENIED: Status.PermissionDenied,
  STORAGE_IO: Status.Io,
  STORAGE_QUOTA_EXCEEDED: Status.QuotaExceeded,
  STORAGE_USED_AFTER_RELEASE: Status.UsedAfterRelease,
  STORAGE_UNSUPPORTED: Status.Unsupported,
  HANDLE_INVALID: Status.HandleInvalid,
};

/** Map an error code to its status. Codes outside the storage taxonomy report Io. */
export function statusFromCode(code: string): Status {
  return STATUS_BY_CODE[code] ?? Status.Io;
}
