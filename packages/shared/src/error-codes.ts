/**
 * Error catalog for the teleflush SDK.
 *
 * Codes use the `TF-NNNN` format and are grouped by range:
 * - CONFIG      1000–1099  fatal at client construction
 * - USAGE       1100–1199  programmer errors, thrown immediately
 * - DELIVERY    2000–2999  logged only, never thrown to producers
 */
export const ErrorCode = {
  CONFIG: {
    NO_API_KEY: "TF-1000",
    NO_SERVICE: "TF-1001",
    NO_ENV: "TF-1002",
    NO_VERSION: "TF-1003",
    AMBIGUOUS_VERSION: "TF-1004",
    GIT_VERSION_UNAVAILABLE: "TF-1005",
    INVALID_OPTION: "TF-1006",
    UNKNOWN_INTEGRATION: "TF-1007",
  },
  USAGE: {
    SCHEDULER_ALREADY_STARTED: "TF-1100",
    SCHEDULER_RESTART_UNSUPPORTED: "TF-1101",
    WRITER_ALREADY_STARTED: "TF-1102",
    WRITER_RESTART_UNSUPPORTED: "TF-1103",
    METRIC_NAME_REQUIRED: "TF-1104",
    INVALID_METRIC_NAME: "TF-1105",
  },
  DELIVERY: {
    LOGS_REJECTED: "TF-2000",
    METRICS_REJECTED: "TF-2001",
    NETWORK_ERROR: "TF-2002",
    REQUEST_TIMEOUT: "TF-2003",
    BUFFER_OVERFLOW: "TF-2004",
    BACKGROUND_FLUSH_FAILED: "TF-2005",
    SHUTDOWN_TIMEOUT: "TF-2006",
    MALFORMED_EVENT: "TF-2007",
  },
} as const;

type ErrorCodeGroups = typeof ErrorCode;

export type ErrorCodeValue = {
  [G in keyof ErrorCodeGroups]: ErrorCodeGroups[G][keyof ErrorCodeGroups[G]];
}[keyof ErrorCodeGroups];
