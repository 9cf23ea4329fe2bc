export type CheckOutcome =
  | "up_to_date"
  | "update_available"
  | "not_found_locally"
  | "network_error"
  | "parse_error";

export type DigestSource = "first-image" | "index";

export interface TrackedService {
  imageRef: string;
  serviceName: string;
}

export interface DigestComparison {
  service: TrackedService;
  remoteDigest: string | null;
  localDigest: string | null;
  outcome: CheckOutcome;
  error?: string;
}

export interface UpdateResult {
  service: TrackedService;
  outcome: CheckOutcome;
  pulled: boolean;
  restarted: boolean;
  skipped: boolean;
  dryRun: boolean;
  error: string | null;
}

export interface CheckSummary {
  updatesAvailable: number;
  upToDate: number;
  errors: number;
  servicesToUpdate: string[];
}

export interface UpdateSummary {
  updated: number;
  failed: number;
  skipped: number;
}

export interface UpdateAllResult {
  results: UpdateResult[];
  summary: UpdateSummary;
}
