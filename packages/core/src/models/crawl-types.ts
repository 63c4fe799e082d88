/**
 * JSON document as exchanged with the backend.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type HttpHeaders = Record<string, string>;

/**
 * Replayable request parsed from a captured template.
 * Never mutated after parsing; per-call variants are built with `withHeaders`.
 */
export interface RequestDescriptor {
  readonly url: string;
  /** Lower-cased header names. */
  readonly headers: Readonly<HttpHeaders>;
  readonly body: Readonly<JsonObject>;
  /** Cookie/session token found in the template, if any. */
  readonly credential: string | null;
  /** Whether the body came from the data payload or from the regex fallback. */
  readonly bodySource: "payload" | "fallback";
}

/**
 * Identifiers the backend expects on every follow-up call, read from the descriptor body.
 */
export interface SearchIdentity {
  requirementId: string | null;
  companyId: number | null;
  rdxUserId: string | null;
  rdxUserName: string | null;
}

/**
 * Session handle issued by the backend on first contact. Read-only for the rest of the run.
 */
export interface SessionContext {
  readonly sessionId: string;
  readonly sessionGroupId: string | null;
}

/**
 * Minimal reference to a remote record.
 * `ordinal` is the position in the requested sequence and the key used to reassemble results.
 */
export interface ItemStub {
  ordinal: number;
  uniqueId: string | null;
  jsKey: string | null;
  /** Display name when the listing carries one; only used for logging. */
  label: string | null;
}

export type RawDetailRecord = JsonObject;

export interface IdentityFields {
  name: string | null;
  email: string | null;
  mobile: string | null;
  gender: string | null;
  dateOfBirth: string | null;
  maritalStatus: string | null;
}

export interface LocationFields {
  currentLocation: string | null;
  permanentAddress: string | null;
  preferredLocations: string[] | null;
}

export interface EmploymentFields {
  currentDesignation: string | null;
  currentCompany: string | null;
  currentRole: string | null;
  functionalArea: string | null;
  industryType: string | null;
  employmentType: string | null;
  previousDesignation: string | null;
  previousCompany: string | null;
  totalExperience: string | null;
  currentCtc: string | null;
  expectedCtc: string | null;
  noticePeriod: string | null;
}

/**
 * Education tiers are sliced by position: first entry is `ug*`, second is `pg*`.
 * Nothing guarantees the backend orders entries by degree level.
 */
export interface EducationFields {
  ugDegree: string | null;
  ugSpecialization: string | null;
  ugInstitute: string | null;
  ugYear: string | null;
  pgDegree: string | null;
  pgSpecialization: string | null;
  pgInstitute: string | null;
  pgYear: string | null;
}

export interface SkillFields {
  keySkills: string | null;
  jobTitle: string | null;
  profileSummary: string | null;
}

export interface MetadataFields {
  profileViews: number | null;
  profileDownloads: number | null;
  cvAttached: boolean | null;
  textCv: string | null;
  profileLastModified: string | null;
  profileLastActive: string | null;
}

export interface NormalizedRecord {
  identity: IdentityFields;
  location: LocationFields;
  employment: EmploymentFields;
  education: EducationFields;
  skills: SkillFields;
  metadata: MetadataFields;
}

export type FailureCode =
  | "TRANSPORT"
  | "RATE_LIMITED"
  | "UNAUTHORIZED"
  | "QUOTA_OR_CHALLENGE"
  | "UNREADABLE_RESPONSE";

export type FetchOutcome =
  | { kind: "success"; ordinal: number; record: NormalizedRecord; attempts: number }
  | { kind: "failure"; ordinal: number; code: FailureCode; reason: string; attempts: number }
  | { kind: "aborted"; ordinal: number; reason: string };

export interface FailureSummary {
  ordinal: number;
  kind: "failure" | "aborted";
  reason: string;
}

export interface ResultEnvelope {
  requestedCount: number;
  totalAvailable: number;
  /** Number of stubs handed to the detail scheduler. */
  collectedCount: number;
  /** Successful records in stub order. */
  records: NormalizedRecord[];
  fetchedCount: number;
  /** Failed and aborted stubs together. */
  failedCount: number;
  abortedCount: number;
  failures: FailureSummary[];
  /** Listing pages that failed, so `collectedCount` may fall short of what was available. */
  failedPages: number[];
  /** Set when the circuit breaker ended the run early. */
  abortReason: string | null;
  elapsedMs: number;
  scrapedAt: string;
}

export type StructuredErrorCode =
  | "INVALID_INPUT"
  | "MALFORMED_TEMPLATE"
  | "SESSION_ESTABLISH"
  | "TRANSPORT"
  | "INTERNAL";

export interface StructuredError {
  code: StructuredErrorCode;
  message: string;
  status?: number;
}

export type RunResult =
  | { ok: true; envelope: ResultEnvelope }
  | { ok: false; error: StructuredError };

export interface RunInput {
  template: string;
  targetCount: number;
  concurrencyLimit: number;
  /** Passed to the transport untouched. */
  proxyUrl?: string;
}
