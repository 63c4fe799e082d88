import type {
  EducationFields,
  JsonObject,
  JsonValue,
  NormalizedRecord,
  RawDetailRecord,
} from "./models/crawl-types";
import { isJsonObject } from "./descriptor-parser";

/**
 * Maps a raw detail record onto the fixed output shape.
 * Never throws; missing or unusable fields become null.
 */
export function normalize(raw: RawDetailRecord): NormalizedRecord {
  const text = (...keys: string[]): string | null => toText(firstPresent(raw, keys));

  return {
    identity: {
      name: text("name"),
      email: text("email"),
      mobile: text("mobile"),
      gender: text("gender"),
      dateOfBirth: text("dateOfBirth", "birthDate"),
      maritalStatus: text("maritalStatus"),
    },
    location: {
      currentLocation: text("currentLocation", "mailCity"),
      permanentAddress: text("permanentAddress"),
      preferredLocations: toTextList(firstPresent(raw, ["preferredLocations"])),
    },
    employment: {
      currentDesignation: text("currentDesignation"),
      currentCompany: text("currentCompany"),
      currentRole: text("currentRole"),
      functionalArea: text("functionalArea"),
      industryType: text("industryType"),
      employmentType: text("employmentType"),
      previousDesignation: text("previousDesignation"),
      previousCompany: text("previousCompany"),
      totalExperience: text("totalExperience"),
      currentCtc: text("currentCTC", "currentCtc"),
      expectedCtc: text("expectedCTC", "expectedCtc"),
      noticePeriod: text("noticePeriod"),
    },
    education: readEducation(firstPresent(raw, ["educations", "education"])),
    skills: {
      keySkills: text("mergedKeySkill", "keywords"),
      jobTitle: text("jobTitle"),
      profileSummary: text("profileSummary", "summary"),
    },
    metadata: {
      profileViews: toCount(firstPresent(raw, ["profileViews"])),
      profileDownloads: toCount(firstPresent(raw, ["profileDownloads"])),
      cvAttached: toFlag(firstPresent(raw, ["cvAttached"])),
      textCv: text("textCv"),
      profileLastModified: text("profileLastModified"),
      profileLastActive: text("profileLastActive"),
    },
  };
}

/**
 * First entry fills the `ug*` tier and the second the `pg*` tier, whatever degree they hold.
 */
function readEducation(value: JsonValue | undefined): EducationFields {
  const entries = Array.isArray(value) ? value : [];
  const tier = (index: number): JsonObject => {
    const entry = entries[index];
    return isJsonObject(entry) ? entry : {};
  };
  const ug = tier(0);
  const pg = tier(1);

  return {
    ugDegree: toText(firstPresent(ug, ["degree", "course"])),
    ugSpecialization: toText(firstPresent(ug, ["specialization", "spec"])),
    ugInstitute: toText(firstPresent(ug, ["institute", "instituteName", "college"])),
    ugYear: toText(firstPresent(ug, ["year", "yearOfCompletion", "passingYear"])),
    pgDegree: toText(firstPresent(pg, ["degree", "course"])),
    pgSpecialization: toText(firstPresent(pg, ["specialization", "spec"])),
    pgInstitute: toText(firstPresent(pg, ["institute", "instituteName", "college"])),
    pgYear: toText(firstPresent(pg, ["year", "yearOfCompletion", "passingYear"])),
  };
}

/**
 * Value of the first key holding something other than null or an empty string.
 */
function firstPresent(source: JsonObject, keys: readonly string[]): JsonValue | undefined {
  for (const key of keys) {
    if (!Object.hasOwn(source, key)) {
      continue;
    }
    const value = source[key];
    if (value !== null && value !== "") {
      return value;
    }
  }
  return undefined;
}

function toText(value: JsonValue | undefined): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = toTextList(value);
    return parts === null || parts.length === 0 ? null : parts.join(", ");
  }
  return null;
}

function toTextList(value: JsonValue | undefined): string[] | null {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part !== "");
  }
  if (!Array.isArray(value)) {
    return null;
  }
  const parts: string[] = [];
  for (const item of value) {
    if (typeof item === "string" && item.trim() !== "") {
      parts.push(item.trim());
    } else if (typeof item === "number" || typeof item === "boolean") {
      parts.push(String(item));
    }
  }
  return parts;
}

function toCount(value: JsonValue | undefined): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    return Number(value);
  }
  return null;
}

function toFlag(value: JsonValue | undefined): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "true" || lowered === "yes" || lowered === "1") {
      return true;
    }
    if (lowered === "false" || lowered === "no" || lowered === "0") {
      return false;
    }
  }
  return null;
}
