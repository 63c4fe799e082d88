import { describe, test } from "node:test";
import * as assert from "node:assert";
import { normalize } from "../normalizer";

describe("Normalizer", () => {
  test("should map a complete record", () => {
    const record = normalize({
      name: "Test Person",
      email: "person@example.test",
      mobile: "0000000000",
      gender: "F",
      dateOfBirth: "1990-01-01",
      maritalStatus: "Single",
      currentLocation: "Pune",
      permanentAddress: "Street 1",
      preferredLocations: ["Pune", "Mumbai"],
      currentDesignation: "Engineer",
      currentCompany: "Acme",
      totalExperience: 6.5,
      currentCTC: "10 Lacs",
      expectedCTC: "14 Lacs",
      noticePeriod: "30 Days",
      educations: [
        { degree: "B.Tech", specialization: "CS", institute: "Institute A", year: 2012 },
        { degree: "M.Tech", specialization: "AI", institute: "Institute B", year: "2014" },
      ],
      mergedKeySkill: "typescript, node",
      jobTitle: "Backend Engineer",
      profileSummary: "Builds services",
      profileViews: "42",
      profileDownloads: 3,
      cvAttached: true,
      textCv: "cv text",
      profileLastModified: "2024-05-01",
      profileLastActive: "2024-05-02",
    });

    assert.deepStrictEqual(record.identity, {
      name: "Test Person",
      email: "person@example.test",
      mobile: "0000000000",
      gender: "F",
      dateOfBirth: "1990-01-01",
      maritalStatus: "Single",
    });
    assert.deepStrictEqual(record.location, {
      currentLocation: "Pune",
      permanentAddress: "Street 1",
      preferredLocations: ["Pune", "Mumbai"],
    });
    assert.strictEqual(record.employment.totalExperience, "6.5");
    assert.strictEqual(record.employment.currentCtc, "10 Lacs");
    assert.strictEqual(record.employment.expectedCtc, "14 Lacs");
    assert.strictEqual(record.employment.currentRole, null);
    assert.deepStrictEqual(record.education, {
      ugDegree: "B.Tech",
      ugSpecialization: "CS",
      ugInstitute: "Institute A",
      ugYear: "2012",
      pgDegree: "M.Tech",
      pgSpecialization: "AI",
      pgInstitute: "Institute B",
      pgYear: "2014",
    });
    assert.deepStrictEqual(record.skills, {
      keySkills: "typescript, node",
      jobTitle: "Backend Engineer",
      profileSummary: "Builds services",
    });
    assert.deepStrictEqual(record.metadata, {
      profileViews: 42,
      profileDownloads: 3,
      cvAttached: true,
      textCv: "cv text",
      profileLastModified: "2024-05-01",
      profileLastActive: "2024-05-02",
    });
  });

  test("should fall back to alternate field names", () => {
    const record = normalize({
      birthDate: "1985-02-03",
      mailCity: "Delhi",
      keywords: ["go", "sql"],
      summary: "Short summary",
      education: [{ course: "BSc", spec: "Maths", college: "College C", passingYear: 2005 }],
    });

    assert.strictEqual(record.identity.dateOfBirth, "1985-02-03");
    assert.strictEqual(record.location.currentLocation, "Delhi");
    assert.strictEqual(record.skills.keySkills, "go, sql");
    assert.strictEqual(record.skills.profileSummary, "Short summary");
    assert.strictEqual(record.education.ugDegree, "BSc");
    assert.strictEqual(record.education.ugSpecialization, "Maths");
    assert.strictEqual(record.education.ugInstitute, "College C");
    assert.strictEqual(record.education.ugYear, "2005");
    assert.strictEqual(record.education.pgDegree, null);
  });

  test("should prefer the primary name and skip empty values", () => {
    const record = normalize({
      dateOfBirth: "",
      birthDate: "1970-07-07",
      currentLocation: "Chennai",
      mailCity: "Ignored",
    });

    assert.strictEqual(record.identity.dateOfBirth, "1970-07-07");
    assert.strictEqual(record.location.currentLocation, "Chennai");
  });

  test("should split preferred locations given as text", () => {
    const record = normalize({ preferredLocations: "Pune, Mumbai ,, Goa" });

    assert.deepStrictEqual(record.location.preferredLocations, ["Pune", "Mumbai", "Goa"]);
  });

  test("should produce all nulls for an empty record", () => {
    const record = normalize({});

    assert.strictEqual(record.identity.name, null);
    assert.strictEqual(record.location.preferredLocations, null);
    assert.strictEqual(record.education.ugDegree, null);
    assert.strictEqual(record.metadata.profileViews, null);
    assert.strictEqual(record.metadata.cvAttached, null);
  });

  test("should tolerate values of the wrong shape", () => {
    const record = normalize({
      name: { first: "Nested" },
      educations: "not a list",
      profileViews: "many",
      cvAttached: "yes",
    });

    assert.strictEqual(record.identity.name, null);
    assert.strictEqual(record.education.ugDegree, null);
    assert.strictEqual(record.metadata.profileViews, null);
    assert.strictEqual(record.metadata.cvAttached, true);
  });

  test("should give the same result for the same input", () => {
    const raw = { name: "Same", educations: [{ degree: "BA" }] };

    assert.deepStrictEqual(normalize(raw), normalize(raw));
  });
});
