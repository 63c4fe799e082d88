import { describe, test } from "node:test";
import * as assert from "node:assert";
import {
  DEFAULT_HEADERS,
  normalizeTemplate,
  parseTemplate,
  readSearchIdentity,
  withHeaders,
} from "../descriptor-parser";
import { MalformedTemplateError } from "../errors";

const SEARCH_URL =
  "https://recruit.example.test/cloudgateway-resdex/recruiter-search-services/v0/companies/123/recruiters/u1/rdx/search";

const bashTemplate = [
  `curl '${SEARCH_URL}' \\`,
  "  -H 'accept: application/json' \\",
  "  -H 'appid: 112' \\",
  "  -b 'session=test-secret; other=1' \\",
  "  -H 'content-type: application/json' \\",
  "  -H 'x-transaction-id: rlsrp1~~aaaaaa' \\",
  "  -H 'Content-Length: 99' \\",
  `  --data-raw '{"requirementId":"777","miscellaneousInfo":{"companyId":123,"rdxUserId":"u1","rdxUserName":"rec"}}'`,
].join("\n");

describe("Descriptor parser", () => {
  describe("Full templates", () => {
    test("should extract url, credential, headers and payload", () => {
      const descriptor = parseTemplate(bashTemplate);

      assert.strictEqual(descriptor.url, SEARCH_URL);
      assert.strictEqual(descriptor.credential, "session=test-secret; other=1");
      assert.strictEqual(descriptor.bodySource, "payload");
      assert.deepStrictEqual(descriptor.body, {
        requirementId: "777",
        miscellaneousInfo: { companyId: 123, rdxUserId: "u1", rdxUserName: "rec" },
      });
      assert.deepStrictEqual(descriptor.headers, {
        cookie: "session=test-secret; other=1",
        accept: "application/json",
        appid: "112",
        "content-type": "application/json",
        "accept-language": DEFAULT_HEADERS["accept-language"],
        systemid: "naukriIndia",
        "user-agent": DEFAULT_HEADERS["user-agent"],
        origin: "https://recruit.example.test",
      });
    });

    test("should give equal descriptors for the same template", () => {
      assert.deepStrictEqual(parseTemplate(bashTemplate), parseTemplate(bashTemplate));
    });

    test("should freeze the descriptor and its body", () => {
      const descriptor = parseTemplate(bashTemplate);

      assert.ok(Object.isFrozen(descriptor));
      assert.ok(Object.isFrozen(descriptor.headers));
      assert.ok(Object.isFrozen(descriptor.body));
      assert.ok(Object.isFrozen(descriptor.body.miscellaneousInfo));
    });

    test("should unescape double-quoted payloads", () => {
      const descriptor = parseTemplate(
        `curl "https://api.example.test/search" --data-raw "{\\"requirementId\\":\\"9\\"}"`
      );

      assert.deepStrictEqual(descriptor.body, { requirementId: "9" });
      assert.strictEqual(descriptor.bodySource, "payload");
    });

    test("should wrap a payload that lacks braces", () => {
      const descriptor = parseTemplate(
        `curl 'https://api.example.test/search' -d '"requirementId":"5"'`
      );

      assert.deepStrictEqual(descriptor.body, { requirementId: "5" });
    });

    test("should accept a method flag before the url", () => {
      const descriptor = parseTemplate(
        `curl -X POST 'https://api.example.test/search' --data-raw '{"requirementId":"1"}'`
      );

      assert.strictEqual(descriptor.url, "https://api.example.test/search");
    });
  });

  describe("Headers", () => {
    test("should keep the first occurrence of a repeated header", () => {
      const descriptor = parseTemplate(
        `curl 'https://api.example.test/search' -H 'accept: text/first' -H 'Accept: text/second'`
      );

      assert.strictEqual(descriptor.headers.accept, "text/first");
    });

    test("should not override template headers with defaults", () => {
      const descriptor = parseTemplate(
        `curl 'https://api.example.test/search' -H 'User-Agent: test-agent'`
      );

      assert.strictEqual(descriptor.headers["user-agent"], "test-agent");
    });

    test("should read the credential from a cookie header when no cookie flag is present", () => {
      const descriptor = parseTemplate(
        `curl 'https://api.example.test/search' -H 'Cookie: token=test-secret'`
      );

      assert.strictEqual(descriptor.credential, "token=test-secret");
      assert.strictEqual(descriptor.headers.cookie, "token=test-secret");
    });

    test("should prefer the cookie flag over a cookie header", () => {
      const descriptor = parseTemplate(
        `curl 'https://api.example.test/search' -H 'cookie: from=header' -b 'from=flag'`
      );

      assert.strictEqual(descriptor.credential, "from=flag");
      assert.strictEqual(descriptor.headers.cookie, "from=flag");
    });

    test("should unescape quotes inside the credential", () => {
      const fromFlag = parseTemplate(
        String.raw`curl 'https://api.example.test/search' -b "a=\"x\""`
      );
      const fromHeader = parseTemplate(
        String.raw`curl 'https://api.example.test/search' -H "cookie: a=\"x\""`
      );

      assert.strictEqual(fromFlag.credential, 'a="x"');
      assert.strictEqual(fromHeader.credential, 'a="x"');
      assert.strictEqual(fromHeader.headers.cookie, 'a="x"');
    });

    test("should leave the credential null when the template has none", () => {
      const descriptor = parseTemplate(`curl 'https://api.example.test/search'`);

      assert.strictEqual(descriptor.credential, null);
      assert.strictEqual(Object.hasOwn(descriptor.headers, "cookie"), false);
    });

    test("should honour a custom skip list", () => {
      const descriptor = parseTemplate(
        `curl 'https://api.example.test/search' -H 'x-trace: keep-out' -H 'x-other: keep'`,
        { skipHeaders: ["x-trace"] }
      );

      assert.strictEqual(Object.hasOwn(descriptor.headers, "x-trace"), false);
      assert.strictEqual(descriptor.headers["x-other"], "keep");
    });
  });

  describe("Malformed templates", () => {
    test("should throw when no url follows curl", () => {
      assert.throws(() => parseTemplate("not a curl command"), MalformedTemplateError);
    });

    test("should throw when the target is not http(s)", () => {
      assert.throws(
        () => parseTemplate(`curl 'ftp://files.example.test/search'`),
        MalformedTemplateError
      );
    });
  });

  describe("Helpers", () => {
    test("normalizeTemplate should fold line continuations", () => {
      assert.strictEqual(
        normalizeTemplate("curl 'https://a.test' \\\n  -H 'a: 1' ^\n -H 'b: 2'"),
        "curl 'https://a.test' -H 'a: 1' -H 'b: 2'"
      );
    });

    test("readSearchIdentity should read nested and numeric identifiers", () => {
      assert.deepStrictEqual(
        readSearchIdentity({
          requirementId: "7",
          miscellaneousInfo: { companyId: "12", rdxUserId: 5 },
        }),
        { requirementId: "7", companyId: 12, rdxUserId: "5", rdxUserName: null }
      );
    });

    test("withHeaders should lower-case overrides and leave the descriptor untouched", () => {
      const descriptor = parseTemplate(`curl 'https://api.example.test/search'`);
      const headers = withHeaders(descriptor, { "X-Transaction-Id": "tx-1" });

      assert.strictEqual(headers["x-transaction-id"], "tx-1");
      assert.strictEqual(Object.hasOwn(descriptor.headers, "x-transaction-id"), false);
    });
  });
});
