import { describe, expect, it } from "vitest";
import {
  FileDeployError,
  getErrorMessage,
  isFetchOrParseError,
  isProvisionerError,
  PropertiesParseError,
  ProvisionerError,
  RepositoryFetchError,
  RepositoryLocationError,
  RepositoryParseError,
  RepositoryRootError,
  RepositorySchemaError,
  ResolverOptionsError,
  toError,
  UnsupportedFeatureResolverError,
} from "../../index.js";

describe("ProvisionerError base class", () => {
  it("should derive its fields from the catalog entry", () => {
    const error = new RepositoryFetchError("http://repo.test/f.xml", "connection refused");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ProvisionerError);
    expect(error.message).toBe(
      "Fetching the feature repository from http://repo.test/f.xml failed: connection refused",
    );
    expect(error.name).toBe("RepositoryFetchError");
    expect(error.code).toBe("REPOSITORY_FETCH_FAILED");
    expect(error.httpStatus).toBe(502);
    expect(error.grpcCode).toBe("UNAVAILABLE");
    expect(error.domain).toBe("repository");
    expect(error.isExpected).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should preserve stack traces", () => {
    const error = new PropertiesParseError("bad", 1);
    expect(error.stack).toContain("PropertiesParseError");
  });

  it("should serialize to JSON", () => {
    const cause = new Error("disk gone");
    const error = new FileDeployError("file:/src/a.cfg", "etc/a.cfg", cause);
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "FeatureError",
      name: "FileDeployError",
      code: "FEATURE_FILE_DEPLOY_FAILED",
      message: "The deployment of config file file:/src/a.cfg failed (final name = etc/a.cfg): disk gone",
      domain: "feature",
      httpStatus: 502,
      grpcCode: "UNAVAILABLE",
      isExpected: false,
      metadata: { source: "file:/src/a.cfg", finalName: "etc/a.cfg" },
      cause: "disk gone",
    });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
    expect(error.cause).toBe(cause);
  });

  it("should convert to string with metadata", () => {
    const error = new UnsupportedFeatureResolverError("web", "(obr)");

    expect(error.toString()).toBe(
      "UnsupportedFeatureResolverError [FEATURE_RESOLVER_UNSUPPORTED]: Using resolvers (specified in feature web) is not supported (resolver specified: (obr)), the feature will be ignored" +
        ' {"feature":"web","resolver":"(obr)"}',
    );
  });

  it("should omit the metadata suffix when there is none", () => {
    expect(new PropertiesParseError("bad", 2).toString()).toBe(
      "PropertiesParseError [FEATURE_PROPERTIES_INVALID]: Invalid properties at line 2: bad",
    );
  });
});

describe("domain tags", () => {
  it("tags every error with its domain family", () => {
    const tagged = [
      new RepositoryLocationError("::nope"),
      new RepositoryFetchError("mem://r", "gone"),
      new RepositoryParseError("mem://r", "bad", 1, 1),
      new RepositoryRootError("mem://r", "project"),
      new RepositorySchemaError("mem://r", ["a: Required"]),
      new UnsupportedFeatureResolverError("web", "(obr)"),
      new PropertiesParseError("bad", 1),
      new FileDeployError("file:/a.cfg", "etc/a.cfg"),
      new ResolverOptionsError(["x: Required"]),
    ].map((e) => [e._tag, e.domain]);

    expect(tagged).toEqual([
      ["RepositoryError", "repository"],
      ["RepositoryError", "repository"],
      ["RepositoryError", "repository"],
      ["RepositoryError", "repository"],
      ["RepositoryError", "repository"],
      ["FeatureError", "feature"],
      ["FeatureError", "feature"],
      ["FeatureError", "feature"],
      ["ResolverError", "resolver"],
    ]);
  });

  it("marks malformed input as expected and unreachable sources as unexpected", () => {
    expect(new RepositoryParseError("mem://r", "bad", 1, 1).isExpected).toBe(true);
    expect(new RepositoryParseError("mem://r", "bad", 1, 1).httpStatus).toBe(422);
    expect(new ResolverOptionsError(["x: Required"]).httpStatus).toBe(400);
    expect(new RepositoryFetchError("mem://r", "gone").isExpected).toBe(false);
    expect(new FileDeployError("file:/a.cfg", "etc/a.cfg").isExpected).toBe(false);
  });
});

describe("type guards", () => {
  it("recognises repository load failures and nothing else", () => {
    expect(isFetchOrParseError(new RepositoryParseError("mem://r", "bad", 1, 1))).toBe(true);
    expect(isFetchOrParseError(new RepositoryFetchError("mem://r", "gone"))).toBe(true);
    expect(isFetchOrParseError(new FileDeployError("file:/a.cfg", "etc/a.cfg"))).toBe(false);
    expect(isFetchOrParseError(new UnsupportedFeatureResolverError("web", "(obr)"))).toBe(false);
    expect(isFetchOrParseError(new Error("plain"))).toBe(false);
  });

  it("recognises ProvisionerError instances", () => {
    expect(isProvisionerError(new ResolverOptionsError(["x: Required"]))).toBe(true);
    expect(isProvisionerError(new Error("x"))).toBe(false);
    expect(isProvisionerError("x")).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("reads messages from errors and strings", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("text")).toBe("text");
    expect(getErrorMessage(42)).toBe("An unknown error occurred");
  });
});

describe("toError", () => {
  it("returns errors as-is and wraps anything else", () => {
    const original = new TypeError("boom");
    expect(toError(original)).toBe(original);
    expect(toError("text")).toEqual(new Error("text"));
    expect(toError(undefined).message).toBe("An unknown error occurred");
  });
});
