import { ResolverOptionsError } from "@provisioner/errors";
import { describe, expect, it } from "vitest";
import { parseResolverSettings } from "../../options.js";

describe("parseResolverSettings", () => {
  it("defaults the start level to 60", () => {
    expect(parseResolverSettings()).toEqual({ defaultStartLevel: 60 });
    expect(parseResolverSettings({})).toEqual({ defaultStartLevel: 60 });
  });

  it("keeps valid settings and trims the working directory", () => {
    expect(parseResolverSettings({ defaultStartLevel: 75, workingDirectory: " /srv/runtime " })).toEqual({
      defaultStartLevel: 75,
      workingDirectory: "/srv/runtime",
    });
  });

  it("rejects a start level that is not positive", () => {
    try {
      parseResolverSettings({ defaultStartLevel: 0 });
      throw new Error("expected parseResolverSettings to throw");
    } catch (error: unknown) {
      if (!(error instanceof ResolverOptionsError)) throw error;
      expect(error.optionIssues).toEqual(["defaultStartLevel: Number must be greater than 0"]);
      expect(error.code).toBe("RESOLVER_OPTIONS_INVALID");
    }
  });

  it("rejects a fractional start level", () => {
    expect(() => parseResolverSettings({ defaultStartLevel: 2.5 })).toThrow(ResolverOptionsError);
  });

  it("rejects a blank working directory", () => {
    try {
      parseResolverSettings({ workingDirectory: "   " });
      throw new Error("expected parseResolverSettings to throw");
    } catch (error: unknown) {
      if (!(error instanceof ResolverOptionsError)) throw error;
      expect(error.optionIssues).toEqual(["workingDirectory: must not be empty"]);
    }
  });
});
