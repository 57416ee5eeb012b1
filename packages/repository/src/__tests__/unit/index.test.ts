import { describe, expect, it } from "vitest";
import * as repository from "../../index.js";

describe("@provisioner/repository exports", () => {
  it("exports PACKAGE_NAME", () => {
    expect(repository.PACKAGE_NAME).toBe("@provisioner/repository");
  });

  it("exports the loader API", () => {
    expect(typeof repository.loadRepository).toBe("function");
    expect(typeof repository.RepositoryLoader).toBe("function");
    expect(typeof repository.createXmlDescriptorParser).toBe("function");
    expect(typeof repository.toLocationUrl).toBe("function");
  });

  it("exports RepositoryRecordSchema", () => {
    expect(typeof repository.RepositoryRecordSchema.safeParse).toBe("function");
  });

  it("names the expected root element", () => {
    expect(repository.REPOSITORY_ROOT_ELEMENT).toBe("features");
  });
});
