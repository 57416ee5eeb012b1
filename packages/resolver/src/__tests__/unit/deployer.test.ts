import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InMemoryResourceFetcher } from "@provisioner/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeFileDeployer } from "../../deployer.js";

describe("NodeFileDeployer", () => {
  let tmpDir: string;
  let fetcher: InMemoryResourceFetcher;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "provisioner-deployer-"));
    fetcher = new InMemoryResourceFetcher({ "mem://files/app.cfg": "port=8080" });
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("writes the fetched bytes, creating parent directories", async () => {
    const destination = join(tmpDir, "etc", "app.cfg");

    await new NodeFileDeployer(fetcher).deploy(new URL("mem://files/app.cfg"), destination);

    expect(await readFile(destination, "utf-8")).toBe("port=8080");
    expect(fetcher.requests).toEqual(["mem://files/app.cfg"]);
  });

  it("truncates an existing destination", async () => {
    const destination = join(tmpDir, "etc", "app.cfg");
    await mkdir(join(tmpDir, "etc"));
    await writeFile(destination, "an older and much longer configuration", "utf-8");

    await new NodeFileDeployer(fetcher).deploy(new URL("mem://files/app.cfg"), destination);

    expect(await readFile(destination, "utf-8")).toBe("port=8080");
  });

  it("propagates fetch failures", async () => {
    await expect(
      new NodeFileDeployer(fetcher).deploy(new URL("mem://files/absent.cfg"), join(tmpDir, "absent.cfg")),
    ).rejects.toThrow("No resource at mem://files/absent.cfg");
  });
});
