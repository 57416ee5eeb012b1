import type { ProvisioningDirective, ProvisioningSink } from "@provisioner/core";
import { RecordingSink } from "@provisioner/test-utils";
import { describe, expect, it } from "vitest";
import { applyDirectives } from "../../apply.js";

const DIRECTIVES: readonly ProvisioningDirective[] = [
  { type: "install-bundle", uri: "mvn:a/b/1", startLevel: 60, start: true },
  { type: "apply-configuration", pid: "org.example", isFactory: false, properties: { a: "1" } },
  { type: "deploy-file", sourceUri: "file:/opt/app.cfg", destinationFileName: "etc/app.cfg" },
];

describe("applyDirectives", () => {
  it("hands every directive to the sink in order", async () => {
    const sink = new RecordingSink();

    await applyDirectives(DIRECTIVES, sink);

    expect(sink.calls).toEqual([
      { method: "installBundle", uri: "mvn:a/b/1", startLevel: 60, start: true },
      { method: "applyConfiguration", pid: "org.example", isFactory: false, properties: { a: "1" } },
      { method: "deployFile", sourceUri: "file:/opt/app.cfg", destinationFileName: "etc/app.cfg" },
    ]);
  });

  it("waits for each asynchronous call before the next", async () => {
    const order: string[] = [];
    const sink: ProvisioningSink = {
      installBundle: async (uri) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(`install ${uri}`);
      },
      applyConfiguration: (pid) => {
        order.push(`configure ${pid}`);
      },
      deployFile: async (sourceUri) => {
        order.push(`deploy ${sourceUri}`);
      },
    };

    await applyDirectives(DIRECTIVES, sink);

    expect(order).toEqual(["install mvn:a/b/1", "configure org.example", "deploy file:/opt/app.cfg"]);
  });

  it("stops at the first sink failure", async () => {
    const sink = new RecordingSink();
    sink.installBundle.mockImplementationOnce(() => {
      throw new Error("host refused the bundle");
    });

    await expect(applyDirectives(DIRECTIVES, sink)).rejects.toThrow("host refused the bundle");
    expect(sink.applyConfiguration).not.toHaveBeenCalled();
    expect(sink.deployFile).not.toHaveBeenCalled();
  });

  it("does nothing for an empty list", async () => {
    const sink = new RecordingSink();

    await applyDirectives([], sink);

    expect(sink.calls).toEqual([]);
  });
});
