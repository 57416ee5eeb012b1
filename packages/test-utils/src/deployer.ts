import type { FileDeployer } from "@provisioner/core";

export interface DeployRecord {
  readonly source: string;
  readonly destination: string;
}

/**
 * FileDeployer that copies nothing. Successful deploys are recorded;
 * destinations ending in a name passed to `failOn` reject instead.
 */
export class RecordingFileDeployer implements FileDeployer {
  readonly deployed: DeployRecord[] = [];
  private readonly failing = new Set<string>();

  failOn(finalName: string): this {
    this.failing.add(finalName);
    return this;
  }

  async deploy(source: URL, destination: string): Promise<void> {
    for (const name of this.failing) {
      if (destination.endsWith(name)) {
        throw new Error(`Simulated copy failure for ${name}`);
      }
    }
    this.deployed.push({ source: source.href, destination });
  }
}
