import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { FileDeployer, ResourceFetcher } from "@provisioner/core";
import { NodeResourceFetcher } from "@provisioner/repository";

/**
 * Copies a config file into place: bytes come from the fetcher, the
 * destination is created (with its parent directories) or truncated.
 */
export class NodeFileDeployer implements FileDeployer {
  constructor(private readonly fetcher: ResourceFetcher = new NodeResourceFetcher()) {}

  async deploy(source: URL, destination: string): Promise<void> {
    const bytes = await this.fetcher.fetch(source);
    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, bytes);
  }
}
