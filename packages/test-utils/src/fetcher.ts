import type { ResourceFetcher } from "@provisioner/core";

/**
 * In-memory ResourceFetcher for tests.
 *
 * Resources are keyed by normalized URL (`new URL(location).href`), so
 * `mem://repo/a.xml` and its parsed form refer to the same entry. Every
 * fetch is recorded in `requests`, in order.
 *
 * @example
 * ```typescript
 * const fetcher = new InMemoryResourceFetcher({ "mem://repo/root.xml": xml });
 * const loader = new RepositoryLoader({ fetcher });
 * ```
 */
export class InMemoryResourceFetcher implements ResourceFetcher {
  readonly requests: string[] = [];
  private readonly resources = new Map<string, string>();
  private readonly failures = new Map<string, Error>();

  constructor(resources?: Readonly<Record<string, string>>) {
    for (const [location, content] of Object.entries(resources ?? {})) {
      this.set(location, content);
    }
  }

  set(location: string, content: string): this {
    this.resources.set(new URL(location).href, content);
    return this;
  }

  /** Make every fetch of `location` reject with `error`. */
  fail(location: string, error: Error): this {
    this.failures.set(new URL(location).href, error);
    return this;
  }

  async fetch(location: URL): Promise<Uint8Array> {
    this.requests.push(location.href);

    const failure = this.failures.get(location.href);
    if (failure !== undefined) {
      throw failure;
    }

    const content = this.resources.get(location.href);
    if (content === undefined) {
      throw new Error(`No resource at ${location.href}`);
    }
    return new TextEncoder().encode(content);
  }
}
