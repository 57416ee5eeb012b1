import type { ProvisioningSink } from "@provisioner/core";
import { vi } from "vitest";

export type SinkCall =
  | { readonly method: "installBundle"; readonly uri: string; readonly startLevel: number; readonly start: boolean }
  | {
      readonly method: "applyConfiguration";
      readonly pid: string;
      readonly isFactory: boolean;
      readonly properties: Readonly<Record<string, string>>;
    }
  | { readonly method: "deployFile"; readonly sourceUri: string; readonly destinationFileName: string };

/**
 * ProvisioningSink whose methods are vitest spies. Calls are also kept in
 * `calls`, in the order they arrived.
 */
export class RecordingSink implements ProvisioningSink {
  readonly calls: SinkCall[] = [];

  readonly installBundle = vi.fn((uri: string, startLevel: number, start: boolean): void => {
    this.calls.push({ method: "installBundle", uri, startLevel, start });
  });

  readonly applyConfiguration = vi.fn(
    (pid: string, isFactory: boolean, properties: Readonly<Record<string, string>>): void => {
      this.calls.push({ method: "applyConfiguration", pid, isFactory, properties });
    },
  );

  readonly deployFile = vi.fn((sourceUri: string, destinationFileName: string): void => {
    this.calls.push({ method: "deployFile", sourceUri, destinationFileName });
  });
}
