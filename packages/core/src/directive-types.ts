/**
 * Provisioning directives: the only output of a resolution.
 * A host consumes them in order.
 */

export interface InstallBundleDirective {
  readonly type: "install-bundle";
  readonly uri: string;
  readonly startLevel: number;
  readonly start: boolean;
}

export interface ApplyConfigurationDirective {
  readonly type: "apply-configuration";
  /** Factory PID when `isFactory`, plain PID otherwise */
  readonly pid: string;
  readonly isFactory: boolean;
  readonly properties: Readonly<Record<string, string>>;
}

export interface DeployFileDirective {
  readonly type: "deploy-file";
  readonly sourceUri: string;
  readonly destinationFileName: string;
}

export type ProvisioningDirective =
  | InstallBundleDirective
  | ApplyConfigurationDirective
  | DeployFileDirective;

export type ProvisioningDirectiveType = ProvisioningDirective["type"];
