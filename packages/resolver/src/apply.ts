import type { ProvisioningDirective, ProvisioningSink } from "@provisioner/core";

/**
 * Hands each directive to the sink, in order, waiting for each one.
 * A sink failure propagates; nothing is retried.
 */
export async function applyDirectives(
  directives: readonly ProvisioningDirective[],
  sink: ProvisioningSink,
): Promise<void> {
  for (const directive of directives) {
    switch (directive.type) {
      case "install-bundle":
        await sink.installBundle(directive.uri, directive.startLevel, directive.start);
        break;
      case "apply-configuration":
        await sink.applyConfiguration(directive.pid, directive.isFactory, directive.properties);
        break;
      case "deploy-file":
        await sink.deployFile(directive.sourceUri, directive.destinationFileName);
        break;
      default: {
        const unreachable: never = directive;
        throw new Error(`Unknown directive: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
