export const PACKAGE_NAME = "@provisioner/test-utils" as const;

export { type DeployRecord, RecordingFileDeployer } from "./deployer.js";
export {
  bundleXml,
  configFileXml,
  configXml,
  dependencyXml,
  detailsXml,
  type FeatureXmlAttributes,
  featureXml,
  featuresXml,
  repositoryXml,
} from "./descriptors.js";
export { InMemoryResourceFetcher } from "./fetcher.js";
export { type LogLine, RecordingLogger } from "./logger.js";
export { RecordingSink, type SinkCall } from "./sink.js";
