/**
 * @provisioner/repository
 *
 * Feature repository loader: fetches descriptors from file paths or URLs,
 * parses the XML feature schema, validates it with Zod, and returns
 * frozen RepositoryRecord objects.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export {
  loadRepository,
  RepositoryLoader,
  type RepositoryLoaderOptions,
} from "./loader.js";
export { createXmlDescriptorParser, REPOSITORY_ROOT_ELEMENT } from "./xml-parser.js";
export { NodeResourceFetcher, type NodeResourceFetcherOptions } from "./fetcher.js";
export { toLocationUrl } from "./location.js";

// ============================================================================
// SCHEMA
// ============================================================================

export {
  BundleContentSchema,
  ConfigContentSchema,
  ConfigFileContentSchema,
  DependencyContentSchema,
  DetailsContentSchema,
  FeatureContentSchema,
  FeatureSchema,
  RepositoryEntrySchema,
  RepositoryRecordSchema,
} from "./schema.js";

// ============================================================================
// UTILITIES
// ============================================================================

export { deepFreeze } from "./freeze.js";
export { normalizeRepository, readNodes, type XmlElement } from "./normalize.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@provisioner/repository";
export const PACKAGE_VERSION = "0.1.0";
