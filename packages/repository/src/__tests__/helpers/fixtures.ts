/**
 * Feature repository XML fixtures for loader and parser tests.
 */

import {
  bundleXml,
  configFileXml,
  configXml,
  dependencyXml,
  detailsXml,
  featureXml,
  featuresXml,
  repositoryXml,
} from "@provisioner/test-utils";

export const MINIMAL_XML = featuresXml("minimal");

export const FULL_XML = featuresXml(
  "full",
  featureXml(
    { name: "core", version: "1.2.0", description: "Core runtime" },
    detailsXml("Installs the core runtime"),
    dependencyXml("logging", "2.0.0"),
    bundleXml("mvn:org.example/core-api/1.2.0"),
    bundleXml("mvn:org.example/core-impl/1.2.0", { startLevel: 40, start: false }),
    configXml("org.example.core", "threads=4\nmode=fast"),
    configFileXml("etc/core.cfg", "file:/opt/core/core.cfg"),
  ),
  repositoryXml("mem://repo/nested.xml"),
  featureXml({ name: "web", resolver: "(obr)" }, bundleXml("mvn:org.example/web/1.0.0")),
);

export const NOT_WELL_FORMED_XML = `<features name="broken">
  <feature name="core">
    <bundle>mvn:a/b/1</bundle>
</features>
`;

export const WRONG_ROOT_XML = `<?xml version="1.0"?>
<project><name>not a repository</name></project>
`;

export const BAD_START_LEVEL_XML = featuresXml(
  "bad",
  featureXml({ name: "core" }, bundleXml("mvn:a/b/1", { startLevel: "early" })),
);

export const UNKNOWN_ELEMENT_XML = `<features name="odd">
  <feature name="core">
    <capability>osgi.service</capability>
  </feature>
</features>
`;

export const PREFIXED_XML = `<?xml version="1.0"?>
<f:features xmlns:f="http://karaf.apache.org/xmlns/features/v1.0.0" name="prefixed">
  <f:feature name="core" version="1.0.0">
    <f:bundle start-level="20">mvn:a/b/1</f:bundle>
  </f:feature>
</f:features>
`;
