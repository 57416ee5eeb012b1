/**
 * Builders for feature repository XML used across test suites.
 * Text and attribute values are escaped; element content is joined as given.
 */

const FEATURES_NAMESPACE = "http://karaf.apache.org/xmlns/features/v1.0.0";

function escapeText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

function attributes(attrs: Readonly<Record<string, string | number | boolean | undefined>>): string {
  return Object.entries(attrs)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([key, value]) => ` ${key}="${escapeAttribute(String(value))}"`)
    .join("");
}

export function featuresXml(name: string | undefined, ...children: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<features${attributes({ name, xmlns: FEATURES_NAMESPACE })}>
${children.join("\n")}
</features>
`;
}

export function repositoryXml(location: string): string {
  return `  <repository>${escapeText(location)}</repository>`;
}

export interface FeatureXmlAttributes {
  readonly name: string;
  readonly version?: string;
  readonly resolver?: string;
  readonly description?: string;
}

export function featureXml(attrs: FeatureXmlAttributes, ...content: string[]): string {
  return `  <feature${attributes({ ...attrs })}>
${content.join("\n")}
  </feature>`;
}

export function bundleXml(
  uri: string,
  attrs: { readonly startLevel?: number | string; readonly start?: boolean | string; readonly dependency?: boolean | string } = {},
): string {
  const attributeText = attributes({
    "start-level": attrs.startLevel,
    start: attrs.start,
    dependency: attrs.dependency,
  });
  return `    <bundle${attributeText}>${escapeText(uri)}</bundle>`;
}

export function configXml(pid: string, propertiesText: string): string {
  return `    <config name="${escapeAttribute(pid)}">${escapeText(propertiesText)}</config>`;
}

export function configFileXml(finalName: string, source: string): string {
  return `    <configfile finalname="${escapeAttribute(finalName)}">${escapeText(source)}</configfile>`;
}

export function dependencyXml(name: string, version?: string): string {
  return `    <feature${attributes({ version })}>${escapeText(name)}</feature>`;
}

export function detailsXml(text: string): string {
  return `    <details>${escapeText(text)}</details>`;
}
