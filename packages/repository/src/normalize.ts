/**
 * Converts the order-preserving node list produced by fast-xml-parser into
 * plain element trees, and those into the raw repository shape the Zod
 * schema validates.
 *
 * Never throws for unexpected content: unknown elements and missing
 * attributes are passed through for the schema to report.
 */

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

export interface XmlElement {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlElement[];
  /** Concatenated text content, whitespace kept */
  readonly text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === "string") {
      attributes[key] = raw.trim();
    } else if (typeof raw === "number" || typeof raw === "boolean") {
      attributes[key] = String(raw);
    }
  }
  return attributes;
}

/**
 * Reads an ordered node list into elements. Text nodes at this level are
 * returned separately so the caller can attach them to the parent.
 */
export function readNodes(nodes: unknown): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = [];
  const textParts: string[] = [];
  if (!Array.isArray(nodes)) {
    return { elements, text: "" };
  }

  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tag = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
    if (tag === undefined) continue;

    if (tag === TEXT_KEY) {
      const value = node[TEXT_KEY];
      if (typeof value === "string" || typeof value === "number") {
        textParts.push(String(value));
      }
      continue;
    }
    // Declarations and processing instructions
    if (tag.startsWith("?")) continue;

    const inner = readNodes(node[tag]);
    elements.push({
      name: tag,
      attributes: readAttributes(node[ATTRIBUTES_KEY]),
      children: inner.elements,
      text: inner.text,
    });
  }

  return { elements, text: textParts.join("") };
}

function normalizeContent(element: XmlElement): Record<string, unknown> {
  switch (element.name) {
    case "feature":
      return {
        kind: "dependency",
        name: element.text.trim(),
        version: element.attributes.version,
      };
    case "bundle":
      return {
        kind: "bundle",
        location: element.text.trim(),
        startLevel: element.attributes["start-level"],
        start: element.attributes.start,
        dependency: element.attributes.dependency,
      };
    case "config":
      return {
        kind: "config",
        pid: element.attributes.name,
        // Verbatim: trailing whitespace can belong to a property value.
        propertiesText: element.text,
      };
    case "configfile":
      return {
        kind: "configfile",
        source: element.text.trim(),
        finalName: element.attributes.finalname,
      };
    case "details":
      return { kind: "details", text: element.text.trim() };
    default:
      return { kind: element.name };
  }
}

function normalizeEntry(element: XmlElement): Record<string, unknown> {
  switch (element.name) {
    case "repository":
      return { kind: "repository", location: element.text.trim() };
    case "feature":
      return {
        kind: "feature",
        feature: {
          name: element.attributes.name,
          version: element.attributes.version,
          resolver: element.attributes.resolver,
          description: element.attributes.description,
          content: element.children.map(normalizeContent),
        },
      };
    default:
      return { kind: element.name };
  }
}

/**
 * Maps a `<features>` root element onto the raw repository shape.
 * Always returns a new object.
 */
export function normalizeRepository(root: XmlElement): Record<string, unknown> {
  return {
    name: root.attributes.name,
    entries: root.children.map(normalizeEntry),
  };
}
