/**
 * XML DescriptorParser for feature repositories.
 *
 * Pipeline:
 * 1. Check well-formedness (line/column on failure)
 * 2. Parse into an order-preserving node list
 * 3. Require a `features` root element
 * 4. Normalize elements into the raw repository shape
 * 5. Validate with Zod
 * 6. Deep freeze
 *
 * The parser holds only immutable options, so one instance can serve any
 * number of loads. Each `parse` call is synchronous and self-contained.
 */

import type { DescriptorParser, RepositoryRecord } from "@provisioner/core";
import { RepositoryParseError, RepositoryRootError, RepositorySchemaError } from "@provisioner/errors";
import { XMLParser, XMLValidator, type X2jOptions } from "fast-xml-parser";

import { deepFreeze } from "./freeze.js";
import { normalizeRepository, readNodes } from "./normalize.js";
import { RepositoryRecordSchema } from "./schema.js";

export const REPOSITORY_ROOT_ELEMENT = "features";

const XML_OPTIONS: Partial<X2jOptions> = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  // Text is trimmed per element in normalize.ts; <config> bodies stay verbatim.
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
};

export function createXmlDescriptorParser(): DescriptorParser {
  const xmlParser = new XMLParser(XML_OPTIONS);

  return {
    parse(content: string, location: string): RepositoryRecord {
      const validation = XMLValidator.validate(content);
      if (validation !== true) {
        const { msg, line, col } = validation.err;
        throw new RepositoryParseError(location, msg, line, col);
      }

      let parsed: unknown;
      try {
        parsed = xmlParser.parse(content);
      } catch (error: unknown) {
        throw new RepositoryParseError(
          location,
          error instanceof Error ? error.message : String(error),
          undefined,
          undefined,
          error instanceof Error ? error : undefined,
        );
      }

      const [root] = readNodes(parsed).elements;
      if (root?.name !== REPOSITORY_ROOT_ELEMENT) {
        throw new RepositoryRootError(location, root?.name);
      }

      const result = RepositoryRecordSchema.safeParse(normalizeRepository(root));
      if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
        throw new RepositorySchemaError(location, issues, result.error);
      }

      return deepFreeze(result.data);
    },
  };
}
