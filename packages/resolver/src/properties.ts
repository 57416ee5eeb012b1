/**
 * Reader for the `key=value` text of a `<config>` block.
 *
 * Follows the java.util.Properties line format: `#` and `!` comments,
 * `=`, `:` or whitespace between key and value, backslash continuation,
 * and the `\t \n \r \f \uXXXX` escapes. Later keys overwrite earlier ones.
 */

import { PropertiesParseError } from "@provisioner/errors";

const BLANKS = new Set([" ", "\t", "\f"]);
const SEPARATORS = new Set(["=", ":"]);
const HEX4 = /^[0-9a-fA-F]{4}$/;

export function parseProperties(text: string): Record<string, string> {
  const properties = new Map<string, string>();
  const lines = text.split(/\r\n|\r|\n/);

  let index = 0;
  while (index < lines.length) {
    const lineNumber = index + 1;
    let logical = stripLeadingBlanks(lines[index] ?? "");
    index++;

    if (logical.length === 0 || logical.startsWith("#") || logical.startsWith("!")) {
      continue;
    }

    while (endsWithContinuation(logical)) {
      logical = logical.slice(0, -1);
      if (index >= lines.length) break;
      logical += stripLeadingBlanks(lines[index] ?? "");
      index++;
    }

    const { key, value } = splitEntry(logical);
    properties.set(unescape(key, lineNumber), unescape(value, lineNumber));
  }

  return Object.fromEntries(properties);
}

function stripLeadingBlanks(line: string): string {
  let start = 0;
  while (start < line.length && BLANKS.has(line.charAt(start))) start++;
  return line.slice(start);
}

/** An odd run of trailing backslashes joins the next line. */
function endsWithContinuation(line: string): boolean {
  let count = 0;
  for (let i = line.length - 1; i >= 0 && line.charAt(i) === "\\"; i--) count++;
  return count % 2 === 1;
}

function splitEntry(line: string): { key: string; value: string } {
  let keyEnd = 0;
  while (keyEnd < line.length) {
    const c = line.charAt(keyEnd);
    if (c === "\\") {
      keyEnd += 2;
      continue;
    }
    if (SEPARATORS.has(c) || BLANKS.has(c)) break;
    keyEnd++;
  }
  keyEnd = Math.min(keyEnd, line.length);

  let valueStart = keyEnd;
  while (valueStart < line.length && BLANKS.has(line.charAt(valueStart))) valueStart++;
  if (valueStart < line.length && SEPARATORS.has(line.charAt(valueStart))) {
    valueStart++;
    while (valueStart < line.length && BLANKS.has(line.charAt(valueStart))) valueStart++;
  }

  return { key: line.slice(0, keyEnd), value: line.slice(valueStart) };
}

function unescape(raw: string, lineNumber: number): string {
  let out = "";
  for (let i = 0; i < raw.length; i++) {
    const c = raw.charAt(i);
    if (c !== "\\") {
      out += c;
      continue;
    }
    i++;
    if (i >= raw.length) break;
    const escaped = raw.charAt(i);
    switch (escaped) {
      case "t":
        out += "\t";
        break;
      case "n":
        out += "\n";
        break;
      case "r":
        out += "\r";
        break;
      case "f":
        out += "\f";
        break;
      case "u": {
        const hex = raw.slice(i + 1, i + 5);
        if (!HEX4.test(hex)) {
          throw new PropertiesParseError("Malformed \\uxxxx encoding", lineNumber);
        }
        out += String.fromCharCode(Number.parseInt(hex, 16));
        i += 4;
        break;
      }
      default:
        out += escaped;
    }
  }
  return out;
}
