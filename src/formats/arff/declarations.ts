/**
 * `@relation` and `@attribute` directive parsing
 *
 * @module formats/arff/declarations
 */

import { FORMAT_NAME, TYPE_KEYWORDS } from "../../constants";
import { ParseError } from "../../errors";
import { stripQuotes } from "../../schema";
import type { AttributeDeclaration } from "./types";

/**
 * Declaration tokens: a bare identifier, a brace-delimited value list, or a
 * single- or double-quoted string. The leading `@` of the directive is not
 * matched, so the directive keyword is token 0.
 */
const DECLARATION_TOKEN = /[a-zA-Z_][a-zA-Z0-9_\-[\]]*|\{[^}]*\}|'[^']+'|"[^"]+"/g;

/**
 * Split a declaration line into its tokens
 */
export function tokenizeDeclaration(line: string): string[] {
  return (line.match(DECLARATION_TOKEN) ?? []).map((token) => token.trim());
}

/**
 * Relation name: the second whitespace-separated token
 */
export function parseRelation(line: string, lineNumber?: number): string {
  const name = line.trim().split(/\s+/)[1];
  if (name === undefined) {
    throw new ParseError("Missing relation name", FORMAT_NAME, lineNumber, line);
  }
  return name;
}

/**
 * Parse an `@attribute <name> <kind-or-{values}> [<extra>]` declaration
 *
 * @throws {ParseError} For an unsupported kind or a truncated declaration
 *
 * @example
 * ```typescript
 * parseAttributeDeclaration("@attribute outlook {sunny, rainy}");
 * // { name: "outlook", kind: "nominal", data: ["sunny", "rainy"] }
 * ```
 */
export function parseAttributeDeclaration(line: string, lineNumber?: number): AttributeDeclaration {
  const tokens = tokenizeDeclaration(line);
  const rawName = tokens[1];
  const kindToken = tokens[2];

  if (rawName === undefined || kindToken === undefined) {
    throw new ParseError("Incomplete attribute declaration", FORMAT_NAME, lineNumber, line);
  }

  const name = stripQuotes(rawName);
  const keyword = kindToken.toLowerCase();

  switch (keyword) {
    case TYPE_KEYWORDS.integer:
      return { name, kind: "integer" };
    case TYPE_KEYWORDS.real:
    case TYPE_KEYWORDS.numeric:
      return { name, kind: "numeric" };
    case TYPE_KEYWORDS.string:
      return { name, kind: "string" };
    case TYPE_KEYWORDS.date: {
      const pattern = tokens[3];
      return pattern === undefined
        ? { name, kind: "date" }
        : { name, kind: "date", data: stripQuotes(pattern) };
    }
  }

  if (kindToken.startsWith("{") && kindToken.endsWith("}")) {
    // No support for escaped commas or nested braces inside the list
    const values = kindToken
      .slice(1, -1)
      .split(",")
      .map((value) => value.trim());
    return { name, kind: "nominal", data: values };
  }

  throw new ParseError(
    `Unsupported type ${kindToken} for attribute ${name}.`,
    FORMAT_NAME,
    lineNumber,
    line
  );
}
