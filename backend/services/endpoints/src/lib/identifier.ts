// backend/services/endpoints/src/lib/identifier.ts
import { InvalidIdentifierError } from "../errors";

/** Lowercase letter, then one or more of [a-z0-9-]. */
export const IDENTIFIER_PATTERN = /^[a-z][-a-z0-9]+$/;

const RESOURCE_PATH_RAW = "^/endpoints/([a-z][-a-z0-9]+)$";
const RESOURCE_PATH = new RegExp(RESOURCE_PATH_RAW);

export function isIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

/**
 * Extract `<id>` from `/endpoints/<id>`.
 * Throws InvalidIdentifierError (with the rejected path and the grammar) when
 * the path has any other shape.
 */
export function extractIdentifier(path: string): string {
  const match = RESOURCE_PATH.exec(path);
  if (!match) {
    throw new InvalidIdentifierError(path, RESOURCE_PATH_RAW);
  }
  return match[1];
}
