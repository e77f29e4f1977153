import { METADATA_SEPARATOR } from "../constants.js";
import { ConversionError } from "../errors.js";

/**
 * Drops the bibliographic block Aozora Bunko files open with: the text between
 * the first two lines of 55 hyphens, separators included. Only the text before
 * the first separator and the text between the second and third is kept.
 *
 * @throws {ConversionError} ERR_METADATA_BLOCK_MISSING when the document has
 *   fewer than two separator lines.
 */
export function trimMetadata(document: string): string {
  const segments = document.split(METADATA_SEPARATOR);
  const [head, , body] = segments;
  if (body === undefined) {
    throw new ConversionError(
      `expected two separator lines of 55 hyphens around the metadata block, found ${segments.length - 1}`,
      "ERR_METADATA_BLOCK_MISSING"
    );
  }
  return head + body;
}
