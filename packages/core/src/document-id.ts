/**
 * Document identifiers are ObjectIds written as 24 hexadecimal characters.
 */
const DOCUMENT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

export function isDocumentId(value: string): boolean {
  return DOCUMENT_ID_PATTERN.test(value);
}
