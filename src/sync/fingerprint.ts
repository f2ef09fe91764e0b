/**
 * Identity of an item's text, independent of the remote id: "  Oat  MILK " and
 * "oat milk" share a fingerprint.
 */
export function fingerprint(text: string): string {
  return text.normalize('NFKC').trim().toLowerCase().replace(/\s+/g, ' ');
}
