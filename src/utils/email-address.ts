export const UNKNOWN_SENDER = 'unknown@unknown';

export interface ParsedAddress {
  address: string;
  displayName?: string;
}

const ADDRESS_PATTERN = /^[^\s@<>()",;:]+@[^\s@<>()",;:]+$/;

function cleanDisplayName(raw: string): string | undefined {
  const name = raw.trim().replace(/^"(.*)"$/, '$1').trim();
  return name.length > 0 ? name : undefined;
}

/**
 * Parses a From header value into its lowercase `local@domain` part.
 * Handles: "Name <a@b.com>", "<a@b.com>", "a@b.com", "a@b.com (Name)".
 * Returns undefined when no address can be found.
 */
export function parseFromHeader(value: string | undefined): ParsedAddress | undefined {
  if (!value) return undefined;

  const angle = value.match(/^(.*?)<([^<>]*)>/);
  if (angle) {
    const address = angle[2].trim().toLowerCase();
    if (!ADDRESS_PATTERN.test(address)) return undefined;
    return { address, displayName: cleanDisplayName(angle[1]) };
  }

  // Bare form, possibly followed by a (comment) or more addresses
  const bare = value.replace(/\([^)]*\)/g, ' ').split(',')[0].trim().toLowerCase();
  return ADDRESS_PATTERN.test(bare) ? { address: bare } : undefined;
}

export function localPart(address: string): string {
  const at = address.lastIndexOf('@');
  return at === -1 ? address : address.slice(0, at);
}
