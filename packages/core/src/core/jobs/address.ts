import { AddressError } from "../../errors.js";

export const SUPPORTED_SCHEMES = new Set<string>(["http", "https"]);

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

/**
 * Turn raw input into an Address: trimmed, and always carrying an explicit
 * `http://` or `https://` scheme. Bare hosts get `https://`. The rest of the
 * string is kept verbatim so artifact names stay predictable.
 */
export const normalizeAddress = (raw: string): string => {
  const trimmed = raw.trim();
  if (trimmed === "") {
    throw new AddressError("Address is empty", "empty");
  }

  const scheme = SCHEME_PATTERN.exec(trimmed)?.[1]?.toLowerCase();
  if (scheme === undefined) {
    return `https://${trimmed}`;
  }

  if (!SUPPORTED_SCHEMES.has(scheme)) {
    throw new AddressError(
      `Unsupported address scheme: ${scheme}://`,
      "unsupported_protocol",
      trimmed,
    );
  }

  return trimmed;
};

export interface AddressListResult {
  addresses: string[];
  /** Entries dropped because the list exceeded the batch limit. */
  truncated: number;
}

/**
 * Normalise a list of raw entries, skipping blanks and keeping duplicates:
 * every entry becomes its own capture task.
 */
export const normalizeAddressList = (
  raws: readonly string[],
  options: { limit: number },
): AddressListResult => {
  const nonBlank = raws.filter((entry) => entry.trim() !== "");
  const kept = nonBlank.slice(0, options.limit);

  return {
    addresses: kept.map(normalizeAddress),
    truncated: nonBlank.length - kept.length,
  };
};

export const parsePastedAddresses = (
  text: string,
  options: { limit: number },
): AddressListResult => normalizeAddressList(text.split(/\r?\n/), options);
