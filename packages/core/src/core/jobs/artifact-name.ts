export const UNSAFE_FILENAME_CHARACTERS = /[:/\\?*&"<>|]/g;

const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;

export const sanitizeAddress = (address: string): string =>
  address.replace(SCHEME_PREFIX, "").replace(UNSAFE_FILENAME_CHARACTERS, "_");

/**
 * `{index}_{sanitized host and path}.png`. The index prefix keeps names
 * distinct when two addresses sanitise to the same string.
 */
export const buildArtifactName = (address: string, index: number): string =>
  `${index}_${sanitizeAddress(address)}.png`;
