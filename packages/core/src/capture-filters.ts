/**
 * Heavy binaries that are aborted before they reach the network. The
 * screenshot records layout, so these only cost load time.
 */
export const HEAVY_MEDIA_EXTENSIONS = new Set<string>([
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".svg",
  ".webp",
  ".ico",
  ".woff",
  ".woff2",
  ".ttf",
  ".otf",
  ".mp3",
  ".wav",
  ".mp4",
  ".webm",
  ".avi",
  ".mov",
]);

/**
 * Return true when the URL's path ends in a blocked extension. Query strings
 * and fragments are ignored because we look at `pathname` only.
 */
export const isHeavyMedia = (url: URL): boolean => {
  const pathname = url.pathname;
  const dotIndex = pathname.lastIndexOf(".");
  if (dotIndex === -1 || dotIndex < pathname.lastIndexOf("/")) {
    return false;
  }

  const extension = pathname.slice(dotIndex).toLowerCase();
  return HEAVY_MEDIA_EXTENSIONS.has(extension);
};

export const shouldAbortRequest = (rawUrl: string): boolean => {
  try {
    return isHeavyMedia(new URL(rawUrl));
  } catch {
    return false;
  }
};
