// encodeURIComponent leaves !'()* alone; escape them too so a link is safe
// inside url(...) tokens and srcset lists.
export const encodeQueryComponent = (value: string): string =>
  encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );

/** Wraps an absolute target into a link that re-enters the proxy at `scriptPath`. */
export const encodeProxyLink = (target: string, scriptPath: string): string =>
  `${scriptPath}?url=${encodeQueryComponent(target)}`;

/** Reads the target back out of a proxy link, or null when it carries none. */
export const decodeProxyLink = (link: string): string | null => {
  const index = link.indexOf("?");
  if (index === -1) return null;
  return new URLSearchParams(link.slice(index + 1)).get("url");
};
