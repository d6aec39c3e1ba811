import { directoryOf, formatPathname } from "./utils/pathname";

const passthroughReference = /^(https?:\/\/|data:|blob:|mailto:|javascript:|#)/i;
const nonRoutableReference = /^(data:|blob:|mailto:|javascript:|#)/i;

type ResolvableBase = {
  scheme: string;
  authority: string;
  pathname: string;
};

const parseBase = (base: string): ResolvableBase | null => {
  let parsed: URL;
  try {
    parsed = new URL(base);
  } catch {
    return null;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;
  if (!parsed.hostname) return null;

  return {
    scheme: parsed.protocol.slice(0, -1),
    authority: parsed.host,
    pathname: parsed.pathname || "/",
  };
};

const splitSuffix = (reference: string): [path: string, suffix: string] => {
  const index = reference.search(/[?#]/);
  if (index === -1) return [reference, ""];
  return [reference.slice(0, index), reference.slice(index)];
};

/**
 * Whether a reference should be routed through the proxy at all.
 * `data:`, `blob:`, `mailto:`, `javascript:` and fragment-only references
 * are left as they are.
 */
export const isRoutableReference = (reference: string): boolean =>
  !nonRoutableReference.test(reference.trim());

/**
 * Resolves `reference` against an absolute http(s) `base`.
 *
 * Absolute and non-routable references come back unchanged, and so does any
 * reference when the base has no usable scheme or host. The query string and
 * fragment of a relative reference are carried over; only the path is
 * normalized.
 */
export const resolveUrl = (reference: string, base: string): string => {
  const trimmed = reference.trim();
  if (passthroughReference.test(trimmed)) return trimmed;

  const baseParts = parseBase(base);
  if (!baseParts) return trimmed;

  if (trimmed.startsWith("//")) {
    return `${baseParts.scheme}:${trimmed}`;
  }

  const [path, suffix] = splitSuffix(trimmed);

  let workingPath: string;
  if (trimmed === "") {
    workingPath = "/";
  } else if (path === "") {
    // "?page=2" keeps the current document
    workingPath = baseParts.pathname;
  } else if (path.startsWith("/")) {
    workingPath = path;
  } else {
    workingPath = directoryOf(baseParts.pathname) + path;
  }

  return `${baseParts.scheme}://${baseParts.authority}${formatPathname(workingPath)}${suffix}`;
};
