export const formatPathname = (pathname: string): string => {
  const retained: string[] = [];
  const segments = pathname.split("/");

  for (const segment of segments) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      retained.pop();
      continue;
    }
    retained.push(segment);
  }

  // Keep directory-ness: "/v2/" and "/a/b/.." both name a directory.
  const last = segments[segments.length - 1];
  const isDirectory = last === "" || last === "." || last === "..";
  const joined = "/" + retained.join("/");
  return isDirectory && retained.length > 0 ? joined + "/" : joined;
};

export const directoryOf = (pathname: string): string => {
  const index = pathname.lastIndexOf("/");
  return index === -1 ? "/" : pathname.slice(0, index + 1);
};

// Request URI up to the query string.
export const scriptPathOf = (requestUri: string): string => {
  const index = requestUri.indexOf("?");
  const path = index === -1 ? requestUri : requestUri.slice(0, index);
  return path || "/";
};
