export type PresentedCredentials =
  | { readonly scheme: "basic"; readonly username: string; readonly password: string }
  | { readonly scheme: "bearer"; readonly token: string };

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Parses an `Authorization` header value. Returns undefined for anything that is not a well-formed
 * Basic or Bearer credential; the scheme name is case-insensitive.
 */
export const extractCredentials = (authorization: string | null | undefined): PresentedCredentials | undefined => {
  const value = authorization?.trim();
  if (!value) {
    return undefined;
  }

  const separator = value.search(/\s/);
  if (separator <= 0) {
    return undefined;
  }
  const scheme = value.slice(0, separator).toLowerCase();
  const parameter = value.slice(separator).trim();
  if (!parameter) {
    return undefined;
  }

  if (scheme === "bearer") {
    return { scheme: "bearer", token: parameter };
  }

  if (scheme === "basic") {
    if (!BASE64_PATTERN.test(parameter)) {
      return undefined;
    }
    const decoded = Buffer.from(parameter, "base64").toString("utf8");
    const colon = decoded.indexOf(":");
    if (colon < 0) {
      return undefined;
    }
    return { scheme: "basic", username: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
  }

  return undefined;
};

export const encodeBasicCredentials = (username: string, password: string): string =>
  `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;
