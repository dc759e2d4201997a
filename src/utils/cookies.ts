function isExpired(attributes: string[]): boolean {
  for (const attribute of attributes) {
    const [key, value = ""] = attribute.split("=").map((part) => part.trim());
    if (key.toLowerCase() === "max-age" && Number(value) <= 0) return true;
    if (key.toLowerCase() === "expires") {
      const expires = Date.parse(value);
      if (!Number.isNaN(expires) && expires <= Date.now()) return true;
    }
  }
  return false;
}

/** Parse `Set-Cookie` headers into a jar. Cookies the server is deleting map to `null`. */
export function parseCookies(setCookieHeaders: readonly string[]): Record<string, string | null> {
  const cookies: Record<string, string | null> = {};

  for (const cookie of setCookieHeaders) {
    const [nameValue, ...attributes] = cookie.split(";");
    const eqIndex = nameValue.indexOf("=");
    if (eqIndex === -1) continue;
    const name = nameValue.slice(0, eqIndex).trim();
    if (!name) continue;
    const value = nameValue.slice(eqIndex + 1).trim();
    cookies[name] = value === "" || isExpired(attributes) ? null : value;
  }

  return cookies;
}

export function serializeCookies(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(cookies)
    .map(([key, value]) => `${key}=${value}`)
    .join("; ");
}

export function mergeCookies(
  existing: Readonly<Record<string, string>>,
  incoming: Readonly<Record<string, string | null>>,
): Record<string, string> {
  const merged: Record<string, string> = { ...existing };
  for (const [name, value] of Object.entries(incoming)) {
    if (value === null) delete merged[name];
    else merged[name] = value;
  }
  return merged;
}

export const Cookies = {
  parse: parseCookies,
  serialize: serializeCookies,
  merge: mergeCookies,
};
