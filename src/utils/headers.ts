export function baseHeaders(): Record<string, string> {
  return {
    Accept: "*/*",
    "Accept-Language": "en-US,en;q=0.9",
    "Accept-Encoding": "gzip, deflate, br",
    "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:147.0) Gecko/20100101 Firefox/147.0",
  };
}

export function cookieOnlyHeaders(cookieStr: string): Record<string, string> {
  return { Cookie: cookieStr };
}

export function csvHeaders(cookieStr: string): Record<string, string> {
  return {
    ...baseHeaders(),
    ...cookieOnlyHeaders(cookieStr),
    Accept: "text/csv,text/plain;q=0.9,*/*;q=0.8",
  };
}
