export type SessionContext = Readonly<{
  origin: string;
  headers: Readonly<Record<string, string>>;
}>;

export function createSessionContext(tokens: string, baseUrl: string, userAgent: string): SessionContext {
  const url = new URL(baseUrl);

  return Object.freeze({
    origin: url.origin,
    headers: Object.freeze({
      Host: url.host,
      "User-Agent": userAgent,
      Cookie: tokens,
      "Accept-Encoding": "gzip",
      Accept: "*/*"
    })
  });
}
