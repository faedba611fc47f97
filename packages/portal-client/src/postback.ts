import { IntegrationApiError } from "./errors";

/**
 * Position of the redirect path in the pipe-delimited delta response, per
 * postback. The patient page answers with `len|pageRedirect||path|`, the
 * sales order page with `len|pageRedirect|path|`.
 */
export const REDIRECT_SEGMENT_INDEX = {
  patientSave: 3,
  salesOrderSave: 2
} as const;

export type PostbackKind = keyof typeof REDIRECT_SEGMENT_INDEX;

const EXCEPTION_MARKER = /exception/i;

export function decodeRedirectSegment(responseText: string, kind: PostbackKind): string {
  const segments = responseText.split("|");
  const segment = segments[REDIRECT_SEGMENT_INDEX[kind]];

  if (segment === undefined || segment === "") {
    throw new IntegrationApiError("Unexpected postback response", undefined, {
      kind,
      response: responseText.slice(0, 500)
    });
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    throw new IntegrationApiError("Malformed redirect segment in postback response", undefined, {
      kind,
      segment
    });
  }

  if (EXCEPTION_MARKER.test(decoded)) {
    throw new IntegrationApiError(`Brightree reported an exception: ${decoded}`, undefined, {
      kind,
      segment: decoded
    });
  }

  return decoded;
}

export function parsePostbackRedirect(responseText: string, kind: PostbackKind, baseUrl: string): URL {
  return new URL(decodeRedirectSegment(responseText, kind), baseUrl);
}
