import { IntegrationApiError, IntegrationAuthError } from "../errors";

const DOCTYPE_PATTERN = /<!DOCTYPE html/i;
const LOGIN_MARKERS = ["Access is denied", "Brightree Login"];

export function looksLikeLoginPage(body: string) {
  return DOCTYPE_PATTERN.test(body) && LOGIN_MARKERS.some((marker) => body.includes(marker));
}

/**
 * Returns the body of a successful response. The portal can answer an expired
 * session with its login page under any status, so full documents are checked
 * for login markers before the status is looked at.
 */
export async function interpretResponse(response: Response): Promise<string> {
  const body = await response.text();
  if (looksLikeLoginPage(body)) {
    throw new IntegrationAuthError("Unauthorized", 401);
  }

  if (response.ok) {
    return body;
  }

  const status = response.status;

  if (status >= 400 && status < 500) {
    throw new IntegrationAuthError(`Brightree: ${status} - ${response.statusText}`, status);
  }

  const headers = Object.fromEntries(response.headers.entries());
  throw new IntegrationApiError(`Brightree: ${status} - ${JSON.stringify(headers)}`, status, { headers });
}
