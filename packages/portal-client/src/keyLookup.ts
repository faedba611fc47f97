import { z } from "zod";
import { IntegrationApiError } from "./errors";
import type { PortalHttp } from "./http/portalHttp";

const LookupScalarSchema = z
  .union([z.string(), z.number(), z.null()])
  .transform((value) => (value === null ? "" : String(value)));

const LookupItemSchema = z.object({
  Text: z.string(),
  Value: z.union([z.string(), z.number()]).transform(String),
  Attributes: z.record(LookupScalarSchema).default({})
});

const LookupResponseSchema = z.object({
  Items: z.array(LookupItemSchema)
});

export type LookupItem = z.infer<typeof LookupItemSchema>;

/** Millisecond timestamps that never repeat within one process. */
export class CacheBuster {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): number {
    const current = this.now();
    this.last = current > this.last ? current : this.last + 1;
    return this.last;
  }
}

export function parseLookupItems(body: string): LookupItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new IntegrationApiError("Patient lookup returned invalid JSON", undefined, {
      response: body.slice(0, 500)
    });
  }

  const result = LookupResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new IntegrationApiError("Patient lookup returned an unexpected shape", undefined, {
      issues: result.error.issues
    });
  }

  return result.data.Items;
}

/**
 * Resolves a business patient ID to the portal's internal patient key through
 * the patient autocomplete handler. Returns null when no item carries the ID.
 */
export async function resolveInternalKey(
  http: PortalHttp,
  lookupUrl: string,
  headers: Record<string, string>,
  identifier: number | string,
  cacheBuster: CacheBuster
): Promise<string | null> {
  const wanted = String(identifier);
  const url = new URL(lookupUrl);
  url.searchParams.set("lookup", "Patient");
  url.searchParams.set("text", wanted);
  url.searchParams.set("_", String(cacheBuster.next()));

  const body = await http.request("GET", url.toString(), {
    headers: { ...headers, "X-Requested-With": "XMLHttpRequest" }
  });

  const match = parseLookupItems(body).find((item) => item.Attributes.PatientID === wanted);
  return match ? match.Value : null;
}
