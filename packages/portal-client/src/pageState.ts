import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";

export const LOB_KEY_FIELD_SUFFIX = "$hfLobKey";

export type PageSnapshot = {
  viewState: string | null;
  viewStateGenerator: string | null;
  eventValidation: string | null;
  lobKey: string | null;
};

export function loadPage(html: string): CheerioAPI {
  return cheerio.load(html);
}

function findInput($: CheerioAPI, attribute: "id" | "name", value: string): string | null {
  // Control names contain "$", so match attributes directly instead of building a selector.
  const input = $("input")
    .filter((_, el) => $(el).attr(attribute) === value)
    .first();

  if (input.length === 0) return null;
  return input.attr("value") ?? "";
}

export function extractInputValue($: CheerioAPI, inputId: string): string | null {
  return findInput($, "id", inputId);
}

export function extractInputValueByName($: CheerioAPI, inputName: string): string | null {
  return findInput($, "name", inputName);
}

function extractLobKey($: CheerioAPI): string | null {
  const input = $("input")
    .filter((_, el) => ($(el).attr("name") ?? "").endsWith(LOB_KEY_FIELD_SUFFIX))
    .first();

  if (input.length === 0) return null;
  return input.attr("value") ?? "";
}

export function takeSnapshot(html: string): PageSnapshot {
  const $ = loadPage(html);

  return {
    viewState: extractInputValue($, "__VIEWSTATE"),
    viewStateGenerator: extractInputValue($, "__VIEWSTATEGENERATOR"),
    eventValidation: extractInputValue($, "__EVENTVALIDATION"),
    lobKey: extractLobKey($)
  };
}
