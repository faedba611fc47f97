import type { CheerioAPI } from "cheerio";
import { loadPage } from "./pageState";

export type PatientSections = Record<string, Record<string, string>>;

/** Collapses runs of whitespace inside each line and drops blank lines. */
export function cleanText(raw: string): string {
  return raw
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

function labelText(raw: string) {
  return cleanText(raw).replace(/\s*:$/, "");
}

/** Reads every label on the page, or only those whose nearest fieldset is `owner`. */
function readLabels($: CheerioAPI, owner?: object): Record<string, string> {
  const fields: Record<string, string> = {};

  $("label").each((_, el) => {
    const label = $(el);
    if (owner && label.closest("fieldset").get(0) !== owner) return;

    const name = labelText(label.text());
    if (!name) return;

    const target = label.attr("for");
    let value = "";

    if (target) {
      const control = $("[id]").filter((_, candidate) => $(candidate).attr("id") === target).first();
      value = control.is("input") ? (control.attr("value") ?? "") : control.text();
    } else {
      const sibling = label.next();
      value = sibling.length > 0 ? sibling.text() : label.parent().next().text();
    }

    fields[name] = cleanText(value);
  });

  return fields;
}

/**
 * Groups the labelled fields of a read-only patient page by the legend of the
 * fieldset that holds them.
 */
export function parsePatientSections(html: string): PatientSections {
  const $ = loadPage(html);
  const sections: PatientSections = {};

  $("fieldset").each((_, el) => {
    const fieldset = $(el);
    const legend = cleanText(fieldset.children("legend").first().text());
    if (!legend) return;

    sections[legend] = { ...sections[legend], ...readLabels($, el) };
  });

  return sections;
}

export function findLabeledValue(html: string, label: string): string | null {
  const $ = loadPage(html);
  const fields = readLabels($);
  return label in fields ? fields[label] : null;
}
