import type { FormTemplate, TemplateFieldValue } from "@brightree-bridge/record-schema";
import { LOB_KEY_FIELD_SUFFIX, type PageSnapshot } from "../pageState";
import type { ControlState } from "./controlState";

export type FieldValue = TemplateFieldValue | ControlState;
export type FormFieldMap = Record<string, FieldValue>;

export function serializeFieldValue(value: FieldValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function tokenFields(fields: Map<string, FieldValue>, snapshot: PageSnapshot): FormFieldMap {
  const tokens: FormFieldMap = {
    __VIEWSTATE: snapshot.viewState ?? "",
    __VIEWSTATEGENERATOR: snapshot.viewStateGenerator ?? "",
    __EVENTVALIDATION: snapshot.eventValidation ?? ""
  };

  if (snapshot.lobKey !== null) {
    for (const name of fields.keys()) {
      if (name.endsWith(LOB_KEY_FIELD_SUFFIX)) {
        tokens[name] = snapshot.lobKey;
      }
    }
  }

  return tokens;
}

/**
 * Builds the full postback field list for one page load: template defaults,
 * then the tokens from the fetched page, then the business fields. Every
 * override must name a control the template declares.
 */
export function buildFormFields(
  template: FormTemplate,
  snapshot: PageSnapshot,
  businessFields: FormFieldMap
): Array<[string, string]> {
  const fields = new Map<string, FieldValue>(Object.entries(template.fields));

  for (const layer of [tokenFields(fields, snapshot), businessFields]) {
    for (const [name, value] of Object.entries(layer)) {
      if (!fields.has(name)) {
        throw new Error(`Field "${name}" is not part of template "${template.page}"`);
      }
      fields.set(name, value);
    }
  }

  return Array.from(fields, ([name, value]): [string, string] => [name, serializeFieldValue(value)]);
}

export function encodeFormBody(fields: Array<[string, string]>): string {
  return new URLSearchParams(fields).toString();
}

export function buildFormBody(
  template: FormTemplate,
  snapshot: PageSnapshot,
  businessFields: FormFieldMap
): string {
  return encodeFormBody(buildFormFields(template, snapshot, businessFields));
}
