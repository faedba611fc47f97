import { z } from "zod";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * A form field value as the vendor page renders it: either a plain string or
 * a structured client-state blob that is serialized into a single field.
 */
export type TemplateFieldValue = string | JsonValue[] | JsonObject;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const TemplateFieldValueSchema: z.ZodType<TemplateFieldValue> = z.union([
  z.string(),
  z.array(JsonValueSchema),
  z.record(JsonValueSchema)
]);

export const FormTemplateSchema = z.object({
  page: z.string().min(1),
  version: z.number().int().positive(),
  path: z.string().startsWith("/"),
  fields: z
    .record(TemplateFieldValueSchema)
    .refine((fields) => "__VIEWSTATE" in fields && "__EVENTVALIDATION" in fields, {
      message: "Template must declare __VIEWSTATE and __EVENTVALIDATION"
    })
});

export type FormTemplate = z.infer<typeof FormTemplateSchema>;
