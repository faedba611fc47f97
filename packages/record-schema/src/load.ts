import fs from "fs";
import path from "path";
import { FormTemplateSchema, type FormTemplate } from "./template";

const TEMPLATE_EXTENSION = ".json";

export function loadTemplates(templateDir: string): Map<string, FormTemplate> {
  const files = fs
    .readdirSync(templateDir)
    .filter((file) => path.extname(file) === TEMPLATE_EXTENSION)
    .sort();

  const templates = new Map<string, FormTemplate>();

  for (const file of files) {
    const template = readTemplateFile(path.join(templateDir, file));

    if (templates.has(template.page)) {
      throw new Error(`Duplicate template for page "${template.page}" in ${file}`);
    }

    templates.set(template.page, template);
  }

  return templates;
}

export function loadTemplate(templateDir: string, page: string): FormTemplate {
  const template = readTemplateFile(path.join(templateDir, `${page}${TEMPLATE_EXTENSION}`));

  if (template.page !== page) {
    throw new Error(`Template file for "${page}" declares page "${template.page}"`);
  }

  return template;
}

function readTemplateFile(fullPath: string): FormTemplate {
  const raw = fs.readFileSync(fullPath, "utf8");
  return FormTemplateSchema.parse(JSON.parse(raw));
}
