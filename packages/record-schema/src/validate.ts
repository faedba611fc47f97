import path from "path";
import { loadTemplates } from "./load";

const templateDir = process.env.BRIGHTREE_TEMPLATE_DIR
  ? path.resolve(process.env.BRIGHTREE_TEMPLATE_DIR)
  : path.resolve(process.cwd(), "../portal-client/templates");

try {
  const templates = loadTemplates(templateDir);
  for (const template of templates.values()) {
    console.log(
      `${template.page} v${template.version}: ${Object.keys(template.fields).length} fields`
    );
  }
  console.log(`Template validation passed for ${templateDir}`);
} catch (error) {
  console.error("Template validation failed:", error);
  process.exit(1);
}
