import dotenv from "dotenv";
import fs from "fs";
import path from "path";

const rootEnv = path.resolve(process.cwd(), "../../.env");
if (fs.existsSync(rootEnv)) {
  dotenv.config({ path: rootEnv });
} else {
  dotenv.config();
}

export const env = {
  baseUrl: process.env.BRIGHTREE_BASE_URL || "https://brightree.net",
  tenantPath: process.env.BRIGHTREE_TENANT_PATH || "/F1/02873/Nation",
  userAgent:
    process.env.BRIGHTREE_USER_AGENT ||
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  maxRedirects: Number(process.env.BRIGHTREE_MAX_REDIRECTS || 5),
  templateDir: process.env.BRIGHTREE_TEMPLATE_DIR || path.resolve(__dirname, "../templates"),
  debug: process.env.BRIGHTREE_DEBUG === "true"
};
