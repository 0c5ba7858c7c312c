import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import type { ModelCatalogMap } from "@shared/schema";

export const MODELS_PLACEHOLDER = "{{ ALL_MODELS_JSON }}";

const TEMPLATE_PATH = fileURLToPath(new URL("./templates/landing.html", import.meta.url));

let templatePromise: Promise<string> | null = null;

function loadTemplate(): Promise<string> {
  if (!templatePromise) {
    templatePromise = readFile(TEMPLATE_PATH, "utf8").catch((err: unknown) => {
      templatePromise = null;
      throw err;
    });
  }
  return templatePromise;
}

/** JSON that is safe inside an inline <script> block. */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export function renderLandingPage(template: string, catalogs: ModelCatalogMap): string {
  // Function replacer: `$` sequences in the JSON must not be treated as patterns
  return template.replace(MODELS_PLACEHOLDER, () => serializeForScript(catalogs));
}

export async function buildLandingPage(catalogs: ModelCatalogMap): Promise<string> {
  return renderLandingPage(await loadTemplate(), catalogs);
}
