import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type PromptTemplateName =
  | "routing"
  | "conversation"
  | "title"
  | "scope-refinement"
  | "business-analyst"
  | "technical-architect"
  | "project-manager"
  | "resource-allocation";

export type PromptTemplateValues = Record<string, string>;

// =============================================================================
// LIBRARY
// =============================================================================

/**
 * Handlebars templates under `<dir>/<name>.md`, compiled once per name.
 * Values are inserted verbatim; a placeholder without a value throws.
 */
export class PromptLibrary {
  private readonly compiled = new Map<PromptTemplateName, Handlebars.TemplateDelegate>();

  constructor(readonly promptsDir: string) {}

  async render(name: PromptTemplateName, values: PromptTemplateValues): Promise<string> {
    const template = await this.template(name);
    return template(values).trim();
  }

  private async template(name: PromptTemplateName): Promise<Handlebars.TemplateDelegate> {
    const cached = this.compiled.get(name);
    if (cached) return cached;

    const templatePath = path.join(this.promptsDir, `${name}.md`);
    if (!(await fse.pathExists(templatePath))) {
      throw new ConfigError(`Prompt template not found: ${templatePath}`);
    }

    const source = await fse.readFile(templatePath, "utf8");
    const template = Handlebars.compile(source, { noEscape: true, strict: true });
    this.compiled.set(name, template);
    return template;
  }
}

// =============================================================================
// PACKAGED TEMPLATES
// =============================================================================

let packagedTemplatesDir: string | undefined;
let packagedLibrary: PromptLibrary | undefined;

/** `templates/` at the package root, found from this module's location in both src and dist. */
export function resolveTemplatesDir(): string {
  packagedTemplatesDir ??= path.join(
    findPackageRoot(path.dirname(fileURLToPath(import.meta.url))),
    "templates",
  );
  return packagedTemplatesDir;
}

export function renderPromptTemplate(
  name: PromptTemplateName,
  values: PromptTemplateValues,
): Promise<string> {
  packagedLibrary ??= new PromptLibrary(path.join(resolveTemplatesDir(), "prompts"));
  return packagedLibrary.render(name, values);
}

function findPackageRoot(startDir: string): string {
  for (let dir = startDir; ; dir = path.dirname(dir)) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    if (path.dirname(dir) === dir) {
      throw new ConfigError(`package.json not found above ${startDir}`);
    }
  }
}
