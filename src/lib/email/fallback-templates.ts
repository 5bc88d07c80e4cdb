import * as fs from "fs";
import { z } from "zod/v4";
import type { FallbackSource } from "../llm";
import { EmailDraftSchema, type EmailDraft } from "./types";

export const FallbackTemplatesSchema = z.record(z.string(), EmailDraftSchema);

/**
 * Static drafts keyed by domain tag, served when the generation service
 * cannot be reached. Unknown domains use the `general` template.
 */
export class FallbackTemplates implements FallbackSource {
  private templates: Readonly<Record<string, EmailDraft>>;

  constructor(templates: Record<string, EmailDraft>) {
    this.templates = Object.freeze({ ...templates });
  }

  static fromFile(filePath: string): FallbackTemplates {
    const result = FallbackTemplatesSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf8")));
    if (!result.success) {
      throw new Error(`Invalid fallback templates at ${filePath}: ${JSON.stringify(result.error.issues)}`);
    }
    return new FallbackTemplates(result.data);
  }

  template(domain: string): EmailDraft | null {
    return this.templates[domain] ?? this.templates.general ?? null;
  }

  render(domain: string): string | null {
    const template = this.template(domain);
    return template ? JSON.stringify(template) : null;
  }
}
