import Handlebars from "handlebars";
import type { EmailTemplate } from "@missive/db";
import { RenderError, type TemplatePart } from "../../errors.js";

export type RenderableTemplate = Pick<EmailTemplate, "key" | "subjectTemplate" | "htmlTemplate" | "textTemplate">;

export interface RenderedContent {
  subject: string;
  html: string;
  text: string;
}

export type RenderContext = Record<string, unknown>;

/**
 * Expands a template's three bodies against a context.
 *
 * Uses its own Handlebars environment so helpers registered elsewhere never
 * leak in. Missing keys render as empty strings. Only the HTML body is
 * escaped; subject and plain text are emitted verbatim.
 * No I/O: safe for previews.
 */
export class Renderer {
  private readonly handlebars = Handlebars.create();

  render(template: RenderableTemplate, context: RenderContext): RenderedContent {
    return {
      subject: this.renderPart(template.key, "subject", template.subjectTemplate, context, false),
      html: this.renderPart(template.key, "html", template.htmlTemplate, context, true),
      text: this.renderPart(template.key, "text", template.textTemplate, context, false),
    };
  }

  private renderPart(
    templateKey: string,
    part: TemplatePart,
    source: string,
    context: RenderContext,
    escape: boolean
  ): string {
    if (source === "") return "";

    try {
      // Handlebars compiles lazily, so syntax errors surface on the first call
      const compiled = this.handlebars.compile(source, { noEscape: !escape, strict: false });
      return compiled(context);
    } catch (error) {
      throw new RenderError({ templateKey, part, cause: error });
    }
  }
}
