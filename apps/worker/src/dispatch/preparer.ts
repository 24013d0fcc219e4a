import type { DeliveryLog, EmailTemplate } from "@missive/db";
import { RenderError, describeCause } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  ContextValidationError,
  mergeContext,
  toStorableContext,
  type DefaultContext,
  type JsonObject,
} from "../domain/rendering/context.js";
import type { RenderedContent, Renderer } from "../domain/rendering/renderer.js";
import { formatFromAddress } from "../providers/types.js";
import type { DeliveryLogStore, TemplateStore } from "../stores/types.js";
import type { DispatchRequest } from "./types.js";

export interface DispatchDefaults extends DefaultContext {
  fromAddress: string;
  fromName?: string;
}

export interface DispatchPreparerDeps {
  templates: TemplateStore;
  renderer: Renderer;
  deliveryLogs: DeliveryLogStore;
  defaults: DispatchDefaults;
  logger: Logger;
}

export interface PreparedRender {
  template: EmailTemplate;
  context: JsonObject;
  content: RenderedContent;
}

/**
 * The steps both dispatch modes share: resolve the template, build and
 * check the context, render, and write the delivery log.
 *
 * Failure policy:
 * - unknown or inactive template: TemplateNotFoundError, nothing written
 * - context that cannot be stored as JSON: RenderError, nothing written
 * - template that fails to render: one log written directly as FAILED,
 *   then RenderError carrying that log's id
 */
export class DispatchPreparer {
  constructor(private deps: DispatchPreparerDeps) {}

  /**
   * Resolve and render without writing anything (admin previews).
   */
  async render(templateKey: string, context: Record<string, unknown> = {}): Promise<PreparedRender> {
    const template = await this.deps.templates.resolve(templateKey);
    const storable = this.buildContext(templateKey, context);
    const content = this.deps.renderer.render(template, storable);
    return { template, context: storable, content };
  }

  /**
   * Write the PENDING log for a dispatch, with rendered content frozen on it.
   */
  async prepare(request: DispatchRequest): Promise<DeliveryLog> {
    const { logger } = this.deps;
    const template = await this.deps.templates.resolve(request.templateKey);
    const context = this.buildContext(request.templateKey, request.context ?? {});
    const base = {
      templateId: template.id,
      templateKey: template.key,
      toAddress: request.to,
      fromAddress: request.from ?? this.defaultSender(),
      cc: request.cc ?? [],
      bcc: request.bcc ?? [],
      contextData: context,
      initiator: request.initiator ?? null,
    };

    let content: RenderedContent;
    try {
      content = this.deps.renderer.render(template, context);
    } catch (error) {
      if (!(error instanceof RenderError)) throw error;

      const failed = await this.deps.deliveryLogs.create({
        ...base,
        subject: "",
        htmlBody: "",
        textBody: "",
        status: "failed",
        errorMessage: `Render failed: ${describeCause(error.cause)}`,
      });
      logger.warn(
        { deliveryLogId: failed.id, templateKey: template.key, part: error.part, error: describeCause(error.cause) },
        "render failed"
      );
      throw error.withDeliveryLog(failed.id);
    }

    const entry = await this.deps.deliveryLogs.create({
      ...base,
      subject: content.subject,
      htmlBody: content.html,
      textBody: content.text,
      status: "pending",
    });

    logger.debug({ deliveryLogId: entry.id, templateKey: template.key, to: request.to }, "pending");
    return entry;
  }

  private defaultSender(): string {
    const { fromAddress, fromName } = this.deps.defaults;
    return formatFromAddress({ from: fromAddress, fromName });
  }

  private buildContext(templateKey: string, context: Record<string, unknown>): JsonObject {
    try {
      const { site_name, site_url } = this.deps.defaults;
      return toStorableContext(mergeContext({ site_name, site_url }, context));
    } catch (error) {
      if (error instanceof ContextValidationError) {
        throw new RenderError({ templateKey, part: "context", cause: error });
      }
      throw error;
    }
  }
}
