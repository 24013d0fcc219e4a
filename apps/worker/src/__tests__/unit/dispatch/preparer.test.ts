import { describe, it, expect, beforeEach } from "vitest";
import { RenderError, TemplateNotFoundError } from "../../../errors.js";
import { createHarness, welcomeTemplate, type Harness } from "../../helpers/fixtures.js";

describe("DispatchPreparer", () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    await h.templates.save(welcomeTemplate());
  });

  describe("prepare", () => {
    it("should write a PENDING log with rendered content frozen on it", async () => {
      const entry = await h.preparer.prepare({
        templateKey: "welcome",
        to: "a@example.com",
        context: { name: "Ann" },
        cc: ["cc@example.com"],
        initiator: "admin@example.com",
      });

      expect(entry.status).toBe("pending");
      expect(entry.subject).toBe("Hi Ann");
      expect(entry.htmlBody).toBe("<p>Welcome to Missive, Ann</p>");
      expect(entry.textBody).toBe("Welcome to Missive, Ann");
      expect(entry.fromAddress).toBe("Missive <noreply@example.com>");
      expect(entry.cc).toEqual(["cc@example.com"]);
      expect(entry.bcc).toEqual([]);
      expect(entry.initiator).toBe("admin@example.com");
      expect(entry.contextData).toEqual({
        site_name: "Missive",
        site_url: "https://missive.test",
        name: "Ann",
      });
    });

    it("should keep the log's content when the template changes later", async () => {
      const entry = await h.preparer.prepare({ templateKey: "welcome", to: "a@example.com", context: { name: "Ann" } });
      await h.templates.save(welcomeTemplate({ subjectTemplate: "Changed" }));

      expect((await h.deliveryLogs.get(entry.id))?.subject).toBe("Hi Ann");
    });

    it("should use an explicit sender", async () => {
      const entry = await h.preparer.prepare({
        templateKey: "welcome",
        to: "a@example.com",
        from: "Billing <billing@example.com>",
      });
      expect(entry.fromAddress).toBe("Billing <billing@example.com>");
    });

    it("should fail with TemplateNotFoundError and write nothing", async () => {
      await expect(h.preparer.prepare({ templateKey: "missing", to: "a@example.com" })).rejects.toBeInstanceOf(
        TemplateNotFoundError
      );
      expect(h.deliveryLogs.size).toBe(0);
    });

    it("should write one FAILED log when the template does not render", async () => {
      await h.templates.save(welcomeTemplate({ key: "broken", textTemplate: "{{#each items}}" }));

      let caught: unknown;
      try {
        await h.preparer.prepare({ templateKey: "broken", to: "a@example.com", context: { items: [] } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RenderError);
      if (!(caught instanceof RenderError)) return;
      expect(caught.part).toBe("text");
      expect(caught.deliveryLogId).toBeDefined();
      expect(h.deliveryLogs.size).toBe(1);

      const entry = await h.deliveryLogs.get(caught.deliveryLogId ?? "");
      expect(entry?.status).toBe("failed");
      expect(entry?.errorMessage).toMatch(/^Render failed: Parse error/);
      expect(entry?.subject).toBe("");
      expect(entry?.contextData).toEqual({ site_name: "Missive", site_url: "https://missive.test", items: [] });
      expect(caught.toResponse()).toEqual({
        error: caught.message,
        code: "RENDER_ERROR",
        deliveryLogId: entry?.id,
      });
    });

    it("should reject a context that cannot be stored, writing nothing", async () => {
      const promise = h.preparer.prepare({
        templateKey: "welcome",
        to: "a@example.com",
        context: { name: "Ann", onClick: () => undefined },
      });

      await expect(promise).rejects.toThrow(
        'Failed to render context of template "welcome": Context is not JSON-serializable at onClick: function value'
      );
      expect(h.deliveryLogs.size).toBe(0);
    });
  });

  describe("render", () => {
    it("should render without writing a log", async () => {
      const { content, context } = await h.preparer.render("welcome", { name: "Ann" });

      expect(content).toEqual({
        subject: "Hi Ann",
        html: "<p>Welcome to Missive, Ann</p>",
        text: "Welcome to Missive, Ann",
      });
      expect(context.site_url).toBe("https://missive.test");
      expect(h.deliveryLogs.size).toBe(0);
    });
  });
});
