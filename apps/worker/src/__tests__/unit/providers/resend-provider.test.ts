import { describe, it, expect } from "vitest";
import { ResendProvider, type ResendEmails } from "../../../providers/resend-provider.js";

type ResendPayload = Parameters<ResendEmails["send"]>[0];
type ResendResponse = Awaited<ReturnType<ResendEmails["send"]>>;

function fakeEmails(respond: () => Promise<ResendResponse>) {
  const payloads: ResendPayload[] = [];
  const emails: ResendEmails = {
    send: async (payload) => {
      payloads.push(payload);
      return respond();
    },
  };
  return { emails, payloads };
}

const request = {
  to: "a@example.com",
  from: "Missive <noreply@example.com>",
  subject: "Hi Ann",
  html: "<p>Hi</p>",
  text: "Hi",
  reference: "6f1d8a52-8c4e-4a0b-9a51-2d8b1f0c7e11",
};

describe("ResendProvider", () => {
  it("should return Resend's id as the provider message id", async () => {
    const { emails, payloads } = fakeEmails(async () => ({ data: { id: "re_123" }, error: null }));
    const provider = new ResendProvider("test-key", emails);

    const result = await provider.send(request);

    expect(result).toEqual({ success: true, providerMessageId: "re_123" });
    expect(payloads[0]).toMatchObject({
      from: "Missive <noreply@example.com>",
      to: "a@example.com",
      subject: "Hi Ann",
      html: "<p>Hi</p>",
      text: "Hi",
      headers: { "X-Entity-Ref-ID": request.reference },
      tags: [{ name: "delivery_log_id", value: request.reference }],
    });
    expect(payloads[0]?.cc).toBeUndefined();
  });

  it("should report an API error as a failed send", async () => {
    const { emails } = fakeEmails(async () => ({
      data: null,
      error: { name: "validation_error", message: "Invalid `to` field" },
    }));

    const result = await new ResendProvider("test-key", emails).send(request);

    expect(result).toEqual({ success: false, error: "validation_error: Invalid `to` field" });
  });

  it("should report a thrown error as a failed send", async () => {
    const { emails } = fakeEmails(async () => {
      throw new Error("fetch failed");
    });

    const result = await new ResendProvider("test-key", emails).send(request);

    expect(result).toEqual({ success: false, error: "fetch failed" });
  });

  it("should send a placeholder text part when the body is empty", async () => {
    const { emails, payloads } = fakeEmails(async () => ({ data: { id: "re_1" }, error: null }));

    await new ResendProvider("test-key", emails).send({ ...request, text: "", cc: ["cc@example.com"] });

    expect(payloads[0]?.text).toBe(" ");
    expect(payloads[0]?.cc).toEqual(["cc@example.com"]);
  });
});
