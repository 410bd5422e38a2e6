import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuthExpiredError, PermanentError, TransientError } from "@docrelay/errors";
import type { DestinationConfig, DestinationType } from "@docrelay/types";
import type { DeliveryArtifact, SmtpConnectionConfig } from "../adapter.interface.js";
import { DmsAdapter } from "./dms.js";
import { EmailAdapter, smtpError, type MailTransport } from "./email.js";

function destination(type: DestinationType, options: Record<string, string>): DestinationConfig {
  return {
    id: "dest-1",
    name: "Archive",
    type,
    enabled: true,
    targetPathTemplate: "{filename}",
    credentialRef: "archive",
    options,
    createdAt: new Date(0),
    updatedAt: new Date(0),
  };
}

const artifact: DeliveryArtifact = {
  documentId: "doc-1",
  filename: "Invoice Jan.pdf",
  bytes: new TextEncoder().encode("%PDF-1.7\n"),
  mimeType: "application/pdf",
  metadata: { title: "ACME Invoice", date: "2024-01-31", classification: "invoice", text: null },
};

const callOptions = { timeoutMs: 1_000 };

describe("DmsAdapter", () => {
  const fetchMock = vi.fn<typeof fetch>();
  const adapter = new DmsAdapter(destination("dms", { url: "https://paperless.test/", tag_id: "7" }));
  const credential = { secrets: { api_token: "test-token" }, accessToken: null };

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it("posts the document with its metadata and returns the task reference", async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify("3c2e8a51-7e6b-4b61-9a7f-9f3f0b1f1a11"), { status: 200 }),
    );

    const ref = await adapter.deliver(artifact, "Invoices/Invoice Jan.pdf", credential, callOptions);

    expect(ref).toEqual({ ref: "paperless-task:3c2e8a51-7e6b-4b61-9a7f-9f3f0b1f1a11", url: null });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://paperless.test/api/documents/post_document/");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Token test-token");

    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect(body.get("title")).toBe("ACME Invoice");
    expect(body.get("created")).toBe("2024-01-31");
    expect(body.get("tags")).toBe("7");
    const file = body.get("document");
    expect(typeof file === "string" || file === null ? null : file.name).toBe("Invoice Jan.pdf");
  });

  it("maps a rejected token to AuthExpiredError", async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"detail":"Invalid token."}', { status: 401 }));

    await expect(adapter.deliver(artifact, "a.pdf", credential, callOptions)).rejects.toBeInstanceOf(AuthExpiredError);
  });

  it("rejects a response without a task id", async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ ok: true }), { status: 200 }));

    await expect(adapter.deliver(artifact, "a.pdf", credential, callOptions)).rejects.toBeInstanceOf(PermanentError);
  });
});

describe("EmailAdapter", () => {
  const transport = {
    sendMail: vi.fn<MailTransport["sendMail"]>(),
    verify: vi.fn<MailTransport["verify"]>(),
    close: vi.fn<MailTransport["close"]>(),
  };
  const createMailTransport = vi.fn<(config: SmtpConnectionConfig) => MailTransport>(() => transport);
  const adapter = new EmailAdapter(
    destination("email", { host: "smtp.test", to: "archive@example.test", from: "scanner@example.test" }),
    { createMailTransport },
  );
  const credential = { secrets: { username: "scanner", password: "test-secret" }, accessToken: null };

  afterEach(() => {
    transport.sendMail.mockReset();
    transport.verify.mockReset();
    transport.close.mockReset();
    createMailTransport.mockClear();
  });

  it("sends the PDF as an attachment", async () => {
    transport.sendMail.mockResolvedValueOnce({ messageId: "<msg-1@smtp.test>" });

    const ref = await adapter.deliver(artifact, "Invoices/Invoice Jan.pdf", credential, callOptions);

    expect(ref).toEqual({ ref: "<msg-1@smtp.test>", url: null });
    expect(createMailTransport).toHaveBeenCalledWith({
      host: "smtp.test",
      port: 587,
      secure: false,
      username: "scanner",
      password: "test-secret",
      timeoutMs: 1_000,
    });
    expect(transport.sendMail).toHaveBeenCalledWith(
      expect.objectContaining({
        from: "scanner@example.test",
        to: "archive@example.test",
        subject: "ACME Invoice",
        attachments: [{ filename: "Invoice Jan.pdf", content: expect.any(Buffer), contentType: "application/pdf" }],
      }),
    );
    expect(transport.close).toHaveBeenCalledOnce();
  });

  it("maps a rejected login to AuthExpiredError", async () => {
    transport.sendMail.mockRejectedValueOnce(
      Object.assign(new Error("Invalid login: 535 Authentication failed"), { code: "EAUTH", responseCode: 535 }),
    );

    await expect(adapter.deliver(artifact, "a.pdf", credential, callOptions)).rejects.toBeInstanceOf(AuthExpiredError);
    expect(transport.close).toHaveBeenCalledOnce();
  });

  it("checks the connection with verify()", async () => {
    transport.verify.mockResolvedValueOnce(true);

    await adapter.testConnection(credential, callOptions);

    expect(transport.verify).toHaveBeenCalledOnce();
  });
});

describe("smtpError", () => {
  it("treats 4xx replies and connection failures as transient", () => {
    expect(smtpError(Object.assign(new Error("mailbox busy"), { responseCode: 452 }))).toBeInstanceOf(TransientError);
    expect(smtpError(Object.assign(new Error("refused"), { code: "ECONNECTION" }))).toBeInstanceOf(TransientError);
  });

  it("treats 5xx rejections as permanent", () => {
    expect(smtpError(Object.assign(new Error("no such user"), { responseCode: 550 }))).toBeInstanceOf(PermanentError);
  });
});
