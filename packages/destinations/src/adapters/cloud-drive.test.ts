import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  AuthExpiredError,
  PermanentError,
  TransientError,
  ValidationError,
} from "@docrelay/errors";
import type { DestinationConfig } from "@docrelay/types";
import type { DeliveryArtifact, DestinationCredential } from "../adapter.interface.js";
import { createCloudDriveAdapter } from "./cloud-drive.js";
import { DropboxAdapter, dropboxApiArg } from "./dropbox.js";
import { GoogleDriveAdapter, escapeDriveQuery, type DriveFilesApi } from "./google-drive.js";
import { OneDriveAdapter, UPLOAD_CHUNK_BYTES } from "./onedrive.js";

function destination(options: Record<string, string>): DestinationConfig {
  return {
    id: "dest-1",
    name: "Archive",
    type: "cloud_drive",
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
  metadata: null,
};

const credential: DestinationCredential = { secrets: {}, accessToken: "test-access-token" };
const callOptions = { timeoutMs: 1_000 };

function headerOf(init: RequestInit | undefined, name: string): string | null {
  return new Headers(init?.headers).get(name);
}

describe("createCloudDriveAdapter", () => {
  it("picks the implementation from options.provider", () => {
    expect(createCloudDriveAdapter(destination({ provider: "dropbox" }), {})).toBeInstanceOf(DropboxAdapter);
    expect(createCloudDriveAdapter(destination({ provider: "onedrive" }), {}).oauthProvider).toBe("onedrive");
  });

  it("rejects unknown or missing providers", () => {
    expect(() => createCloudDriveAdapter(destination({ provider: "box" }), {})).toThrow(ValidationError);
    expect(() => createCloudDriveAdapter(destination({}), {})).toThrow(ValidationError);
  });
});

describe("GoogleDriveAdapter", () => {
  const files = {
    list: vi.fn<DriveFilesApi["list"]>(),
    create: vi.fn<DriveFilesApi["create"]>(),
    update: vi.fn<DriveFilesApi["update"]>(),
  };
  const adapter = new GoogleDriveAdapter(destination({ provider: "google_drive", folder_id: "root-folder" }), {
    createDriveFiles: () => files,
  });

  afterEach(() => {
    files.list.mockReset();
    files.create.mockReset();
    files.update.mockReset();
  });

  it("creates missing folders and uploads with a delivery marker", async () => {
    files.list
      .mockResolvedValueOnce({ data: { files: [{ id: "f-invoices", name: "Invoices" }] } })
      .mockResolvedValueOnce({ data: { files: [] } })
      .mockResolvedValueOnce({ data: { files: [] } });
    files.create
      .mockResolvedValueOnce({ data: { id: "f-2024" } })
      .mockResolvedValueOnce({ data: { id: "file-1", webViewLink: "https://drive.test/file-1" } });

    const ref = await adapter.deliver(artifact, "Invoices/2024/Invoice Jan.pdf", credential, callOptions);

    expect(ref).toEqual({ ref: "file-1", url: "https://drive.test/file-1" });
    expect(files.create).toHaveBeenNthCalledWith(1, {
      requestBody: { name: "2024", mimeType: "application/vnd.google-apps.folder", parents: ["f-invoices"] },
      fields: "id",
    });
    expect(files.create).toHaveBeenLastCalledWith(
      expect.objectContaining({
        requestBody: {
          name: "Invoice Jan.pdf",
          parents: ["f-2024"],
          mimeType: "application/pdf",
          appProperties: { docrelayDocumentId: "doc-1" },
        },
        fields: "id, webViewLink",
      }),
    );
  });

  it("overwrites an earlier delivery of the same document", async () => {
    files.list
      .mockResolvedValueOnce({ data: { files: [{ id: "f-scans" }] } })
      .mockResolvedValueOnce({ data: { files: [{ id: "file-1" }] } });
    files.update.mockResolvedValueOnce({ data: { id: "file-1" } });

    const ref = await adapter.deliver(artifact, "Scans/Invoice Jan.pdf", credential, callOptions);

    expect(ref).toEqual({ ref: "file-1", url: null });
    expect(files.create).not.toHaveBeenCalled();
    expect(files.update).toHaveBeenCalledWith(expect.objectContaining({ fileId: "file-1" }));
  });

  it("maps a 401 from Drive to AuthExpiredError", async () => {
    files.list.mockRejectedValueOnce(Object.assign(new Error("Invalid Credentials"), { response: { status: 401 } }));

    await expect(adapter.deliver(artifact, "Invoice Jan.pdf", credential, callOptions)).rejects.toBeInstanceOf(
      AuthExpiredError,
    );
  });

  it("needs an access token", async () => {
    await expect(
      adapter.deliver(artifact, "Invoice Jan.pdf", { secrets: {}, accessToken: null }, callOptions),
    ).rejects.toBeInstanceOf(AuthExpiredError);
    expect(files.list).not.toHaveBeenCalled();
  });

  it("escapes quotes and backslashes in queries", () => {
    expect(escapeDriveQuery("O'Brien\\x")).toBe("O\\'Brien\\\\x");
  });
});

describe("fetch-based cloud drives", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  describe("OneDriveAdapter", () => {
    const adapter = new OneDriveAdapter(destination({ provider: "onedrive", base_path: "Apps/DocRelay" }));

    it("uploads small files with a single PUT", async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(JSON.stringify({ id: "item-1", webUrl: "https://onedrive.test/item-1" }), { status: 201 }),
      );

      const ref = await adapter.deliver(artifact, "Invoices/Invoice Jan.pdf", credential, callOptions);

      expect(ref).toEqual({ ref: "item-1", url: "https://onedrive.test/item-1" });
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe(
        "https://graph.microsoft.com/v1.0/me/drive/root:/Apps/DocRelay/Invoices/Invoice%20Jan.pdf:/content",
      );
      expect(init?.method).toBe("PUT");
      expect(headerOf(init, "Authorization")).toBe("Bearer test-access-token");
    });

    it("uses an upload session in chunks above the simple-upload limit", async () => {
      const total = UPLOAD_CHUNK_BYTES + 10;
      fetchMock
        .mockResolvedValueOnce(
          new Response(JSON.stringify({ uploadUrl: "https://upload.onedrive.test/session-1" }), { status: 200 }),
        )
        .mockResolvedValueOnce(new Response(JSON.stringify({ nextExpectedRanges: ["5242880-"] }), { status: 202 }))
        .mockResolvedValueOnce(new Response(JSON.stringify({ id: "item-2" }), { status: 201 }));

      const ref = await adapter.deliver(
        { ...artifact, bytes: new Uint8Array(total) },
        "Invoice Jan.pdf",
        credential,
        callOptions,
      );

      expect(ref).toEqual({ ref: "item-2", url: null });
      expect(fetchMock).toHaveBeenCalledTimes(3);
      const first = fetchMock.mock.calls[1];
      const second = fetchMock.mock.calls[2];
      expect(first?.[0]).toBe("https://upload.onedrive.test/session-1");
      expect(headerOf(first?.[1], "Content-Range")).toBe("bytes 0-5242879/5242890");
      expect(headerOf(first?.[1], "Authorization")).toBeNull();
      expect(headerOf(second?.[1], "Content-Range")).toBe("bytes 5242880-5242889/5242890");
    });

    it("maps 401 to AuthExpiredError", async () => {
      fetchMock.mockResolvedValueOnce(new Response("InvalidAuthenticationToken", { status: 401 }));

      await expect(adapter.deliver(artifact, "Invoice Jan.pdf", credential, callOptions)).rejects.toBeInstanceOf(
        AuthExpiredError,
      );
    });
  });

  describe("DropboxAdapter", () => {
    const adapter = new DropboxAdapter(destination({ provider: "dropbox", base_path: "Scans" }));

    it("uploads in overwrite mode under the base path", async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(JSON.stringify({ id: "id:abc", path_display: "/Scans/Invoice Jan.pdf" }), { status: 200 }),
      );

      const ref = await adapter.deliver(artifact, "Invoice Jan.pdf", credential, callOptions);

      expect(ref).toEqual({ ref: "id:abc", url: null });
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe("https://content.dropboxapi.com/2/files/upload");
      expect(headerOf(init, "Dropbox-API-Arg")).toBe(
        '{"path":"/Scans/Invoice Jan.pdf","mode":"overwrite","autorename":false,"mute":true}',
      );
    });

    it("escapes non-ASCII characters in the API argument", () => {
      expect(dropboxApiArg({ path: "/Über/ä.pdf" })).toBe('{"path":"/\\u00dcber/\\u00e4.pdf"}');
    });

    it("classifies path conflicts as permanent and rate limits as transient", async () => {
      fetchMock
        .mockResolvedValueOnce(new Response('{"error_summary":"path/insufficient_space/"}', { status: 409 }))
        .mockResolvedValueOnce(new Response("too_many_requests", { status: 429 }));

      await expect(adapter.deliver(artifact, "a.pdf", credential, callOptions)).rejects.toBeInstanceOf(
        PermanentError,
      );
      await expect(adapter.deliver(artifact, "a.pdf", credential, callOptions)).rejects.toBeInstanceOf(
        TransientError,
      );
    });
  });
});
