import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  FetchHttpClient,
  HttpClient,
  HttpMarketplaceApi,
} from "../src/adapters/marketplace.api";
import { NIL_FOLDER_ID } from "../src/core/payload";

describe("HttpMarketplaceApi", () => {
  let httpClient: HttpClient;
  let api: HttpMarketplaceApi;

  beforeEach(() => {
    httpClient = {
      request: vi.fn().mockResolvedValue({ status: 200, body: { listings: [] } }),
    };
    api = new HttpMarketplaceApi(
      {
        apiBaseUrl: "https://marketplace.test/api/1/",
        merchantId: "test-merchant",
        apiToken: "test-secret",
        requestTimeoutMs: 5000,
      },
      httpClient
    );
  });

  const options = (body?: unknown) => ({
    body,
    headers: { Authorization: "Bearer test-secret" },
    timeout: 5000,
  });

  it("should fetch the merchant record and listings", async () => {
    await api.getMerchant();
    await api.getListings();
    await api.getListing(42);

    expect(vi.mocked(httpClient.request).mock.calls).toEqual([
      ["GET", "https://marketplace.test/api/1/test-merchant/merchant", options()],
      ["GET", "https://marketplace.test/api/1/test-merchant/listings", options()],
      ["GET", "https://marketplace.test/api/1/test-merchant/listing/42", options()],
    ]);
  });

  it("should post a new listing without an id", async () => {
    await api.createListing({ listingFolderId: "F1", versionFolderId: null });

    expect(httpClient.request).toHaveBeenCalledWith(
      "POST",
      "https://marketplace.test/api/1/test-merchant/listings",
      options({
        listings: [
          {
            id: 0,
            is_listed: false,
            inventory_info: { listing_folder_id: "F1", version_folder_id: NIL_FOLDER_ID },
          },
        ],
      })
    );
  });

  it("should put updates and associations under the listing id", async () => {
    const listing = {
      listingId: 42,
      listingFolderId: "F1",
      versionFolderId: "V1",
      isActive: true,
    };
    const body = {
      listings: [
        {
          id: 42,
          is_listed: true,
          inventory_info: { listing_folder_id: "F1", version_folder_id: "V1" },
        },
      ],
    };

    await api.updateListing(listing);
    await api.associateListing(listing);
    await api.deleteListing(42);

    expect(vi.mocked(httpClient.request).mock.calls).toEqual([
      ["PUT", "https://marketplace.test/api/1/test-merchant/listing/42", options(body)],
      [
        "PUT",
        "https://marketplace.test/api/1/test-merchant/associate_inventory/42",
        options(body),
      ],
      ["DELETE", "https://marketplace.test/api/1/test-merchant/listing/42", options()],
    ]);
  });

  it("should hit the import endpoint", async () => {
    await api.getImportStatus();
    await api.triggerImport();

    expect(vi.mocked(httpClient.request).mock.calls).toEqual([
      ["GET", "https://marketplace.test/api/1/test-merchant/inventory/import", options()],
      ["POST", "https://marketplace.test/api/1/test-merchant/inventory/import", options({})],
    ]);
  });

  it("should return error statuses instead of throwing", async () => {
    vi.mocked(httpClient.request).mockResolvedValue({ status: 404, body: { error: "no" } });

    await expect(api.getListing(7)).resolves.toEqual({ status: 404, body: { error: "no" } });
  });

  it("should omit the auth header without a token and escape the merchant id", async () => {
    api = new HttpMarketplaceApi(
      {
        apiBaseUrl: "https://marketplace.test/api/1",
        merchantId: "merchant one",
        requestTimeoutMs: 1000,
      },
      httpClient
    );

    await api.getMerchant();

    expect(httpClient.request).toHaveBeenCalledWith(
      "GET",
      "https://marketplace.test/api/1/merchant%20one/merchant",
      { body: undefined, headers: {}, timeout: 1000 }
    );
  });
});

describe("FetchHttpClient", () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should send JSON and decode the answer", async () => {
    fetchMock.mockResolvedValue(new Response('{"listings":[]}', { status: 201 }));

    const response = await new FetchHttpClient().request("PUT", "https://marketplace.test/x", {
      body: { a: 1 },
      headers: { Authorization: "Bearer test-secret" },
    });

    expect(response).toEqual({ status: 201, body: { listings: [] } });
    expect(fetchMock).toHaveBeenCalledWith(
      "https://marketplace.test/x",
      expect.objectContaining({
        method: "PUT",
        body: '{"a":1}',
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          Authorization: "Bearer test-secret",
        },
      })
    );
  });

  it("should keep non-JSON bodies as text", async () => {
    fetchMock.mockResolvedValue(new Response("<html>maintenance</html>", { status: 503 }));

    await expect(
      new FetchHttpClient().request("GET", "https://marketplace.test/x")
    ).resolves.toEqual({ status: 503, body: "<html>maintenance</html>" });
  });

  it("should map an empty body to null", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 200 }));

    await expect(
      new FetchHttpClient().request("DELETE", "https://marketplace.test/x")
    ).resolves.toEqual({ status: 200, body: null });
  });

  it("should reject when the request never completes", async () => {
    fetchMock.mockRejectedValue(new Error("ECONNRESET"));

    await expect(
      new FetchHttpClient().request("GET", "https://marketplace.test/x")
    ).rejects.toThrow("ECONNRESET");
  });
});
