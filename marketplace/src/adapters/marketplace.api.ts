/**
 * Marketplace HTTP client
 *
 * Talks to the marketplace listings API over JSON. Non-2xx answers are not
 * errors here: the status and body go back to the sync driver, which
 * classifies them. Only a request that never completes rejects.
 */

import { ApiResponse, FolderId } from "../core/dto";
import { toListingsBody, toWireListing } from "../core/payload";
import { ListingPayload, MarketplaceApiPort } from "../core/ports";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface HttpRequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  timeout?: number;
}

export interface HttpClient {
  request(
    method: HttpMethod,
    url: string,
    options?: HttpRequestOptions
  ): Promise<ApiResponse>;
}

export class FetchHttpClient implements HttpClient {
  async request(
    method: HttpMethod,
    url: string,
    options: HttpRequestOptions = {}
  ): Promise<ApiResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      options.timeout || 10000
    );

    try {
      const response = await fetch(url, {
        method,
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          ...options.headers,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });

      return { status: response.status, body: parseBody(await response.text()) };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    // Error pages come back as HTML or plain text
    return text;
  }
}

export interface MarketplaceApiConfig {
  /** Listings API root, e.g. https://marketplace.example/api/1 */
  apiBaseUrl: string;
  merchantId: string;
  apiToken?: string;
  requestTimeoutMs: number;
}

export class HttpMarketplaceApi implements MarketplaceApiPort {
  constructor(
    private config: MarketplaceApiConfig,
    private httpClient: HttpClient = new FetchHttpClient()
  ) {}

  async getMerchant(): Promise<ApiResponse> {
    return this.send("GET", "merchant");
  }

  async getListings(): Promise<ApiResponse> {
    return this.send("GET", "listings");
  }

  async getListing(listingId: number): Promise<ApiResponse> {
    return this.send("GET", `listing/${listingId}`);
  }

  async createListing(listing: {
    listingFolderId: FolderId;
    versionFolderId: FolderId | null;
  }): Promise<ApiResponse> {
    const body = toListingsBody([
      toWireListing({ ...listing, isActive: false }),
    ]);
    return this.send("POST", "listings", body);
  }

  async updateListing(listing: ListingPayload): Promise<ApiResponse> {
    return this.send(
      "PUT",
      `listing/${listing.listingId}`,
      toListingsBody([toWireListing(listing)])
    );
  }

  async associateListing(listing: ListingPayload): Promise<ApiResponse> {
    return this.send(
      "PUT",
      `associate_inventory/${listing.listingId}`,
      toListingsBody([toWireListing(listing)])
    );
  }

  async deleteListing(listingId: number): Promise<ApiResponse> {
    return this.send("DELETE", `listing/${listingId}`);
  }

  async getImportStatus(): Promise<ApiResponse> {
    return this.send("GET", "inventory/import");
  }

  async triggerImport(): Promise<ApiResponse> {
    return this.send("POST", "inventory/import", {});
  }

  merchantUrl(path: string): string {
    const base = this.config.apiBaseUrl.replace(/\/+$/, "");
    return `${base}/${encodeURIComponent(this.config.merchantId)}/${path}`;
  }

  private async send(
    method: HttpMethod,
    path: string,
    body?: unknown
  ): Promise<ApiResponse> {
    const headers: Record<string, string> = {};
    if (this.config.apiToken) {
      headers.Authorization = `Bearer ${this.config.apiToken}`;
    }

    return this.httpClient.request(method, this.merchantUrl(path), {
      body,
      headers,
      timeout: this.config.requestTimeoutMs,
    });
  }
}
