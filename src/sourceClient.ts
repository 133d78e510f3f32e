import axios, { AxiosError, AxiosInstance } from "axios";
import { z } from "zod";
import { SourceMalformedResponse, SourceUnavailable } from "./errors";
import type { Item } from "./types";

const PAGE_LIMIT = 100;
const MAX_PAGES = 1000;

const id = z.union([z.string().min(1), z.number()]).transform(String);

const itemRowSchema = z.object({
  id,
  locationId: id,
  putDate: z.string().min(1),
  // "" and a missing field both mean never counted
  lastCountDate: z.string().nullable().optional().transform(v => (v ? v : null)),
  storageUnit: z.string().optional(),
  qualification: z.string().optional(),
  locationName: z.string().optional(),
  quantity: z.number().optional(),
});

const pageSchema = z.array(itemRowSchema);
const envelopeSchema = z.object({ data: z.unknown() });

// The API answers either with a bare array or wrapped in { data }.
function unwrap(body: unknown): unknown {
  if (Array.isArray(body)) return body;
  const env = envelopeSchema.safeParse(body);
  return env.success ? env.data.data : body;
}

export type SourceClientOptions = {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  maxPages?: number;
};

export function createHttpClient({ baseUrl, token, timeoutMs = 30000 }: SourceClientOptions): AxiosInstance {
  return axios.create({
    baseURL: baseUrl,
    headers: {
      "Accept": "application/json",
      "Content-Type": "application/json",
      ...(token ? { "Authorization": `Bearer ${token}` } : {}),
    },
    timeout: timeoutMs,
  });
}

export interface InventorySource {
  fetchItemsAndLocations(): Promise<Item[]>;
}

/** Read-only client for the inventory system's location contents. Never retries. */
export class InventorySourceClient implements InventorySource {
  private readonly http: AxiosInstance;
  private readonly maxPages: number;

  constructor(opts: SourceClientOptions) {
    this.http = opts.http ?? createHttpClient(opts);
    this.maxPages = opts.maxPages ?? MAX_PAGES;
  }

  get httpClient(): AxiosInstance {
    return this.http;
  }

  /**
   * Pages through location contents until a short page. A page longer than the
   * limit means the API ignored paging and sent everything; a page with no new
   * item ids means it is repeating itself. Both end the walk.
   */
  async fetchItemsAndLocations(): Promise<Item[]> {
    const byId = new Map<string, Item>();
    for (let n = 0; ; n++) {
      if (n >= this.maxPages) {
        throw new SourceMalformedResponse(`location-contents did not end after ${this.maxPages} pages`);
      }
      const page = await this.getPage(n * PAGE_LIMIT);
      const before = byId.size;
      for (const it of page) byId.set(it.id, it);
      if (page.length !== PAGE_LIMIT || byId.size === before) break;
    }
    return [...byId.values()];
  }

  private async getPage(start: number): Promise<Item[]> {
    const url = `/location-contents?start=${start}&limit=${PAGE_LIMIT}`;
    let body: unknown;
    try {
      const resp = await this.http.get<unknown>(url);
      body = resp.data;
    } catch (e) {
      throw toSourceUnavailable(url, e);
    }

    const parsed = pageSchema.safeParse(unwrap(body));
    if (!parsed.success) {
      const issues = parsed.error.issues.slice(0, 5).map(i => ({ path: i.path.join("."), message: i.message }));
      throw new SourceMalformedResponse(`[GET ${url}] response does not match the location-contents schema`, issues);
    }
    return parsed.data.map(r => ({
      id: r.id,
      locationId: r.locationId,
      putDate: r.putDate,
      lastCountDate: r.lastCountDate,
      storageUnit: r.storageUnit,
      qualification: r.qualification,
      locationName: r.locationName,
      quantity: r.quantity,
    }));
  }
}

function toSourceUnavailable(url: string, e: unknown): SourceUnavailable {
  if (e instanceof AxiosError) {
    const status = e.response?.status ?? null;
    if (status !== null) {
      const data = e.response?.data;
      const body = typeof data === "string" ? data : JSON.stringify(data ?? "");
      return new SourceUnavailable(`[GET ${url}] ${status} ${body.slice(0, 300)}`, status);
    }
    const timedOut = e.code === AxiosError.ECONNABORTED || e.code === AxiosError.ETIMEDOUT;
    return new SourceUnavailable(`[GET ${url}] ${timedOut ? "timed out" : e.message}`);
  }
  return new SourceUnavailable(`[GET ${url}] ${e instanceof Error ? e.message : String(e)}`);
}
