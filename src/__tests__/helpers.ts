import axios, { AxiosAdapter, AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import pino, { Logger } from "pino";
import type { Knex } from "knex";
import { createDb, ensureSchema } from "../db";
import type { InventorySource } from "../sourceClient";
import type { Item } from "../types";

export type StubReply = { status: number; data?: unknown; headers?: Record<string, string> };

/** axios instance whose requests are answered in-process by `handler`. */
export function stubHttp(handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>): AxiosInstance {
  return axios.create({ baseURL: "http://inventory.test/api", adapter: stubAdapter(handler) });
}

export function stubAdapter(handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>): AxiosAdapter {
  return async config => {
    const reply = await handler(config);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: reply.headers ?? {},
      config,
    };
    if (config.validateStatus && !config.validateStatus(reply.status)) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  };
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** Logger that keeps every emitted line as a parsed object. */
export function capturingLogger(): { log: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const log = pino({ level: "debug" }, {
    write(msg: string) {
      const parsed: unknown = JSON.parse(msg);
      if (parsed && typeof parsed === "object") lines.push(Object.fromEntries(Object.entries(parsed)));
    },
  });
  return { log, lines };
}

export async function memoryDb(): Promise<Knex> {
  const db = createDb(":memory:");
  await ensureSchema(db);
  return db;
}

export function item(locationId: string, putDate: string, lastCountDate: string | null, extra: Partial<Item> = {}): Item {
  return { id: `${locationId}-${putDate}`, locationId, putDate, lastCountDate, ...extra };
}

export class FakeSource implements InventorySource {
  calls = 0;
  private gate: Promise<void> | null = null;
  private open: (() => void) | null = null;

  constructor(public items: Item[] = [], public failWith: Error | null = null) {}

  /** Hold every fetch until `release()` is called. */
  hold() {
    this.gate = new Promise<void>(r => { this.open = r; });
  }

  release() {
    if (this.open) this.open();
    this.gate = null;
  }

  async fetchItemsAndLocations(): Promise<Item[]> {
    this.calls += 1;
    if (this.gate) await this.gate;
    if (this.failWith) throw this.failWith;
    return this.items.map(i => ({ ...i }));
  }
}
