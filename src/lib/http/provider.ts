import { config } from "@config/env";
import { AxiosHttpAdapter } from "./adapters/axios";
import { TestAdapter, type TestAdapterOptions } from "./adapters/test";
import { HttpAdapterResolutionError } from "./errors";
import type { HttpAdapter } from "./port";

export type AdapterName = "axios" | "fake";

let activeAdapter: HttpAdapter | undefined;
let activeName: AdapterName | undefined;

function isAdapterName(value: string): value is AdapterName {
  return value === "axios" || value === "fake";
}

function resolveAdapterName(): AdapterName {
  if (config.mode === "test") {
    return "fake";
  }
  const requested = config.httpAdapter;
  if (requested === undefined) {
    return "axios";
  }
  if (isAdapterName(requested)) {
    return requested;
  }
  throw new HttpAdapterResolutionError(requested);
}

function createAdapter(name: AdapterName, options?: TestAdapterOptions): HttpAdapter {
  if (name === "fake") {
    return new TestAdapter(options);
  }
  return new AxiosHttpAdapter({ baseURL: config.apiBaseUrl });
}

export function configureHttpAdapter(name: AdapterName, options?: TestAdapterOptions): HttpAdapter {
  activeName = name;
  activeAdapter = createAdapter(name, options);
  return activeAdapter;
}

export function setHttpAdapter(adapter: HttpAdapter): void {
  activeAdapter = adapter;
  activeName = adapter instanceof TestAdapter ? "fake" : "axios";
}

export function getHttpAdapter(): HttpAdapter {
  if (activeAdapter) {
    return activeAdapter;
  }
  return configureHttpAdapter(resolveAdapterName());
}

export function getHttpAdapterName(): AdapterName {
  if (!activeName) {
    getHttpAdapter();
  }
  return activeName ?? "axios";
}

/** @internal test hook */
export function __resetHttpAdapter(): void {
  activeAdapter = undefined;
  activeName = undefined;
}
