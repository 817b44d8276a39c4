import axios, { type AxiosInstance } from "axios";
import { config } from "@config/env";
import { log } from "@utils/logger";
import type { AnyContract } from "../contracts/index";
import {
  getContract,
  type ContractRequest,
  type ContractResponse,
  type HttpAdapter,
  type HttpCommand,
} from "../port";

export interface AxiosHttpAdapterOptions {
  baseURL?: string;
  client?: AxiosInstance;
}

export class AxiosHttpAdapter implements HttpAdapter {
  private readonly client: AxiosInstance;

  constructor(options: AxiosHttpAdapterOptions = {}) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseURL ?? config.apiBaseUrl,
        headers: { Accept: "application/json" },
      });
  }

  async invoke<K extends HttpCommand>(
    command: K,
    payload: ContractRequest<K>,
  ): Promise<ContractResponse<K>> {
    try {
      const contract: AnyContract = getContract(command);
      const request = contract.request.parse(payload ?? {});
      const response = await this.client.request({
        method: contract.method,
        url: contract.path(request),
      });
      return contract.response.parse(response.data);
    } catch (error) {
      log.warn("[http] request failed", { command, error });
      throw error;
    }
  }
}
