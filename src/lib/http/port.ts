import type { z } from "zod";
import { contracts, type ContractEntry } from "./contracts/index";
import { UnknownCommandError } from "./errors";
import { log } from "@utils/logger";

export type HttpCommand = keyof typeof contracts;

export type ContractRequest<K extends HttpCommand> = z.input<ContractEntry<K>["request"]>;
export type ContractResponse<K extends HttpCommand> = z.output<ContractEntry<K>["response"]>;

export interface HttpAdapter {
  invoke<K extends HttpCommand>(
    command: K,
    payload: ContractRequest<K>,
  ): Promise<ContractResponse<K>>;
}

export function isHttpCommand(command: string): command is HttpCommand {
  return Object.prototype.hasOwnProperty.call(contracts, command);
}

export function getContract<K extends HttpCommand>(command: K): ContractEntry<K>;
export function getContract(command: string): ContractEntry<HttpCommand>;
export function getContract(command: string): ContractEntry<HttpCommand> {
  if (!isHttpCommand(command)) {
    const known = Object.keys(contracts).sort();
    log.error("[http] unknown command invoked", { command, known });
    throw new UnknownCommandError(command, known);
  }
  return contracts[command];
}
