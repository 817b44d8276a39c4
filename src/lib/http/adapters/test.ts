import type { Pet, PetId } from "../../../models";
import type { AnyContract } from "../contracts/index";
import { PetsDeleteRequestSchema } from "../contracts/pets";
import {
  getContract,
  type ContractRequest,
  type ContractResponse,
  type HttpAdapter,
  type HttpCommand,
} from "../port";

export interface TestAdapterOptions {
  pets?: Pet[];
  /** Hold every request until `release()` is called. */
  deferred?: boolean;
}

export interface RecordedRequest {
  command: HttpCommand;
  payload: unknown;
}

interface PendingRequest {
  command: HttpCommand;
  settle: () => void;
}

/**
 * In-process stand-in for the pets HTTP resource. Behaves like json-server:
 * `pets_list` returns the seeded collection in order and `pets_delete`
 * removes the matching record, answering `{}` even when nothing matched.
 */
export class TestAdapter implements HttpAdapter {
  private pets: Pet[];
  private deferred: boolean;
  private readonly failures = new Map<HttpCommand, unknown[]>();
  private readonly pendingRequests: PendingRequest[] = [];
  readonly requests: RecordedRequest[] = [];

  constructor(options: TestAdapterOptions = {}) {
    this.pets = (options.pets ?? []).map((pet) => ({ ...pet }));
    this.deferred = options.deferred ?? false;
  }

  seed(pets: Pet[]): void {
    this.pets = pets.map((pet) => ({ ...pet }));
  }

  serverPets(): Pet[] {
    return this.pets.map((pet) => ({ ...pet }));
  }

  setDeferred(deferred: boolean): void {
    this.deferred = deferred;
  }

  /** Queue an error for the next request of `command`. */
  failNext(command: HttpCommand, error: unknown): void {
    const queue = this.failures.get(command) ?? [];
    queue.push(error);
    this.failures.set(command, queue);
  }

  pending(): number {
    return this.pendingRequests.length;
  }

  /** Settle the held request at `index` (call order). */
  release(index = 0): void {
    const [entry] = this.pendingRequests.splice(index, 1);
    if (!entry) {
      throw new Error(`No pending request at index ${index}`);
    }
    entry.settle();
  }

  releaseAll(): void {
    while (this.pendingRequests.length > 0) {
      this.release(0);
    }
  }

  invoke<K extends HttpCommand>(
    command: K,
    payload: ContractRequest<K>,
  ): Promise<ContractResponse<K>> {
    this.requests.push({ command, payload });

    return new Promise<ContractResponse<K>>((resolve, reject) => {
      const settle = () => {
        try {
          const contract: AnyContract = getContract(command);
          const request = contract.request.parse(payload ?? {});
          const parsed = contract.response.parse(this.handle(command, request));
          resolve(parsed);
        } catch (error) {
          reject(error);
        }
      };
      if (this.deferred) {
        this.pendingRequests.push({ command, settle });
      } else {
        queueMicrotask(settle);
      }
    });
  }

  private handle(command: HttpCommand, request: unknown): unknown {
    const queued = this.failures.get(command);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }
    switch (command) {
      case "pets_list":
        return this.serverPets();
      case "pets_delete": {
        const { id } = PetsDeleteRequestSchema.parse(request);
        this.removePet(id);
        return {};
      }
    }
  }

  private removePet(id: PetId): void {
    this.pets = this.pets.filter((pet) => pet.id !== id);
  }
}
